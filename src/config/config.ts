import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { StreamOpsOptions } from '../protocol';
import { ConfigError, errorMessage } from '../errors';
import { logger } from '../utils/logger';
import { currentNatsContextName, listNatsContexts, type ContextConfig } from './contexts';
import { readEnv } from './env';
import { configDir, defaultPathEnv, expandEnv, expandPath, type PathEnv } from './paths';

export type ConfigSource = 'cli' | 'config-file' | 'nats-context' | 'default';

export const DEFAULT_SERVER = 'nats://localhost:4222';

const contextSchema = z.object({
  name: z.string().min(1, 'context name is required'),
  server: z.string().min(1, 'server is required'),
  token: z.string().optional(),
  creds: z.string().optional(),
});

const configFileSchema = z.object({
  contexts: z.array(contextSchema).default([]),
  default_context: z.string().default(''),
  read_only: z.boolean().default(false),
  strict_filters: z.boolean().default(false),
});

type ConfigFile = z.infer<typeof configFileSchema>;

export class StreamOpsConfig {
  public contexts: ContextConfig[];
  public defaultContext: string;
  public readOnly: boolean;
  public strictFilters: boolean;
  private current: ContextConfig | undefined;

  constructor(
    file: ConfigFile,
    public readonly source: ConfigSource,
    public readonly sourcePath: string
  ) {
    this.contexts = file.contexts.map(c => ({ ...c }));
    this.defaultContext = file.default_context;
    this.readOnly = file.read_only;
    this.strictFilters = file.strict_filters;
    this.current = this.contexts.find(c => c.name === this.defaultContext) ?? this.contexts[0];
  }

  static defaults(): StreamOpsConfig {
    return new StreamOpsConfig(
      configFileSchema.parse({
        contexts: [{ name: 'local', server: DEFAULT_SERVER }],
        default_context: 'local',
      }),
      'default',
      'built-in default'
    );
  }

  currentContext(): ContextConfig {
    return this.current ?? { name: 'default', server: DEFAULT_SERVER };
  }

  currentContextName(): string {
    return this.current?.name ?? 'unknown';
  }

  setContext(name: string): void {
    const ctx = this.contexts.find(c => c.name === name);
    if (!ctx) throw new ConfigError(`context '${name}' not found`);
    this.current = ctx;
    this.defaultContext = name;
  }

  addContext(name: string, server: string): void {
    if (this.contexts.some(c => c.name === name)) {
      throw new ConfigError(`context '${name}' already exists`);
    }
    this.contexts.push({ name, server });
  }

  removeContext(name: string): void {
    const index = this.contexts.findIndex(c => c.name === name);
    if (index < 0) throw new ConfigError(`context '${name}' not found`);

    this.contexts.splice(index, 1);
    if (this.current?.name === name) {
      this.current = this.contexts[0];
      this.defaultContext = this.current?.name ?? '';
    }
  }

  describeSource(): string {
    switch (this.source) {
      case 'cli':
        return `Command line: ${this.sourcePath}`;
      case 'config-file':
        return `Config file: ${this.sourcePath}`;
      case 'nats-context':
        return `NATS context: ${path.basename(this.sourcePath, '.json')}`;
      case 'default':
        return 'Built-in default (no config found)';
    }
  }

  toClientOptions(): StreamOpsOptions {
    const ctx = this.currentContext();
    const options: StreamOpsOptions = { servers: ctx.server };
    if (ctx.token) options.token = ctx.token;
    if (ctx.creds) options.credsFile = ctx.creds;
    return options;
  }

  toFile(): ConfigFile {
    return {
      contexts: this.contexts.map(c => ({ ...c })),
      default_context: this.defaultContext,
      read_only: this.readOnly,
      strict_filters: this.strictFilters,
    };
  }

  async save(filePath: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(this.toFile(), null, 2) + '\n', 'utf8');
    } catch (e) {
      throw new ConfigError(`failed to write config file: ${errorMessage(e)}`);
    }
  }
}

export interface LoadConfigOptions {
  /** `--config`; defaults to `STREAM_OPS_CONFIG`, then `~/.config/stream-ops/config.json`. */
  configPath?: string;
  /** `--server`; wins over every file. */
  server?: string;
  pathEnv?: PathEnv;
}

export function defaultConfigPath(pathEnv: PathEnv = defaultPathEnv()): string {
  return readEnv(pathEnv.env).configPath ?? path.join(configDir(pathEnv.homeDir), 'config.json');
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.stat(file);
    return true;
  } catch {
    return false;
  }
}

async function readConfigFile(file: string, pathEnv: PathEnv): Promise<StreamOpsConfig> {
  let json: unknown;
  try {
    json = JSON.parse(await fs.readFile(file, 'utf8'));
  } catch (e) {
    throw new ConfigError(`failed to parse config file ${file}: ${errorMessage(e)}`);
  }

  const result = configFileSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`invalid config file ${file}: ${issues}`);
  }

  const baseDir = path.dirname(file);
  for (const ctx of result.data.contexts) {
    if (ctx.creds) ctx.creds = expandPath(ctx.creds, baseDir, pathEnv);
    if (ctx.token?.includes('$')) ctx.token = expandEnv(ctx.token, pathEnv.env);
  }
  return new StreamOpsConfig(result.data, 'config-file', file);
}

async function fromNatsContexts(pathEnv: PathEnv): Promise<StreamOpsConfig | undefined> {
  let contexts: ContextConfig[];
  try {
    contexts = await listNatsContexts(pathEnv);
  } catch {
    return undefined;
  }
  if (contexts.length === 0) return undefined;

  const wanted = await currentNatsContextName(pathEnv);
  const current = contexts.find(c => c.name === wanted) ?? contexts[0];
  const file = configFileSchema.parse({ contexts, default_context: current.name });
  return new StreamOpsConfig(file, 'nats-context', `${current.name}.json`);
}

/**
 * Resolution order: `--server`, config file, NATS CLI contexts, built-in
 * default (written to the config path so the next run finds it).
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<StreamOpsConfig> {
  const pathEnv = options.pathEnv ?? defaultPathEnv();
  const log = logger.child('config');

  if (options.server) {
    const file = configFileSchema.parse({
      contexts: [{ name: 'cli', server: options.server }],
      default_context: 'cli',
    });
    return new StreamOpsConfig(file, 'cli', options.server);
  }

  const configPath = options.configPath ?? defaultConfigPath(pathEnv);
  if (await exists(configPath)) {
    log.debug(`Loading config from ${configPath}`);
    return readConfigFile(configPath, pathEnv);
  }

  const fromContexts = await fromNatsContexts(pathEnv);
  if (fromContexts) {
    log.debug(`Using NATS context '${fromContexts.currentContextName()}'`);
    return fromContexts;
  }

  const cfg = StreamOpsConfig.defaults();
  await cfg.save(configPath);
  log.info(`Wrote default config to ${configPath}`);
  return cfg;
}
