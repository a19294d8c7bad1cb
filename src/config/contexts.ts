import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors';
import { logger } from '../utils/logger';
import { expandEnv, expandPath, natsContextDir, type PathEnv } from './paths';

export interface ContextConfig {
  name: string;
  server: string;
  token?: string;
  creds?: string;
}

// Format written by the `nats` CLI (`nats context save`).
const natsContextSchema = z.object({
  url: z.string().default(''),
  token: z.string().default(''),
  creds: z.string().default(''),
  user: z.string().default(''),
  password: z.string().default(''),
  nkey: z.string().default(''),
});

const log = logger.child('config');

export async function readNatsContext(name: string, pathEnv: PathEnv): Promise<ContextConfig> {
  const dir = natsContextDir(pathEnv.homeDir);
  const file = path.join(dir, `${name}.json`);

  let parsed: z.infer<typeof natsContextSchema>;
  try {
    parsed = natsContextSchema.parse(JSON.parse(await fs.readFile(file, 'utf8')));
  } catch (e) {
    throw new ConfigError(`Failed to read NATS context '${name}': ${errorMessage(e)}`);
  }

  const ctx: ContextConfig = { name, server: parsed.url };
  if (parsed.creds) ctx.creds = expandPath(parsed.creds, dir, pathEnv);
  if (parsed.token) ctx.token = parsed.token.includes('$') ? expandEnv(parsed.token, pathEnv.env) : parsed.token;
  return ctx;
}

/** Every readable context; unreadable ones are skipped. */
export async function listNatsContexts(pathEnv: PathEnv): Promise<ContextConfig[]> {
  const dir = natsContextDir(pathEnv.homeDir);
  const entries = await fs.readdir(dir, { withFileTypes: true });

  const names = entries
    .filter(e => e.isFile() && e.name.endsWith('.json'))
    .map(e => e.name.slice(0, -'.json'.length))
    .sort();

  const contexts: ContextConfig[] = [];
  for (const name of names) {
    try {
      contexts.push(await readNatsContext(name, pathEnv));
    } catch (e) {
      log.debug(`Skipping NATS context '${name}': ${errorMessage(e)}`);
    }
  }
  return contexts;
}

/** Name from `~/.config/nats/context.txt`, if any. */
export async function currentNatsContextName(pathEnv: PathEnv): Promise<string | undefined> {
  const file = path.join(path.dirname(natsContextDir(pathEnv.homeDir)), 'context.txt');
  try {
    const name = (await fs.readFile(file, 'utf8')).trim();
    return name || undefined;
  } catch {
    return undefined;
  }
}
