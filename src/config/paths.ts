import * as os from 'os';
import * as path from 'path';

export interface PathEnv {
  env: NodeJS.ProcessEnv;
  homeDir: string;
}

export function defaultPathEnv(): PathEnv {
  return { env: process.env, homeDir: os.homedir() };
}

/** `$VAR` and `${VAR}`; unset variables expand to the empty string. */
export function expandEnv(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g, (_, braced?: string, bare?: string) => {
    const key = braced ?? bare ?? '';
    return env[key] ?? '';
  });
}

/**
 * Expands env vars and `~`, then anchors relative paths at `baseDir`.
 * An empty input stays empty.
 */
export function expandPath(value: string, baseDir: string, { env, homeDir }: PathEnv): string {
  if (!value) return '';

  let expanded = expandEnv(value, env);
  if (expanded === '~') {
    expanded = homeDir;
  } else if (expanded.startsWith('~/')) {
    expanded = path.join(homeDir, expanded.slice(2));
  }

  if (!path.isAbsolute(expanded) && baseDir) {
    expanded = path.join(baseDir, expanded);
  }
  return path.normalize(expanded);
}

export function configDir(homeDir: string): string {
  return path.join(homeDir, '.config', 'stream-ops');
}

export function natsContextDir(homeDir: string): string {
  return path.join(homeDir, '.config', 'nats', 'context');
}
