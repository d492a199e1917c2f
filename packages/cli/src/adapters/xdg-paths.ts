import { join } from 'node:path';
import { homedir } from 'node:os';

export function getConfigDir(env: Record<string, string | undefined> = process.env): string {
  return env.XDG_CONFIG_HOME
    ? join(env.XDG_CONFIG_HOME, 'neurones')
    : join(homedir(), '.config', 'neurones');
}
