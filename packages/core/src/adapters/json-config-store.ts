import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ConfigStore } from '../ports/config-store.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('json-config-store');

export class JsonConfigStore implements ConfigStore {
  constructor(private readonly configDir: string) {}

  get location(): string {
    return join(this.configDir, 'config.json');
  }

  async load(): Promise<unknown> {
    let data: string;
    try {
      data = await readFile(this.location, 'utf-8');
    } catch {
      return null;
    }
    try {
      return JSON.parse(data);
    } catch (err) {
      log.warn(`load: ${this.location} is not valid JSON, using defaults:`, err instanceof Error ? err.message : String(err));
      return null;
    }
  }

  async save(config: unknown): Promise<void> {
    await mkdir(this.configDir, { recursive: true });
    await writeFile(this.location, JSON.stringify(config, null, 2) + '\n', 'utf-8');
    log.info(`save: wrote ${this.location}`);
  }

  async reset(): Promise<void> {
    await rm(this.location, { force: true });
  }
}
