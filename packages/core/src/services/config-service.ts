import { applyConfigValue, normalizeAppConfig, type AppConfig } from '../domain/config/app-config.js';
import type { ConfigStore } from '../ports/config-store.js';
import { ConfigError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('config-service');

type Env = Record<string, string | undefined>;

function parseEnvInteger(name: string, raw: string, minimum = 0): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < minimum) {
    const expected = minimum > 0 ? 'a positive' : 'a non-negative';
    throw new ConfigError(`${name} must be ${expected} integer, got "${raw}"`);
  }
  return value;
}

export class ConfigService {
  constructor(
    private readonly store: ConfigStore,
    private readonly env: Env = process.env,
  ) {}

  get location(): string {
    return this.store.location;
  }

  /** Stored settings merged over defaults, with environment overrides on top. */
  async resolve(): Promise<AppConfig> {
    const config = await this.loadStored();

    const envPrimary = this.env.NEURONES_PRIMARY?.trim();
    if (envPrimary) config.primary = envPrimary;

    const envRetries = this.env.NEURONES_MAX_RETRIES?.trim();
    if (envRetries) {
      config.retry = { ...config.retry, maxRetries: parseEnvInteger('NEURONES_MAX_RETRIES', envRetries) };
    }

    const envParallelTimeout = this.env.NEURONES_PARALLEL_TIMEOUT?.trim();
    if (envParallelTimeout) {
      config.parallelTimeout = parseEnvInteger('NEURONES_PARALLEL_TIMEOUT', envParallelTimeout, 1);
    }

    return config;
  }

  /** Updates one key in the stored file; environment overrides are not persisted. */
  async set(key: string, value: string): Promise<AppConfig> {
    const updated = applyConfigValue(await this.loadStored(), key, value);
    await this.store.save(updated);
    log.info(`set: ${key} = ${value}`);
    return updated;
  }

  async reset(): Promise<void> {
    await this.store.reset();
    log.info('reset: configuration restored to defaults');
  }

  private async loadStored(): Promise<AppConfig> {
    return normalizeAppConfig(await this.store.load());
  }
}
