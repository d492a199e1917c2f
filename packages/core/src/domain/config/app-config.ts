import { ConfigError } from '../../shared/errors.js';

export interface AgentSettings {
  /** Overrides the path found on PATH. */
  binaryPath?: string | null;
  defaultModel?: string | null;
  autoApprove: boolean;
  timeout: number;
  maxTurns?: number | null;
  extraArgs: string[];
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelaySeconds: number;
  maxDelaySeconds: number;
}

export interface AppConfig {
  primary: string;
  parallelTimeout: number;
  jsonOutput: boolean;
  retry: RetryPolicy;
  agents: Record<string, AgentSettings>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelaySeconds: 5,
  maxDelaySeconds: 60,
};

export const DEFAULT_AGENT_SETTINGS: AgentSettings = {
  autoApprove: true,
  timeout: 300,
  extraArgs: [],
};

export function createDefaultConfig(): AppConfig {
  return {
    primary: 'claude',
    parallelTimeout: 600,
    jsonOutput: true,
    retry: { ...DEFAULT_RETRY_POLICY },
    agents: {
      claude: { ...DEFAULT_AGENT_SETTINGS, maxTurns: 15 },
      gemini: { ...DEFAULT_AGENT_SETTINGS },
      codex: { ...DEFAULT_AGENT_SETTINGS, extraArgs: ['--skip-git-repo-check'] },
    },
  };
}

export function getAgentSettings(config: AppConfig, name: string): AgentSettings {
  return config.agents[name] ?? { ...DEFAULT_AGENT_SETTINGS, extraArgs: [] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;
}

function pickPositive(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

function pickOptionalString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

function pickStringArray(value: unknown, fallback: string[]): string[] {
  if (!Array.isArray(value)) return fallback;
  return value.filter((item): item is string => typeof item === 'string');
}

function normalizeAgentSettings(raw: unknown, fallback: AgentSettings): AgentSettings {
  if (!isRecord(raw)) return fallback;
  const maxTurns = pickNumber(raw.maxTurns, 0);
  return {
    binaryPath: pickOptionalString(raw.binaryPath),
    defaultModel: pickOptionalString(raw.defaultModel),
    autoApprove: typeof raw.autoApprove === 'boolean' ? raw.autoApprove : fallback.autoApprove,
    timeout: pickPositive(raw.timeout, fallback.timeout),
    maxTurns: maxTurns > 0 ? Math.floor(maxTurns) : fallback.maxTurns ?? null,
    extraArgs: pickStringArray(raw.extraArgs, fallback.extraArgs),
  };
}

/**
 * Merge an untrusted, partially filled config object over the defaults.
 * Fields with the wrong type fall back to their default.
 */
export function normalizeAppConfig(raw: unknown): AppConfig {
  const defaults = createDefaultConfig();
  if (!isRecord(raw)) return defaults;

  const retryRaw = isRecord(raw.retry) ? raw.retry : {};
  const agents: Record<string, AgentSettings> = { ...defaults.agents };
  if (isRecord(raw.agents)) {
    for (const [name, settings] of Object.entries(raw.agents)) {
      agents[name] = normalizeAgentSettings(settings, defaults.agents[name] ?? DEFAULT_AGENT_SETTINGS);
    }
  }

  return {
    primary: pickOptionalString(raw.primary) ?? defaults.primary,
    parallelTimeout: pickPositive(raw.parallelTimeout, defaults.parallelTimeout),
    jsonOutput: typeof raw.jsonOutput === 'boolean' ? raw.jsonOutput : defaults.jsonOutput,
    retry: {
      maxRetries: Math.floor(pickNumber(retryRaw.maxRetries, defaults.retry.maxRetries)),
      baseDelaySeconds: pickNumber(retryRaw.baseDelaySeconds, defaults.retry.baseDelaySeconds),
      maxDelaySeconds: pickNumber(retryRaw.maxDelaySeconds, defaults.retry.maxDelaySeconds),
    },
    agents,
  };
}

function parseBoolean(key: string, value: string): boolean {
  const lowered = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(lowered)) return true;
  if (['false', '0', 'no'].includes(lowered)) return false;
  throw new ConfigError(`Expected a boolean for ${key}, got "${value}"`);
}

function parseNonNegative(key: string, value: string, integer = false): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || (integer && !Number.isInteger(parsed))) {
    throw new ConfigError(`Expected a non-negative ${integer ? 'integer' : 'number'} for ${key}, got "${value}"`);
  }
  return parsed;
}

function parsePositiveInteger(key: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`Expected a positive integer for ${key}, got "${value}"`);
  }
  return parsed;
}

/**
 * Apply a `key = value` pair as written on the command line
 * (`primary`, `max_retries`, `agents.codex.timeout`, ...). Returns a new config.
 */
export function applyConfigValue(config: AppConfig, key: string, value: string): AppConfig {
  switch (key) {
    case 'primary':
      if (!value.trim()) throw new ConfigError('primary cannot be empty');
      return { ...config, primary: value.trim() };
    case 'parallel_timeout':
      return { ...config, parallelTimeout: parsePositiveInteger(key, value) };
    case 'json_output':
      return { ...config, jsonOutput: parseBoolean(key, value) };
    case 'max_retries':
      return { ...config, retry: { ...config.retry, maxRetries: parseNonNegative(key, value, true) } };
    case 'retry_base_delay':
      return { ...config, retry: { ...config.retry, baseDelaySeconds: parseNonNegative(key, value) } };
    case 'retry_max_delay':
      return { ...config, retry: { ...config.retry, maxDelaySeconds: parseNonNegative(key, value) } };
  }

  const parts = key.split('.');
  if (parts.length !== 3 || parts[0] !== 'agents' || !parts[1]) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }
  const [, agentName, field] = parts;
  const current = getAgentSettings(config, agentName);
  let updated: AgentSettings;
  switch (field) {
    case 'auto_approve':
      updated = { ...current, autoApprove: parseBoolean(key, value) };
      break;
    case 'timeout':
      updated = { ...current, timeout: parsePositiveInteger(key, value) };
      break;
    case 'default_model':
      updated = { ...current, defaultModel: value.trim() || null };
      break;
    case 'max_turns': {
      const turns = parseNonNegative(key, value, true);
      updated = { ...current, maxTurns: turns > 0 ? turns : null };
      break;
    }
    case 'binary_path':
      updated = { ...current, binaryPath: value.trim() || null };
      break;
    case 'extra_args':
      updated = { ...current, extraArgs: value.split(/\s+/).filter(Boolean) };
      break;
    default:
      throw new ConfigError(`Unknown agent field: ${field}`);
  }
  return { ...config, agents: { ...config.agents, [agentName]: updated } };
}
