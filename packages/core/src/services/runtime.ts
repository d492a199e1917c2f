import type { DetectedAgent } from '../domain/agent/agent-config.js';
import { getAgentSettings, type AppConfig } from '../domain/config/app-config.js';
import { getAdapterFactory } from '../adapters/registry.js';
import type { AgentAdapter } from '../ports/agent-adapter.js';
import type { ProcessRunner } from '../ports/process-runner.js';
import { NoAgentsDetectedError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { AgentExecutor } from './agent-executor.js';

const log = createLogger('runtime');

/** One adapter per detected agent the registry knows, with configured overrides applied. */
export function buildAdapters(
  detected: ReadonlyMap<string, DetectedAgent>,
  config: AppConfig,
): Map<string, AgentAdapter> {
  const adapters = new Map<string, AgentAdapter>();
  for (const [name, agent] of detected) {
    if (!agent.available) continue;
    const factory = getAdapterFactory(name);
    if (!factory) {
      log.warn(`buildAdapters: no adapter for detected agent '${name}'`);
      continue;
    }
    const settings = getAgentSettings(config, name);
    adapters.set(
      name,
      factory({
        binaryPath: settings.binaryPath ?? agent.binaryPath,
        timeoutSeconds: settings.timeout,
        autoApprove: settings.autoApprove,
        defaultModel: settings.defaultModel ?? null,
        maxTurns: settings.maxTurns ?? null,
        extraArgs: [...settings.extraArgs],
      }),
    );
  }
  return adapters;
}

export function resolvePrimary(preferred: string, adapters: ReadonlyMap<string, AgentAdapter>): string {
  if (adapters.has(preferred)) return preferred;
  const [fallback] = adapters.keys();
  if (fallback === undefined) throw new NoAgentsDetectedError();
  log.warn(`resolvePrimary: primary '${preferred}' not available, using '${fallback}'`);
  return fallback;
}

export interface RuntimeOptions {
  config: AppConfig;
  detected: ReadonlyMap<string, DetectedAgent>;
  runner: ProcessRunner;
  cwd?: string;
  /** Overrides config.primary. */
  primary?: string;
}

export interface Runtime {
  adapters: Map<string, AgentAdapter>;
  executor: AgentExecutor;
  primary: string;
  available: string[];
}

export function createRuntime(options: RuntimeOptions): Runtime {
  const adapters = buildAdapters(options.detected, options.config);
  if (adapters.size === 0) throw new NoAgentsDetectedError();

  const primary = resolvePrimary(options.primary ?? options.config.primary, adapters);
  const executor = new AgentExecutor({
    adapters,
    runner: options.runner,
    retry: options.config.retry,
    cwd: options.cwd,
  });
  return { adapters, executor, primary, available: [...adapters.keys()] };
}
