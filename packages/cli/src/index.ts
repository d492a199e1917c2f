import {
  Orchestrator,
  setLogLevel,
  type LogLevel,
  type OrchestrationOutcome,
} from '@neurones/core';
import { createCallbackEventBridge, type EventHandler } from './adapters/callback-event-bridge.js';
import { createCliContext } from './context.js';

export interface OrchestrateOptions {
  prompt: string;
  cwd?: string;
  /** Overrides the configured primary agent. */
  primary?: string;
  onProgress?: EventHandler;
  logLevel?: LogLevel;
}

/**
 * Run one orchestration with the user's configuration and the agents found on
 * PATH. Suitable for use as a programmatic API or agent skill.
 */
export async function orchestrate(options: OrchestrateOptions): Promise<OrchestrationOutcome> {
  if (options.logLevel) setLogLevel(options.logLevel);

  const { config, runtime } = await createCliContext({
    primary: options.primary,
    cwd: options.cwd ?? process.cwd(),
  });

  const orchestrator = new Orchestrator({
    primary: runtime.primary,
    adapters: runtime.adapters,
    executor: runtime.executor,
    availableAgents: runtime.available,
    parallelTimeoutSeconds: config.parallelTimeout,
    events: createCallbackEventBridge(options.onProgress ?? {}),
  });
  return orchestrator.execute(options.prompt);
}

export type { EventHandler } from './adapters/callback-event-bridge.js';

// Re-export everything from core for advanced usage
export * from '@neurones/core';
