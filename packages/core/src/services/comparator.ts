import type { AgentResult } from '../domain/agent/agent-result.js';
import type { AgentRunner, ParallelRunOptions } from '../ports/agent-runner.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('comparator');

export interface ComparatorDeps {
  executor: AgentRunner;
  /** Names of the configured agents, in display order. */
  agents: readonly string[];
}

/** Sends one prompt to several agents and returns their results side by side. */
export class Comparator {
  constructor(private readonly deps: ComparatorDeps) {}

  async compare(
    prompt: string,
    agents?: readonly string[],
    options: ParallelRunOptions = {},
  ): Promise<AgentResult[]> {
    const requested = agents ?? this.deps.agents;
    const targets = requested.filter((name) => {
      if (this.deps.agents.includes(name)) return true;
      log.warn(`compare: skipping unknown agent '${name}'`);
      return false;
    });

    if (targets.length === 0) {
      log.warn('compare: no agents available for comparison');
      return [];
    }

    log.info(`compare: ${targets.length} agents:`, targets);
    return this.deps.executor.runParallel(
      targets.map((agent) => ({ agent, prompt })),
      options,
    );
  }
}
