import type { CommandOptions } from '../domain/agent/agent-config.js';
import type { AgentResult } from '../domain/agent/agent-result.js';

export type AgentRunStatus = 'queued' | 'running' | 'retrying' | 'success' | 'error';

export interface AgentTask {
  agent: string;
  prompt: string;
}

export interface RunOptions extends CommandOptions {
  /** Upper bound on the adapter's own timeout for this call. */
  timeoutCapSeconds?: number;
  onStatus?: (status: AgentRunStatus) => void;
}

export interface ParallelRunOptions {
  timeoutCapSeconds?: number;
  onStatus?: (index: number, agentName: string, status: AgentRunStatus) => void;
}

/** What the orchestrator and comparator need from the executor. */
export interface AgentRunner {
  runSingle(agentName: string, prompt: string, options?: RunOptions): Promise<AgentResult>;
  runParallel(tasks: readonly AgentTask[], options?: ParallelRunOptions): Promise<AgentResult[]>;
}
