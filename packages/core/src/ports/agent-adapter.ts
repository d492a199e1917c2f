import type { AdapterSettings, CommandOptions } from '../domain/agent/agent-config.js';
import type { AgentResult } from '../domain/agent/agent-result.js';

export interface AgentAdapter {
  readonly name: string;
  readonly displayName: string;
  readonly provider: string;
  /** A coordinator-only agent plans and synthesizes but never runs worker subtasks. */
  readonly coordinatorOnly: boolean;
  readonly settings: AdapterSettings;

  buildCommand(prompt: string, options?: CommandOptions): string[];
  parseOutput(stdout: Buffer, stderr: Buffer, exitCode: number): AgentResult;
  filterStderr(stderr: string): string;
  isRateLimited(stdout: string, stderr: string): boolean;
  extractRetryAfter(stdout: string, stderr: string): number | null;
}

export type AdapterFactory = (settings: AdapterSettings) => AgentAdapter;
