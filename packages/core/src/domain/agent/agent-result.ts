export interface AgentResult {
  readonly agentName: string;
  readonly output: string;
  /** True only when the process exited 0 and no rate limit was detected. */
  readonly success: boolean;
  readonly exitCode: number;
  readonly stderr: string;
  /** Wall-clock time across every attempt, backoff sleeps included. */
  readonly durationSeconds: number;
  readonly rateLimited: boolean;
  readonly retries: number;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export type StatusLabel = 'SUCCESS' | `SUCCESS (retried ${number}x)` | 'RATE_LIMITED' | 'TIMEOUT' | 'FAILED';

export function createAgentResult(
  init: Pick<AgentResult, 'agentName' | 'output' | 'success'> & Partial<AgentResult>,
): AgentResult {
  return {
    exitCode: 0,
    stderr: '',
    durationSeconds: 0,
    rateLimited: false,
    retries: 0,
    metadata: {},
    ...init,
  };
}

export function resultFromError(agentName: string, error: unknown): AgentResult {
  return createAgentResult({
    agentName,
    output: '',
    success: false,
    exitCode: -1,
    stderr: error instanceof Error ? error.message : String(error),
  });
}

export function getStatusLabel(result: AgentResult): StatusLabel {
  if (result.success) {
    return result.retries > 0 ? `SUCCESS (retried ${result.retries}x)` : 'SUCCESS';
  }
  if (result.rateLimited) return 'RATE_LIMITED';
  const stderr = result.stderr.toLowerCase();
  if (stderr.includes('timed out') || stderr.includes('timeout')) return 'TIMEOUT';
  return 'FAILED';
}

export function truncateOutput(result: AgentResult, limit = 500): string {
  if (result.output.length <= limit) return result.output;
  return result.output.slice(0, limit) + '...';
}
