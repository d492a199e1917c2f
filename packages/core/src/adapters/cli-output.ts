import type { AdapterSettings, CommandOptions } from '../domain/agent/agent-config.js';
import { createAgentResult, type AgentResult } from '../domain/agent/agent-result.js';
import type { AgentAdapter } from '../ports/agent-adapter.js';

const decoder = new TextDecoder('utf-8', { fatal: false });

/** Invalid byte sequences become U+FFFD instead of throwing. */
export function decodeOutput(bytes: Uint8Array): string {
  return decoder.decode(bytes).trim();
}

export function parseCliOutput(
  adapter: AgentAdapter,
  stdout: Uint8Array,
  stderr: Uint8Array,
  exitCode: number,
): AgentResult {
  const output = decodeOutput(stdout);
  const errorText = adapter.filterStderr(decodeOutput(stderr));
  const rateLimited = adapter.isRateLimited(output, errorText);

  return createAgentResult({
    agentName: adapter.name,
    output,
    success: exitCode === 0 && !rateLimited,
    exitCode,
    stderr: errorText,
    rateLimited,
  });
}

export interface ResolvedOptions {
  model: string | null;
  autoApprove: boolean;
  maxTurns: number | null;
}

/** Call-time option, else the adapter default, else nothing. */
export function resolveOptions(settings: AdapterSettings, options: CommandOptions): ResolvedOptions {
  const model = options.model?.trim() || settings.defaultModel?.trim() || null;
  const maxTurns = options.maxTurns ?? settings.maxTurns ?? null;
  return {
    model,
    autoApprove: options.autoApprove ?? settings.autoApprove,
    maxTurns: maxTurns && maxTurns > 0 ? maxTurns : null,
  };
}
