import type { AdapterSettings, CommandOptions } from '../domain/agent/agent-config.js';
import type { AgentResult } from '../domain/agent/agent-result.js';
import { extractRetryAfter, isRateLimited } from '../domain/agent/rate-limit.js';
import type { AgentAdapter } from '../ports/agent-adapter.js';
import { parseCliOutput, resolveOptions } from './cli-output.js';

export class CodexAdapter implements AgentAdapter {
  readonly name = 'codex';
  readonly displayName = 'Codex CLI';
  readonly provider = 'OpenAI';
  readonly coordinatorOnly = false;

  constructor(readonly settings: AdapterSettings) {}

  buildCommand(prompt: string, options: CommandOptions = {}): string[] {
    const { model, autoApprove } = resolveOptions(this.settings, options);
    const args = [this.settings.binaryPath, 'exec'];

    if (model) {
      args.push('-m', model);
    }
    if (autoApprove) {
      args.push('--full-auto');
    }
    if (options.jsonOutput) {
      args.push('--json');
    }
    for (const extra of this.settings.extraArgs) {
      if (!args.includes(extra)) args.push(extra);
    }
    // codex exec reads the prompt from its last positional argument
    args.push(prompt);
    return args;
  }

  parseOutput(stdout: Buffer, stderr: Buffer, exitCode: number): AgentResult {
    return parseCliOutput(this, stdout, stderr, exitCode);
  }

  filterStderr(stderr: string): string {
    return stderr;
  }

  isRateLimited(stdout: string, stderr: string): boolean {
    return isRateLimited(stdout, stderr);
  }

  extractRetryAfter(stdout: string, stderr: string): number | null {
    return extractRetryAfter(stdout, stderr);
  }
}
