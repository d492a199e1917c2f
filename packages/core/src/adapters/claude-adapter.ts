import type { AdapterSettings, CommandOptions } from '../domain/agent/agent-config.js';
import type { AgentResult } from '../domain/agent/agent-result.js';
import { extractRetryAfter, isRateLimited } from '../domain/agent/rate-limit.js';
import type { AgentAdapter } from '../ports/agent-adapter.js';
import { parseCliOutput, resolveOptions } from './cli-output.js';

export class ClaudeAdapter implements AgentAdapter {
  readonly name = 'claude';
  readonly displayName = 'Claude Code';
  readonly provider = 'Anthropic';
  readonly coordinatorOnly = true;

  constructor(readonly settings: AdapterSettings) {}

  buildCommand(prompt: string, options: CommandOptions = {}): string[] {
    const { model, autoApprove, maxTurns } = resolveOptions(this.settings, options);
    const args = [this.settings.binaryPath, '-p', prompt];

    if (options.jsonOutput) {
      args.push('--output-format', 'json');
    }
    if (model) {
      args.push('--model', model);
    }
    if (autoApprove) {
      args.push('--permission-mode', 'dontAsk');
    }
    if (options.systemPrompt?.trim()) {
      args.push('--append-system-prompt', options.systemPrompt);
    }
    if (maxTurns) {
      args.push('--max-turns', String(maxTurns));
    }
    args.push(...this.settings.extraArgs);
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
