import type { AdapterSettings, CommandOptions } from '../domain/agent/agent-config.js';
import type { AgentResult } from '../domain/agent/agent-result.js';
import { extractRetryAfter, isRateLimited } from '../domain/agent/rate-limit.js';
import type { AgentAdapter } from '../ports/agent-adapter.js';
import { parseCliOutput, resolveOptions } from './cli-output.js';

export class GeminiAdapter implements AgentAdapter {
  readonly name = 'gemini';
  readonly displayName = 'Gemini CLI';
  readonly provider = 'Google';
  readonly coordinatorOnly = false;

  constructor(readonly settings: AdapterSettings) {}

  buildCommand(prompt: string, options: CommandOptions = {}): string[] {
    const { model, autoApprove } = resolveOptions(this.settings, options);
    const args = [this.settings.binaryPath];

    if (options.jsonOutput) {
      args.push('--output-format', 'json');
    }
    if (model) {
      args.push('-m', model);
    }
    if (autoApprove) {
      args.push('-y');
    }
    args.push(...this.settings.extraArgs);
    // positional prompt goes last
    args.push(prompt);
    return args;
  }

  parseOutput(stdout: Buffer, stderr: Buffer, exitCode: number): AgentResult {
    return parseCliOutput(this, stdout, stderr, exitCode);
  }

  /** Gemini CLI's Node runtime prints a punycode deprecation warning on every run. */
  filterStderr(stderr: string): string {
    return stderr
      .split(/\r?\n/)
      .filter((line) => !line.toLowerCase().includes('punycode') && !line.includes('DeprecationWarning'))
      .join('\n')
      .trim();
  }

  isRateLimited(stdout: string, stderr: string): boolean {
    return isRateLimited(stdout, stderr);
  }

  extractRetryAfter(stdout: string, stderr: string): number | null {
    return extractRetryAfter(stdout, stderr);
  }
}
