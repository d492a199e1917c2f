import type { AgentResult, OrchestrationOutcome } from '@neurones/core';
import { JsonFormatter } from './json.js';
import { MarkdownFormatter } from './markdown.js';
import { PlainFormatter } from './plain.js';

export interface OutputFormatter {
  formatOutcome(outcome: OrchestrationOutcome): string;
  formatResult(result: AgentResult): string;
  formatComparison(prompt: string, results: readonly AgentResult[]): string;
  formatError(error: string): string;
}

export type OutputFormat = 'plain' | 'md' | 'json';

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'plain' || value === 'md' || value === 'json';
}

export function createFormatter(format: OutputFormat): OutputFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'md':
      return new MarkdownFormatter();
    case 'plain':
      return new PlainFormatter();
  }
}

/** `--json` wins over `--format`; undefined when neither was given. */
export function requestedFormat(opts: { json?: boolean; format?: string }): OutputFormat | undefined {
  if (opts.json) return 'json';
  if (opts.format === undefined) return undefined;
  if (!isOutputFormat(opts.format)) {
    throw new Error(`Unknown format "${opts.format}". Use plain, md or json.`);
  }
  return opts.format;
}
