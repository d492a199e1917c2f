import { getStatusLabel, type AgentResult, type OrchestrationOutcome } from '@neurones/core';
import type { OutputFormatter } from './formatter.js';

export function serializeResult(result: AgentResult) {
  return { ...result, status: getStatusLabel(result) };
}

export class JsonFormatter implements OutputFormatter {
  formatOutcome(outcome: OrchestrationOutcome): string {
    return JSON.stringify({ ...outcome, results: outcome.results.map(serializeResult) }, null, 2);
  }

  formatResult(result: AgentResult): string {
    return JSON.stringify(serializeResult(result), null, 2);
  }

  formatComparison(prompt: string, results: readonly AgentResult[]): string {
    return JSON.stringify({ prompt, results: results.map(serializeResult) }, null, 2);
  }

  formatError(error: string): string {
    return JSON.stringify({ error });
  }
}
