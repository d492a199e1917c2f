import { getStatusLabel, type AgentResult, type OrchestrationOutcome } from '@neurones/core';
import type { OutputFormatter } from './formatter.js';
import { renderComparison } from './table.js';

export class PlainFormatter implements OutputFormatter {
  formatOutcome(outcome: OrchestrationOutcome): string {
    return outcome.output || 'No output.';
  }

  formatResult(result: AgentResult): string {
    if (result.success) return result.output;
    return `${result.agentName} ${getStatusLabel(result)}: ${result.stderr || '(no error output)'}`;
  }

  formatComparison(_prompt: string, results: readonly AgentResult[]): string {
    return renderComparison(results);
  }

  formatError(error: string): string {
    return `Error: ${error}`;
  }
}
