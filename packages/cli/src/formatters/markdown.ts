import { getStatusLabel, type AgentResult, type OrchestrationOutcome } from '@neurones/core';
import type { OutputFormatter } from './formatter.js';
import { formatDuration } from '../ui/format.js';

function resultHeading(result: AgentResult): string {
  return `### ${result.agentName} (${getStatusLabel(result)}, ${formatDuration(result.durationSeconds)})`;
}

function resultBody(result: AgentResult): string {
  return result.success ? result.output : `> ${result.stderr || 'no error output'}`;
}

export class MarkdownFormatter implements OutputFormatter {
  formatOutcome(outcome: OrchestrationOutcome): string {
    const lines = ['# Neurones', '', `**Mode:** ${outcome.mode}`, ''];

    if (outcome.plan) {
      lines.push('## Plan', '', outcome.plan.reasoning || '_No reasoning given._', '');
      for (const subtask of outcome.plan.subtasks) {
        lines.push(`- **${subtask.agent}** (${subtask.priority}): ${subtask.prompt ?? '_empty_'}`);
      }
      if (outcome.plan.subtasks.length > 0) lines.push('');
    }

    if (outcome.mode === 'delegated') {
      lines.push('## Agent results', '');
      for (const result of outcome.results) {
        lines.push(resultHeading(result), '', resultBody(result), '');
      }
    }

    lines.push(outcome.mode === 'delegated' ? '## Synthesis' : '## Answer', '', outcome.output || '_No output._');
    return lines.join('\n');
  }

  formatResult(result: AgentResult): string {
    return [resultHeading(result), '', resultBody(result)].join('\n');
  }

  formatComparison(prompt: string, results: readonly AgentResult[]): string {
    const lines = ['# Comparison', '', `**Prompt:** ${prompt}`, ''];
    for (const result of results) {
      lines.push(resultHeading(result), '', resultBody(result), '');
    }
    return lines.join('\n').trimEnd();
  }

  formatError(error: string): string {
    return `## Error\n\n${error}`;
  }
}
