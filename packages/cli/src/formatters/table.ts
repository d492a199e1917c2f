import { getStatusLabel, truncateOutput, type AgentResult, type DetectedAgent } from '@neurones/core';
import { formatDuration } from '../ui/format.js';

function renderTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, col) => Math.max(header.length, ...rows.map((row) => row[col].length)));
  const line = (cells: string[]) => cells.map((cell, col) => cell.padEnd(widths[col])).join('  ').trimEnd();
  return [line(headers), widths.map((w) => '-'.repeat(w)).join('  '), ...rows.map(line)].join('\n');
}

export function renderComparisonTable(results: readonly AgentResult[]): string {
  return renderTable(
    ['Agent', 'Status', 'Time', 'Retries'],
    results.map((r) => [r.agentName, getStatusLabel(r), formatDuration(r.durationSeconds), String(r.retries)]),
  );
}

/** Summary table followed by each agent's (truncated) output or error. */
export function renderComparison(results: readonly AgentResult[], outputLimit = 500): string {
  if (results.length === 0) return 'No agents to compare.';
  const sections = results.map((r) => {
    const body = r.success ? truncateOutput(r, outputLimit) : r.stderr || '(no error output)';
    return `=== ${r.agentName.toUpperCase()} ===\n${body}`;
  });
  return [renderComparisonTable(results), ...sections].join('\n\n');
}

export function renderStatusTable(detected: ReadonlyMap<string, DetectedAgent>, primary: string | null): string {
  if (detected.size === 0) return 'No agents detected.';
  const rows = [...detected.values()].map((agent) => [
    agent.name === primary ? `${agent.name} *` : agent.name,
    agent.displayName,
    agent.provider,
    agent.version,
    agent.binaryPath,
  ]);
  return renderTable(['Agent', 'Name', 'Provider', 'Version', 'Path'], rows);
}
