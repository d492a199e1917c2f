import type { AgentRunStatus } from '@neurones/core';

/** Seconds as `4.2s`, or `1m 05s` past a minute. */
export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  const rest = Math.round(seconds - minutes * 60);
  return `${minutes}m ${String(rest).padStart(2, '0')}s`;
}

export function statusIcon(status: AgentRunStatus): string {
  switch (status) {
    case 'success':
      return '✓';
    case 'error':
      return '✗';
    case 'running':
      return '▶';
    case 'retrying':
      return '↻';
    default:
      return '○';
  }
}

export function statusColor(status: AgentRunStatus): string {
  switch (status) {
    case 'success':
      return 'green';
    case 'error':
      return 'red';
    case 'running':
      return 'cyan';
    case 'retrying':
      return 'yellow';
    default:
      return 'gray';
  }
}

const SPINNER_FRAMES = '⠋⠙⠹⠸⠼⠴⠦⠧⠇⠏';
export const SPINNER_INTERVAL_MS = 100;

export function spinnerFrame(tick: number): string {
  return SPINNER_FRAMES[tick % SPINNER_FRAMES.length];
}
