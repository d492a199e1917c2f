import React from 'react';
import { Text, Box } from 'ink';
import type { AgentRunStatus } from '@neurones/core';
import { formatDuration, statusColor, statusIcon } from '../format.js';

interface AgentProgressProps {
  label: string;
  status: AgentRunStatus;
  elapsedSeconds?: number;
  retries: number;
}

export function AgentProgress({ label, status, elapsedSeconds, retries }: AgentProgressProps) {
  const color = statusColor(status);
  const elapsedStr = elapsedSeconds !== undefined ? ` (${formatDuration(elapsedSeconds)})` : '';

  return (
    <Box>
      <Text color={color}>{statusIcon(status)} </Text>
      <Text>{label.padEnd(24)}</Text>
      <Text color={color}>{status}{elapsedStr}</Text>
      {retries > 0 && <Text color="yellow"> retried {retries}x</Text>}
    </Box>
  );
}
