import React from 'react';
import { Text, Box } from 'ink';
import type { OrchestrationStage } from '@neurones/core';
import { Spinner } from './Spinner.js';

interface StageIndicatorProps {
  stage: OrchestrationStage | null;
  summary: string;
}

type Step = { label: string; stages: OrchestrationStage[] };

const STEPS: Step[] = [
  { label: 'Planning', stages: ['analyzing'] },
  { label: 'Working', stages: ['delegating', 'direct'] },
  { label: 'Synthesizing', stages: ['synthesizing'] },
];

function stepIndex(stage: OrchestrationStage | null): number {
  if (stage === null) return -1;
  if (stage === 'done') return STEPS.length;
  return STEPS.findIndex((step) => step.stages.includes(stage));
}

export function StageIndicator({ stage, summary }: StageIndicatorProps) {
  const current = stepIndex(stage);

  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box>
        {STEPS.map((step, index) => {
          const isActive = index === current;
          const isDone = index < current;
          const icon = isDone ? '✓' : isActive ? '▶' : '○';
          const color = isDone ? 'green' : isActive ? 'cyan' : 'gray';

          return (
            <Box key={step.label} marginRight={2}>
              <Text color={color} bold={isActive}>
                {icon} {step.label}
              </Text>
            </Box>
          );
        })}
      </Box>
      {stage !== null && stage !== 'done' && (
        <Box marginTop={1}>
          <Spinner key={stage} label={summary} color={stage === 'synthesizing' ? 'magenta' : 'cyan'} />
        </Box>
      )}
    </Box>
  );
}
