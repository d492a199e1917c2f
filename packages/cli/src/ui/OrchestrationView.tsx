import React from 'react';
import { Box, Text } from 'ink';
import type { OrchestrationState } from './state.js';
import { StageIndicator } from './components/StageIndicator.js';
import { AgentProgress } from './components/AgentProgress.js';
import { SynthesisView } from './components/SynthesisView.js';

interface OrchestrationViewProps {
  state: OrchestrationState;
  now: number;
}

export function OrchestrationView({ state, now }: OrchestrationViewProps) {
  const agents = Array.from(state.agents.values());

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <StageIndicator stage={state.stage} summary={state.stageSummary} />

      {state.plan?.reasoning && (
        <Box marginBottom={1}>
          <Text color="gray">Plan: {state.plan.reasoning}</Text>
        </Box>
      )}

      {agents.length > 0 && (
        <Box flexDirection="column" marginBottom={1}>
          {agents.map((agent) => (
            <AgentProgress
              key={agent.key}
              label={`${agent.name} [${agent.key}]`}
              status={agent.status}
              retries={agent.retries}
              elapsedSeconds={
                agent.startedAt !== undefined ? ((agent.finishedAt ?? now) - agent.startedAt) / 1000 : undefined
              }
            />
          ))}
        </Box>
      )}

      {state.outcome && (
        <SynthesisView
          title={state.outcome.mode === 'delegated' ? 'SYNTHESIS' : 'ANSWER'}
          text={state.outcome.output || 'No output.'}
        />
      )}

      {state.error && (
        <Box marginTop={1}>
          <Text color="red" bold>Error: {state.error}</Text>
        </Box>
      )}
    </Box>
  );
}
