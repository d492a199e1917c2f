import React from 'react';
import { Box, Text } from 'ink';
import type { OrchestrationState } from './state.js';
import { OrchestrationView } from './OrchestrationView.js';

interface AppProps {
  state: OrchestrationState;
  primary: string;
}

export function App({ state, primary }: AppProps) {
  return (
    <Box flexDirection="column">
      <Box paddingX={2}>
        <Text bold color="cyan">Neurones</Text>
        <Text color="gray"> · primary: {primary}</Text>
      </Box>
      <OrchestrationView state={state} now={Date.now()} />
    </Box>
  );
}
