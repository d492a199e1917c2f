import React, { useMemo } from 'react';
import { Text, Box } from 'ink';
import { renderMarkdown } from '../markdown.js';

interface SynthesisViewProps {
  title: string;
  text: string;
}

export function SynthesisView({ title, text }: SynthesisViewProps) {
  const rendered = useMemo(() => renderMarkdown(text), [text]);

  return (
    <Box flexDirection="column" marginY={1}>
      <Text bold color="green">{'═'.repeat(60)}</Text>
      <Text bold color="green">  {title}</Text>
      <Text bold color="green">{'═'.repeat(60)}</Text>
      <Box marginTop={1}>
        <Text>{rendered}</Text>
      </Box>
    </Box>
  );
}
