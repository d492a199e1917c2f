import React, { useEffect, useState } from 'react';
import { Text } from 'ink';
import { formatDuration, spinnerFrame, SPINNER_INTERVAL_MS } from '../format.js';

interface SpinnerProps {
  label: string;
  color?: string;
}

/** Animated frame, label and time spent since mount. */
export function Spinner({ label, color = 'cyan' }: SpinnerProps) {
  const [tick, setTick] = useState(0);

  useEffect(() => {
    const timer = setInterval(() => setTick((value) => value + 1), SPINNER_INTERVAL_MS);
    return () => clearInterval(timer);
  }, []);

  const elapsed = (tick * SPINNER_INTERVAL_MS) / 1000;
  return (
    <Text>
      <Text color={color}>{spinnerFrame(tick)}</Text>
      <Text> {label}</Text>
      <Text color="gray"> ({formatDuration(elapsed)})</Text>
    </Text>
  );
}
