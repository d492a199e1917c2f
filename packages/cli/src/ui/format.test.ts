import { describe, it, expect } from 'vitest';
import { formatDuration, spinnerFrame, statusColor, statusIcon } from './format.js';

describe('formatDuration', () => {
  it('should show tenths of a second under a minute', () => {
    expect(formatDuration(0)).toBe('0.0s');
    expect(formatDuration(4.26)).toBe('4.3s');
  });

  it('should show minutes and padded seconds past a minute', () => {
    expect(formatDuration(65)).toBe('1m 05s');
    expect(formatDuration(125.4)).toBe('2m 05s');
  });
});

describe('status display', () => {
  it('should map statuses to icons and colors', () => {
    expect(statusIcon('success')).toBe('✓');
    expect(statusIcon('retrying')).toBe('↻');
    expect(statusIcon('queued')).toBe('○');
    expect(statusColor('error')).toBe('red');
    expect(statusColor('running')).toBe('cyan');
  });
});

describe('spinnerFrame', () => {
  it('should cycle through the braille frames', () => {
    expect(spinnerFrame(0)).toBe('⠋');
    expect(spinnerFrame(3)).toBe('⠸');
    expect(spinnerFrame(10)).toBe('⠋');
    expect(spinnerFrame(11)).toBe('⠙');
  });
});
