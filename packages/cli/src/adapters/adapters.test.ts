import { describe, it, expect, vi } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { createCallbackEventBridge } from './callback-event-bridge.js';
import { getConfigDir } from './xdg-paths.js';

describe('getConfigDir', () => {
  it('should honor XDG_CONFIG_HOME', () => {
    expect(getConfigDir({ XDG_CONFIG_HOME: '/tmp/xdg' })).toBe(join('/tmp/xdg', 'neurones'));
  });

  it('should fall back to ~/.config', () => {
    expect(getConfigDir({})).toBe(join(homedir(), '.config', 'neurones'));
  });
});

describe('createCallbackEventBridge', () => {
  it('should forward to the handlers that were given and ignore the rest', () => {
    const onAgentStatus = vi.fn();
    const events = createCallbackEventBridge({ onAgentStatus });

    events.onAgentStatus('task-1', 'codex', 'running');
    events.onStageChange('analyzing', 'planning');

    expect(onAgentStatus).toHaveBeenCalledWith('task-1', 'codex', 'running');
  });
});
