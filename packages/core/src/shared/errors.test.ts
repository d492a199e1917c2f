import { describe, it, expect } from 'vitest';
import { AgentNotFoundError, NeuronesError } from './errors.js';

describe('AgentNotFoundError', () => {
  it('should keep the bare agent name and list the available agents in the message', () => {
    const err = new AgentNotFoundError('llama', ['claude', 'codex']);

    expect(err).toBeInstanceOf(NeuronesError);
    expect(err.code).toBe('AGENT_NOT_FOUND');
    expect(err.agentName).toBe('llama');
    expect(err.available).toEqual(['claude', 'codex']);
    expect(err.message).toBe('Unknown agent: llama (available: claude, codex)');
  });

  it('should omit the hint when no agents are listed', () => {
    expect(new AgentNotFoundError('llama').message).toBe('Unknown agent: llama');
  });
});
