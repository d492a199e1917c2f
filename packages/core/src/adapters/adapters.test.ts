import { describe, it, expect } from 'vitest';
import type { AdapterSettings } from '../domain/agent/agent-config.js';
import { ClaudeAdapter } from './claude-adapter.js';
import { CodexAdapter } from './codex-adapter.js';
import { GeminiAdapter } from './gemini-adapter.js';
import { getAdapterFactory } from './registry.js';
import { resolveOptions } from './cli-output.js';

function settings(overrides: Partial<AdapterSettings> = {}): AdapterSettings {
  return { binaryPath: '/usr/bin/agent', timeoutSeconds: 300, autoApprove: true, extraArgs: [], ...overrides };
}

describe('ClaudeAdapter.buildCommand', () => {
  it('should build a print-mode command with every option', () => {
    const adapter = new ClaudeAdapter(settings({ binaryPath: 'claude', maxTurns: 15 }));
    expect(
      adapter.buildCommand('explain this', { jsonOutput: true, model: 'opus', systemPrompt: 'be brief' }),
    ).toEqual([
      'claude', '-p', 'explain this',
      '--output-format', 'json',
      '--model', 'opus',
      '--permission-mode', 'dontAsk',
      '--append-system-prompt', 'be brief',
      '--max-turns', '15',
    ]);
  });

  it('should omit the approval flag when auto-approve is off', () => {
    const adapter = new ClaudeAdapter(settings({ binaryPath: 'claude', autoApprove: false }));
    expect(adapter.buildCommand('hi')).toEqual(['claude', '-p', 'hi']);
  });

  it('should let the call-time model win over the default model', () => {
    const adapter = new ClaudeAdapter(settings({ binaryPath: 'claude', defaultModel: 'sonnet' }));
    const command = adapter.buildCommand('hi', { model: 'opus' });
    expect(command.filter((arg) => arg === '--model')).toHaveLength(1);
    expect(command[command.indexOf('--model') + 1]).toBe('opus');
  });

  it('should be coordinator-only', () => {
    expect(new ClaudeAdapter(settings()).coordinatorOnly).toBe(true);
  });
});

describe('GeminiAdapter', () => {
  it('should put the prompt last after the flags and extra args', () => {
    const adapter = new GeminiAdapter(settings({ binaryPath: 'gemini', defaultModel: 'flash', extraArgs: ['--sandbox'] }));
    expect(adapter.buildCommand('search docs', { jsonOutput: true })).toEqual([
      'gemini', '--output-format', 'json', '-m', 'flash', '-y', '--sandbox', 'search docs',
    ]);
  });

  it('should drop punycode deprecation noise from stderr', () => {
    const adapter = new GeminiAdapter(settings());
    const stderr = '(node:123) [DEP0040] DeprecationWarning: The `punycode` module is deprecated.\nreal error';
    expect(adapter.filterStderr(stderr)).toBe('real error');
  });

  it('should return the filtered stderr from parseOutput', () => {
    const adapter = new GeminiAdapter(settings());
    const result = adapter.parseOutput(
      Buffer.from('  answer\n'),
      Buffer.from('Punycode warning\n'),
      0,
    );
    expect(result).toMatchObject({ agentName: 'gemini', output: 'answer', stderr: '', success: true, rateLimited: false });
  });

  it('should not be coordinator-only', () => {
    expect(new GeminiAdapter(settings()).coordinatorOnly).toBe(false);
  });
});

describe('CodexAdapter.buildCommand', () => {
  it('should keep --skip-git-repo-check once and put the prompt last', () => {
    const adapter = new CodexAdapter(
      settings({ binaryPath: 'codex', extraArgs: ['--skip-git-repo-check', '--skip-git-repo-check'] }),
    );
    const command = adapter.buildCommand('write tests', { jsonOutput: true, model: 'o4-mini' });
    expect(command).toEqual([
      'codex', 'exec', '-m', 'o4-mini', '--full-auto', '--json', '--skip-git-repo-check', 'write tests',
    ]);
  });

  it('should omit --full-auto when auto-approve is off', () => {
    const adapter = new CodexAdapter(settings({ binaryPath: 'codex', autoApprove: false }));
    expect(adapter.buildCommand('x')).toEqual(['codex', 'exec', 'x']);
  });
});

describe('parseOutput', () => {
  it('should mark a rate-limited exit as unsuccessful even with exit code 0', () => {
    const adapter = new CodexAdapter(settings());
    const result = adapter.parseOutput(Buffer.from(''), Buffer.from('429 Too Many Requests'), 0);
    expect(result.success).toBe(false);
    expect(result.rateLimited).toBe(true);
  });

  it('should replace invalid UTF-8 instead of throwing', () => {
    const adapter = new ClaudeAdapter(settings());
    const result = adapter.parseOutput(Buffer.from([0x6f, 0x6b, 0xff]), Buffer.alloc(0), 0);
    expect(result.output).toBe('ok\uFFFD');
  });

  it('should fail on a non-zero exit', () => {
    const adapter = new ClaudeAdapter(settings());
    const result = adapter.parseOutput(Buffer.from('partial'), Buffer.from('crashed'), 3);
    expect(result).toMatchObject({ success: false, exitCode: 3, stderr: 'crashed', output: 'partial' });
  });
});

describe('resolveOptions', () => {
  it('should treat non-positive max turns as unset', () => {
    expect(resolveOptions(settings({ maxTurns: 0 }), {}).maxTurns).toBeNull();
  });

  it('should let call-time auto-approve override settings', () => {
    expect(resolveOptions(settings({ autoApprove: true }), { autoApprove: false }).autoApprove).toBe(false);
  });
});

describe('getAdapterFactory', () => {
  it('should return a factory for known agents only', () => {
    expect(getAdapterFactory('gemini')?.(settings()).name).toBe('gemini');
    expect(getAdapterFactory('unknown')).toBeUndefined();
  });
});
