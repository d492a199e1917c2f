import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ProcessOutput, ProcessRunner } from '../ports/process-runner.js';
import { AgentDetector } from './agent-detector.js';

function createRunner(reply: (binary: string) => ProcessOutput) {
  const run = vi.fn(async (command: readonly string[]) => reply(command[0]));
  const runner: ProcessRunner = {
    run,
    async *stream() {},
  };
  return { runner, run };
}

describe('AgentDetector', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'neurones-path-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function installFake(name: string, mode = 0o755) {
    const path = join(dir, name);
    await writeFile(path, '#!/bin/sh\n', 'utf-8');
    await chmod(path, mode);
    return path;
  }

  it('should find executables on PATH and probe their version', async () => {
    const claudePath = await installFake('claude');
    const { runner, run } = createRunner(() => ({
      stdout: Buffer.from('1.0.42 (Claude Code)\n'),
      stderr: Buffer.alloc(0),
      exitCode: 0,
    }));
    const detector = new AgentDetector({ runner, pathEnv: dir });

    const detected = await detector.detectAll();

    expect([...detected.keys()]).toEqual(['claude']);
    expect(detected.get('claude')).toEqual({
      name: 'claude',
      binaryPath: claudePath,
      version: '1.0.42',
      displayName: 'Claude Code',
      provider: 'Anthropic',
      available: true,
    });
    expect(run).toHaveBeenCalledWith([claudePath, '--version'], { timeoutMs: 10_000 });
  });

  it('should skip files that are not executable', async () => {
    await installFake('gemini', 0o644);
    const { runner } = createRunner(() => ({ stdout: Buffer.alloc(0), stderr: Buffer.alloc(0), exitCode: 0 }));
    const detector = new AgentDetector({ runner, pathEnv: dir });

    expect(await detector.which('gemini')).toBeNull();
    expect((await detector.detectAll()).size).toBe(0);
  });

  it('should report an unknown version when the probe fails', async () => {
    await installFake('codex');
    const runner: ProcessRunner = {
      run: vi.fn(async () => {
        throw new Error('spawn failed');
      }),
      async *stream() {},
    };
    const detector = new AgentDetector({ runner, pathEnv: dir });

    expect((await detector.detectAll()).get('codex')?.version).toBe('unknown');
  });
});
