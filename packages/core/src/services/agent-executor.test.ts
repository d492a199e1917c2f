import { describe, it, expect, vi } from 'vitest';
import { getStatusLabel } from '../domain/agent/agent-result.js';
import { GeminiAdapter } from '../adapters/gemini-adapter.js';
import { CodexAdapter } from '../adapters/codex-adapter.js';
import type { AgentAdapter } from '../ports/agent-adapter.js';
import type { AgentRunStatus } from '../ports/agent-runner.js';
import type { ProcessOutput, ProcessRunner, ProcessRunOptions } from '../ports/process-runner.js';
import { ProcessTimeoutError } from '../shared/errors.js';
import { AgentExecutor } from './agent-executor.js';

function output(stdout: string, stderr = '', exitCode = 0): ProcessOutput {
  return { stdout: Buffer.from(stdout), stderr: Buffer.from(stderr), exitCode };
}

function createRunner(
  impl: (command: readonly string[], options: ProcessRunOptions) => Promise<ProcessOutput>,
) {
  const run = vi.fn(impl);
  const runner: ProcessRunner = {
    run,
    async *stream(command) {
      yield `streamed ${command.at(-1)}`;
    },
  };
  return { runner, run };
}

function createAdapters(): Map<string, AgentAdapter> {
  const base = { autoApprove: false, extraArgs: [] };
  return new Map<string, AgentAdapter>([
    ['gemini', new GeminiAdapter({ ...base, binaryPath: 'gemini', timeoutSeconds: 30 })],
    ['codex', new CodexAdapter({ ...base, binaryPath: 'codex', timeoutSeconds: 120 })],
  ]);
}

const retry = { maxRetries: 3, baseDelaySeconds: 1, maxDelaySeconds: 4 };

describe('AgentExecutor.runSingle', () => {
  it('should return a failed result for an unknown agent without spawning', async () => {
    const { runner, run } = createRunner(async () => output('never'));
    const executor = new AgentExecutor({ adapters: createAdapters(), runner, retry });

    const result = await executor.runSingle('nonexistent', 'hi');

    expect(result.success).toBe(false);
    expect(result.stderr).toBe('Unknown agent: nonexistent');
    expect(run).not.toHaveBeenCalled();
  });

  it('should return a successful result with the adapter command and timeout', async () => {
    const { runner, run } = createRunner(async () => output('answer\n'));
    const executor = new AgentExecutor({ adapters: createAdapters(), runner, retry, cwd: '/work' });
    const statuses: AgentRunStatus[] = [];

    const result = await executor.runSingle('gemini', 'question', { onStatus: (s) => statuses.push(s) });

    expect(result).toMatchObject({ agentName: 'gemini', output: 'answer', success: true, retries: 0 });
    expect(run).toHaveBeenCalledWith(['gemini', 'question'], { timeoutMs: 30_000, cwd: '/work' });
    expect(statuses).toEqual(['running', 'success']);
  });

  it('should report a non-zero exit as failure without retrying', async () => {
    const { runner, run } = createRunner(async () => output('', 'bad flag', 2));
    const executor = new AgentExecutor({ adapters: createAdapters(), runner, retry });

    const result = await executor.runSingle('codex', 'x');

    expect(result).toMatchObject({ success: false, exitCode: 2, stderr: 'bad flag', retries: 0 });
    expect(getStatusLabel(result)).toBe('FAILED');
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('should retry rate-limited attempts until one succeeds', async () => {
    const responses = [output('', 'Rate limit exceeded', 1), output('', '429', 1), output('done')];
    const { runner, run } = createRunner(async () => responses.shift() ?? output('extra'));
    const sleep = vi.fn(async (_ms: number) => {});
    const executor = new AgentExecutor({ adapters: createAdapters(), runner, retry, sleep });

    const result = await executor.runSingle('gemini', 'x');

    expect(run).toHaveBeenCalledTimes(3);
    expect(result).toMatchObject({ success: true, output: 'done', retries: 2, rateLimited: false });
    expect(getStatusLabel(result)).toBe('SUCCESS (retried 2x)');
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it('should stop after the retry budget and stay rate limited', async () => {
    const { runner, run } = createRunner(async () => output('', 'Too Many Requests', 1));
    const sleep = vi.fn(async (_ms: number) => {});
    const executor = new AgentExecutor({
      adapters: createAdapters(),
      runner,
      retry: { ...retry, maxRetries: 2 },
      sleep,
    });

    const result = await executor.runSingle('gemini', 'x');

    expect(run).toHaveBeenCalledTimes(3);
    expect(result.retries).toBe(2);
    expect(result.rateLimited).toBe(true);
    expect(getStatusLabel(result)).toBe('RATE_LIMITED');
  });

  it('should cap exponential backoff at the max delay', async () => {
    const { runner } = createRunner(async () => output('', 'quota exceeded', 1));
    const sleep = vi.fn(async (_ms: number) => {});
    const executor = new AgentExecutor({
      adapters: createAdapters(),
      runner,
      retry: { maxRetries: 4, baseDelaySeconds: 1, maxDelaySeconds: 3 },
      sleep,
    });

    await executor.runSingle('gemini', 'x');

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 3000, 3000]);
  });

  it('should honor a retry-after hint, capped at the max delay', async () => {
    const responses = [output('', 'rate limited, retry after 2', 1), output('', 'retry-after: 30', 1), output('ok')];
    const { runner } = createRunner(async () => responses.shift() ?? output('extra'));
    const sleep = vi.fn(async (_ms: number) => {});
    const executor = new AgentExecutor({ adapters: createAdapters(), runner, retry, sleep });

    await executor.runSingle('gemini', 'x');

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
  });

  it('should turn a timeout into a TIMEOUT result without retrying', async () => {
    const { runner, run } = createRunner(async (_command, options) => {
      throw new ProcessTimeoutError(options.timeoutMs / 1000);
    });
    const executor = new AgentExecutor({ adapters: createAdapters(), runner, retry });

    const result = await executor.runSingle('codex', 'x');

    expect(result).toMatchObject({ success: false, exitCode: -1, stderr: 'Agent timed out after 120s' });
    expect(getStatusLabel(result)).toBe('TIMEOUT');
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('should apply the timeout cap when it is lower than the adapter timeout', async () => {
    const { runner, run } = createRunner(async () => output('ok'));
    const executor = new AgentExecutor({ adapters: createAdapters(), runner, retry });

    await executor.runSingle('codex', 'x', { timeoutCapSeconds: 45 });
    await executor.runSingle('gemini', 'x', { timeoutCapSeconds: 45 });

    expect(run.mock.calls.map(([, options]) => options.timeoutMs)).toEqual([45_000, 30_000]);
  });

  it('should ignore a non-positive timeout cap', async () => {
    const { runner, run } = createRunner(async () => output('ok'));
    const executor = new AgentExecutor({ adapters: createAdapters(), runner, retry });

    await executor.runSingle('gemini', 'x', { timeoutCapSeconds: 0 });

    expect(run.mock.calls.map(([, options]) => options.timeoutMs)).toEqual([30_000]);
  });

  it('should turn a spawn error into a failed result', async () => {
    const { runner } = createRunner(async () => {
      throw new Error('spawn codex ENOENT');
    });
    const executor = new AgentExecutor({ adapters: createAdapters(), runner, retry });

    const result = await executor.runSingle('codex', 'x');

    expect(result).toMatchObject({ success: false, exitCode: -1, stderr: 'spawn codex ENOENT' });
  });
});

describe('AgentExecutor.runParallel', () => {
  it('should keep input order and report per-task status', async () => {
    const { runner } = createRunner(async (command) => {
      if (command[0] === 'codex') throw new Error('codex exploded');
      await new Promise((resolve) => setTimeout(resolve, 5));
      return output(`gemini says ${command.at(-1)}`);
    });
    const executor = new AgentExecutor({ adapters: createAdapters(), runner, retry });
    const events: string[] = [];

    const results = await executor.runParallel(
      [
        { agent: 'gemini', prompt: 'one' },
        { agent: 'codex', prompt: 'two' },
        { agent: 'missing', prompt: 'three' },
      ],
      { onStatus: (index, agent, status) => events.push(`${index}:${agent}:${status}`) },
    );

    expect(results.map((r) => [r.agentName, r.success])).toEqual([
      ['gemini', true],
      ['codex', false],
      ['missing', false],
    ]);
    expect(results[0].output).toBe('gemini says one');
    expect(results[1].stderr).toBe('codex exploded');
    expect(events.slice(0, 3)).toEqual(['0:gemini:queued', '1:codex:queued', '2:missing:queued']);
    expect(events).toContain('0:gemini:success');
    expect(events).toContain('1:codex:error');
  });

  it('should return an empty list for no tasks', async () => {
    const { runner } = createRunner(async () => output('x'));
    const executor = new AgentExecutor({ adapters: createAdapters(), runner, retry });
    expect(await executor.runParallel([])).toEqual([]);
  });
});

describe('AgentExecutor.stream', () => {
  it('should yield lines from the runner', async () => {
    const { runner } = createRunner(async () => output('x'));
    const executor = new AgentExecutor({ adapters: createAdapters(), runner, retry });
    const lines: string[] = [];
    for await (const line of executor.stream('gemini', 'hello')) lines.push(line);
    expect(lines).toEqual(['streamed hello']);
  });
});
