import { performance } from 'node:perf_hooks';
import type { CommandOptions } from '../domain/agent/agent-config.js';
import { createAgentResult, resultFromError, type AgentResult } from '../domain/agent/agent-result.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../domain/config/app-config.js';
import type { AgentAdapter } from '../ports/agent-adapter.js';
import type { AgentRunner, AgentTask, ParallelRunOptions, RunOptions } from '../ports/agent-runner.js';
import type { ProcessRunner } from '../ports/process-runner.js';
import { AgentNotFoundError, ProcessTimeoutError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('agent-executor');

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface AgentExecutorDeps {
  adapters: ReadonlyMap<string, AgentAdapter>;
  runner: ProcessRunner;
  retry?: RetryPolicy;
  cwd?: string;
  sleep?: Sleep;
}

function elapsedSeconds(since: number): number {
  return (performance.now() - since) / 1000;
}

/**
 * Runs agent CLIs as child processes. Rate-limited attempts are retried with
 * the server's retry-after hint or exponential backoff; everything else
 * (non-zero exit, spawn failure, timeout) comes back as a failed result.
 */
export class AgentExecutor implements AgentRunner {
  private readonly adapters: ReadonlyMap<string, AgentAdapter>;
  private readonly runner: ProcessRunner;
  private readonly retry: RetryPolicy;
  private readonly cwd?: string;
  private readonly sleep: Sleep;

  constructor(deps: AgentExecutorDeps) {
    this.adapters = deps.adapters;
    this.runner = deps.runner;
    this.retry = deps.retry ?? DEFAULT_RETRY_POLICY;
    this.cwd = deps.cwd;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async runSingle(agentName: string, prompt: string, options: RunOptions = {}): Promise<AgentResult> {
    const adapter = this.adapters.get(agentName);
    if (!adapter) {
      log.warn(`runSingle: ${agentName} is not a configured agent`);
      return resultFromError(agentName, new AgentNotFoundError(agentName));
    }

    const { timeoutCapSeconds, onStatus, ...commandOptions } = options;
    const command = adapter.buildCommand(prompt, commandOptions);
    const timeoutSeconds =
      timeoutCapSeconds !== undefined && timeoutCapSeconds > 0 ? Math.min(adapter.settings.timeoutSeconds, timeoutCapSeconds) : adapter.settings.timeoutSeconds;
    log.info(`runSingle: ${agentName}: ${command.slice(0, 5).join(' ')}...`);

    const startedAt = performance.now();
    onStatus?.('running');
    let result = await this.executeOnce(adapter, command, timeoutSeconds);
    let attempt = 0;

    while (result.rateLimited && attempt < this.retry.maxRetries) {
      attempt++;
      const delay = this.computeDelay(attempt, result, adapter);
      log.warn(`runSingle: ${agentName} rate limited (attempt ${attempt}/${this.retry.maxRetries}), retrying in ${delay.toFixed(1)}s`);
      onStatus?.('retrying');
      await this.sleep(delay * 1000);
      onStatus?.('running');
      result = await this.executeOnce(adapter, command, timeoutSeconds);
    }

    const final: AgentResult = { ...result, retries: attempt, durationSeconds: elapsedSeconds(startedAt) };
    if (final.rateLimited) {
      log.error(`runSingle: ${agentName} still rate limited after ${attempt} retries (${final.durationSeconds.toFixed(1)}s total)`);
    } else if (attempt > 0) {
      log.info(`runSingle: ${agentName} finished after ${attempt} retries (${final.durationSeconds.toFixed(1)}s total)`);
    }
    onStatus?.(final.success ? 'success' : 'error');
    return final;
  }

  async runParallel(tasks: readonly AgentTask[], options: ParallelRunOptions = {}): Promise<AgentResult[]> {
    log.info(`runParallel: starting ${tasks.length} tasks`);
    tasks.forEach((task, index) => options.onStatus?.(index, task.agent, 'queued'));

    const settled = await Promise.allSettled(
      tasks.map((task, index) =>
        this.runSingle(task.agent, task.prompt, {
          timeoutCapSeconds: options.timeoutCapSeconds,
          onStatus: (status) => options.onStatus?.(index, task.agent, status),
        }),
      ),
    );

    const results = settled.map((outcome, index) => {
      if (outcome.status === 'fulfilled') return outcome.value;
      const agentName = tasks[index].agent;
      log.error(`runParallel: task ${index} (${agentName}) failed unexpectedly:`, outcome.reason);
      options.onStatus?.(index, agentName, 'error');
      return resultFromError(agentName, outcome.reason);
    });

    const successCount = results.filter((r) => r.success).length;
    log.info(`runParallel: completed - ${successCount}/${results.length} succeeded`);
    return results;
  }

  /**
   * Live line-by-line output for display. A streamed run is never retried
   * and produces no AgentResult.
   */
  async *stream(agentName: string, prompt: string, options: CommandOptions = {}): AsyncIterable<string> {
    const adapter = this.adapters.get(agentName);
    if (!adapter) {
      throw new AgentNotFoundError(agentName);
    }
    yield* this.runner.stream(adapter.buildCommand(prompt, options), { cwd: this.cwd });
  }

  private computeDelay(attempt: number, previous: AgentResult, adapter: AgentAdapter): number {
    const serverDelay = adapter.extractRetryAfter(previous.output, previous.stderr);
    if (serverDelay !== null) {
      return Math.min(serverDelay, this.retry.maxDelaySeconds);
    }
    const backoff = this.retry.baseDelaySeconds * 2 ** (attempt - 1);
    return Math.min(backoff, this.retry.maxDelaySeconds);
  }

  private async executeOnce(adapter: AgentAdapter, command: string[], timeoutSeconds: number): Promise<AgentResult> {
    const startedAt = performance.now();
    try {
      const { stdout, stderr, exitCode } = await this.runner.run(command, {
        timeoutMs: timeoutSeconds * 1000,
        cwd: this.cwd,
      });
      const result = { ...adapter.parseOutput(stdout, stderr, exitCode), durationSeconds: elapsedSeconds(startedAt) };
      log.info(
        `executeOnce: ${adapter.name} completed in ${result.durationSeconds.toFixed(1)}s ` +
          `(exit=${exitCode}, output=${result.output.length} chars, rate_limited=${result.rateLimited})`,
      );
      return result;
    } catch (err) {
      const durationSeconds = elapsedSeconds(startedAt);
      if (err instanceof ProcessTimeoutError) {
        log.warn(`executeOnce: ${adapter.name} timed out after ${durationSeconds.toFixed(1)}s`);
        return createAgentResult({
          agentName: adapter.name,
          output: '',
          success: false,
          exitCode: -1,
          stderr: `Agent timed out after ${timeoutSeconds}s`,
          durationSeconds,
        });
      }
      log.error(`executeOnce: ${adapter.name} failed:`, err instanceof Error ? err.message : String(err));
      return { ...resultFromError(adapter.name, err), durationSeconds };
    }
  }
}
