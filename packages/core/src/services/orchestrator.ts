import type { AgentResult } from '../domain/agent/agent-result.js';
import { parseDelegationPlan, type DelegationPlan, type PlannedSubtask } from '../domain/orchestration/delegation-plan.js';
import { buildAnalysisPrompt, buildSynthesisPrompt } from '../domain/orchestration/prompts.js';
import type { AgentAdapter } from '../ports/agent-adapter.js';
import type { AgentRunner, AgentTask } from '../ports/agent-runner.js';
import type {
  OrchestrationEvents,
  OrchestrationOutcome,
  OrchestrationStage,
} from '../ports/orchestration-events.js';
import { AnalysisError, NoWorkersAvailableError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('orchestrator');

export interface OrchestratorDeps {
  primary: string;
  adapters: ReadonlyMap<string, AgentAdapter>;
  executor: AgentRunner;
  /** Agents detected on this machine; defaults to every configured adapter. */
  availableAgents?: readonly string[];
  /** Caps each worker's timeout during parallel dispatch. */
  parallelTimeoutSeconds?: number;
  events?: Partial<OrchestrationEvents>;
}

/**
 * The brain: asks the primary agent for a delegation plan, fans subtasks out
 * to workers, then has the primary merge everything into one answer.
 */
export class Orchestrator {
  private readonly primary: string;
  private readonly adapters: ReadonlyMap<string, AgentAdapter>;
  private readonly executor: AgentRunner;
  private readonly available: readonly string[];
  private readonly parallelTimeoutSeconds?: number;
  private readonly events: Partial<OrchestrationEvents>;

  constructor(deps: OrchestratorDeps) {
    this.primary = deps.primary;
    this.adapters = deps.adapters;
    this.executor = deps.executor;
    this.available = (deps.availableAgents ?? [...deps.adapters.keys()]).filter((name) => deps.adapters.has(name));
    this.parallelTimeoutSeconds = deps.parallelTimeoutSeconds;
    this.events = deps.events ?? {};
  }

  get primaryIsCoordinatorOnly(): boolean {
    return this.adapters.get(this.primary)?.coordinatorOnly ?? false;
  }

  async run(prompt: string): Promise<string> {
    const outcome = await this.execute(prompt);
    return outcome.output;
  }

  async execute(prompt: string): Promise<OrchestrationOutcome> {
    try {
      const outcome = await this.orchestrate(prompt);
      this.stage('done', outcome.mode === 'direct' ? 'Answered directly by the primary' : 'Synthesis complete');
      this.events.onComplete?.(outcome);
      return outcome;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error('execute: orchestration failed:', message);
      this.events.onError?.(message);
      throw err;
    }
  }

  private async orchestrate(prompt: string): Promise<OrchestrationOutcome> {
    log.info(`orchestrate: ${prompt.slice(0, 100)}`);

    let plan: DelegationPlan;
    try {
      plan = await this.analyze(prompt);
    } catch (err) {
      if (!(err instanceof AnalysisError)) throw err;
      if (this.primaryIsCoordinatorOnly) {
        log.warn(`orchestrate: analysis failed, primary '${this.primary}' is coordinator-only; broadcasting to workers:`, err.message);
        return this.delegate(prompt, null, this.buildWorkerFallbackTasks(prompt));
      }
      log.warn('orchestrate: analysis failed, running directly on primary:', err.message);
      return this.runDirect(prompt, null);
    }

    log.info(`orchestrate: plan delegate=${plan.delegate}, subtasks=${plan.subtasks.length}`);
    this.events.onPlan?.(plan);

    if (!plan.delegate) {
      if (this.primaryIsCoordinatorOnly) {
        log.info(`orchestrate: primary '${this.primary}' is coordinator-only; forcing worker delegation`);
        return this.delegate(prompt, plan, this.buildWorkerFallbackTasks(prompt));
      }
      log.info('orchestrate: no delegation needed, running on primary');
      return this.runDirect(prompt, plan);
    }

    let tasks = this.buildDispatchTasks(plan.subtasks);
    if (tasks.length === 0) {
      if (!this.primaryIsCoordinatorOnly) {
        log.warn('orchestrate: no valid subtasks, running directly on primary');
        return this.runDirect(prompt, plan);
      }
      log.warn('orchestrate: no valid subtasks and primary is coordinator-only; broadcasting to workers');
      tasks = this.buildWorkerFallbackTasks(prompt);
    }

    return this.delegate(prompt, plan, tasks);
  }

  private async analyze(prompt: string): Promise<DelegationPlan> {
    this.stage('analyzing', `${this.primary} is planning the work`);
    const analysisPrompt = buildAnalysisPrompt({
      prompt,
      availableAgents: this.available,
      coordinatorOnlyPrimary: this.primaryIsCoordinatorOnly ? this.primary : null,
    });

    const result = await this.executor.runSingle(this.primary, analysisPrompt, {
      jsonOutput: true,
      onStatus: (status) => this.events.onAgentStatus?.('plan', this.primary, status),
    });
    if (!result.success) {
      throw new AnalysisError(`Primary agent failed during analysis: ${result.stderr}`);
    }
    return parseDelegationPlan(result.output);
  }

  private async runDirect(prompt: string, plan: DelegationPlan | null): Promise<OrchestrationOutcome> {
    this.stage('direct', `${this.primary} is answering directly`);
    const result = await this.executor.runSingle(this.primary, prompt, {
      onStatus: (status) => this.events.onAgentStatus?.('direct', this.primary, status),
    });
    return { mode: 'direct', plan, results: [result], output: result.output };
  }

  private async delegate(prompt: string, plan: DelegationPlan | null, tasks: AgentTask[]): Promise<OrchestrationOutcome> {
    if (tasks.length === 0) {
      throw new NoWorkersAvailableError(this.primary);
    }

    this.stage('delegating', `Dispatching ${tasks.length} subtask(s) in parallel`);
    log.info(`delegate: dispatching ${tasks.length} subtasks:`, tasks.map((t) => t.agent));
    const results = await this.executor.runParallel(tasks, {
      timeoutCapSeconds: this.parallelTimeoutSeconds,
      onStatus: (index, agentName, status) => this.events.onAgentStatus?.(`task-${index}`, agentName, status),
    });

    const selfTask = plan?.selfTask ?? null;
    if (selfTask && !this.primaryIsCoordinatorOnly) {
      log.info('delegate: running primary self-task');
      results.push(
        await this.executor.runSingle(this.primary, selfTask, {
          onStatus: (status) => this.events.onAgentStatus?.('self-task', this.primary, status),
        }),
      );
    } else if (selfTask) {
      log.info(`delegate: ignoring self_task because primary '${this.primary}' is coordinator-only`);
    }

    return { mode: 'delegated', plan, results, output: await this.synthesize(prompt, results) };
  }

  private async synthesize(prompt: string, results: AgentResult[]): Promise<string> {
    this.stage('synthesizing', `${this.primary} is merging ${results.length} result(s)`);
    log.info(`synthesize: merging ${results.length} results`);
    const final = await this.executor.runSingle(this.primary, buildSynthesisPrompt(prompt, results), {
      onStatus: (status) => this.events.onAgentStatus?.('synthesis', this.primary, status),
    });
    if (!final.success) {
      log.warn(`synthesize: primary synthesis did not succeed: ${final.stderr}`);
    }
    return final.output;
  }

  /** The original prompt, unchanged, for every available agent except the primary. */
  private buildWorkerFallbackTasks(prompt: string): AgentTask[] {
    return this.available.filter((name) => name !== this.primary).map((agent) => ({ agent, prompt }));
  }

  private buildDispatchTasks(subtasks: readonly PlannedSubtask[]): AgentTask[] {
    const tasks: AgentTask[] = [];
    for (const subtask of subtasks) {
      if (!subtask.prompt?.trim()) {
        log.warn(`buildDispatchTasks: skipping subtask with empty prompt for agent '${subtask.agent}'`);
        continue;
      }
      if (!this.available.includes(subtask.agent)) {
        log.warn(`buildDispatchTasks: skipping subtask for unavailable agent '${subtask.agent}'`);
        continue;
      }
      if (this.primaryIsCoordinatorOnly && subtask.agent === this.primary) {
        log.warn(`buildDispatchTasks: skipping subtask for coordinator-only primary '${subtask.agent}'`);
        continue;
      }
      tasks.push({ agent: subtask.agent, prompt: subtask.prompt });
    }
    return tasks;
  }

  private stage(stage: OrchestrationStage, summary: string) {
    this.events.onStageChange?.(stage, summary);
  }
}
