import type { AgentResult } from '../domain/agent/agent-result.js';
import type { DelegationPlan } from '../domain/orchestration/delegation-plan.js';
import type { AgentRunStatus } from './agent-runner.js';

export type OrchestrationStage = 'analyzing' | 'delegating' | 'direct' | 'synthesizing' | 'done';

export type OrchestrationMode = 'direct' | 'delegated';

export interface OrchestrationOutcome {
  mode: OrchestrationMode;
  /** Null when analysis failed and a fallback ran instead. */
  plan: DelegationPlan | null;
  /** Worker results plus the primary's self-task result, in dispatch order. */
  results: AgentResult[];
  output: string;
}

export interface OrchestrationEvents {
  onStageChange(stage: OrchestrationStage, summary: string): void;
  onPlan(plan: DelegationPlan): void;
  onAgentStatus(taskKey: string, agentName: string, status: AgentRunStatus): void;
  onComplete(outcome: OrchestrationOutcome): void;
  onError(error: string): void;
}
