import type {
  AgentRunStatus,
  DelegationPlan,
  OrchestrationEvents,
  OrchestrationOutcome,
  OrchestrationStage,
} from '@neurones/core';

export type EventHandler = {
  onStageChange?: (stage: OrchestrationStage, summary: string) => void;
  onPlan?: (plan: DelegationPlan) => void;
  onAgentStatus?: (taskKey: string, agentName: string, status: AgentRunStatus) => void;
  onComplete?: (outcome: OrchestrationOutcome) => void;
  onError?: (error: string) => void;
};

export function createCallbackEventBridge(handlers: EventHandler): OrchestrationEvents {
  return {
    onStageChange: (stage, summary) => handlers.onStageChange?.(stage, summary),
    onPlan: (plan) => handlers.onPlan?.(plan),
    onAgentStatus: (taskKey, agentName, status) => handlers.onAgentStatus?.(taskKey, agentName, status),
    onComplete: (outcome) => handlers.onComplete?.(outcome),
    onError: (error) => handlers.onError?.(error),
  };
}
