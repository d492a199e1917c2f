import type {
  AgentRunStatus,
  DelegationPlan,
  OrchestrationOutcome,
  OrchestrationStage,
} from '@neurones/core';

export interface AgentState {
  key: string;
  name: string;
  status: AgentRunStatus;
  retries: number;
  startedAt?: number;
  finishedAt?: number;
}

export interface OrchestrationState {
  stage: OrchestrationStage | null;
  stageSummary: string;
  plan: DelegationPlan | null;
  agents: Map<string, AgentState>;
  outcome: OrchestrationOutcome | null;
  error: string | null;
  done: boolean;
}

export type Action =
  | { type: 'STAGE_CHANGE'; stage: OrchestrationStage; summary: string }
  | { type: 'PLAN'; plan: DelegationPlan }
  | { type: 'AGENT_STATUS'; key: string; name: string; status: AgentRunStatus; at: number }
  | { type: 'COMPLETE'; outcome: OrchestrationOutcome }
  | { type: 'ERROR'; error: string };

export const initialState: OrchestrationState = {
  stage: null,
  stageSummary: '',
  plan: null,
  agents: new Map(),
  outcome: null,
  error: null,
  done: false,
};

function isFinished(status: AgentRunStatus): boolean {
  return status === 'success' || status === 'error';
}

export function orchestrationReducer(state: OrchestrationState, action: Action): OrchestrationState {
  switch (action.type) {
    case 'STAGE_CHANGE':
      return { ...state, stage: action.stage, stageSummary: action.summary };

    case 'PLAN':
      return { ...state, plan: action.plan };

    case 'AGENT_STATUS': {
      const agents = new Map(state.agents);
      const existing = agents.get(action.key);
      agents.set(action.key, {
        key: action.key,
        name: action.name,
        status: action.status,
        retries: (existing?.retries ?? 0) + (action.status === 'retrying' ? 1 : 0),
        // first 'running' starts the clock; retries keep it
        startedAt: existing?.startedAt ?? (action.status === 'running' ? action.at : undefined),
        finishedAt: isFinished(action.status) ? action.at : undefined,
      });
      return { ...state, agents };
    }

    case 'COMPLETE':
      return { ...state, outcome: action.outcome, done: true };

    case 'ERROR':
      return { ...state, error: action.error, done: true };

    default:
      return state;
  }
}
