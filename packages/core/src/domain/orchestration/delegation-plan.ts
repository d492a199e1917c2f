import { PlanParseError } from '../../shared/errors.js';
import { parseJsonLoose } from './json-extract.js';

export type SubtaskPriority = 'high' | 'medium' | 'low';

export interface PlannedSubtask {
  agent: string;
  /** Left as-is from the model; blank or missing prompts are dropped at dispatch. */
  prompt: string | null;
  priority: SubtaskPriority;
}

export interface DelegationPlan {
  delegate: boolean;
  reasoning: string;
  subtasks: PlannedSubtask[];
  selfTask: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPriority(value: unknown): SubtaskPriority {
  if (typeof value !== 'string') return 'medium';
  const lowered = value.trim().toLowerCase();
  return lowered === 'high' || lowered === 'low' ? lowered : 'medium';
}

function toFlag(value: unknown): boolean {
  if (typeof value === 'string') return value.trim().toLowerCase() === 'true';
  return value === true;
}

function toSubtasks(value: unknown): PlannedSubtask[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map((entry) => ({
    agent: typeof entry.agent === 'string' ? entry.agent.trim() : '',
    prompt: typeof entry.prompt === 'string' ? entry.prompt : null,
    priority: toPriority(entry.priority),
  }));
}

/**
 * Read a delegation plan from the primary agent's raw reply.
 *
 * Expected shape:
 * `{"delegate": bool, "reasoning": str, "subtasks": [{agent, prompt, priority}], "self_task": str|null}`
 */
export function parseDelegationPlan(text: string): DelegationPlan {
  const parsed = parseJsonLoose(text);

  if (!isRecord(parsed)) {
    throw new PlanParseError('Delegation plan is not a JSON object', text);
  }
  if (!('delegate' in parsed)) {
    throw new PlanParseError("Delegation plan missing 'delegate' key", text);
  }

  const selfTask = parsed.self_task;
  return {
    delegate: toFlag(parsed.delegate),
    reasoning: typeof parsed.reasoning === 'string' ? parsed.reasoning : '',
    subtasks: toSubtasks(parsed.subtasks),
    selfTask: typeof selfTask === 'string' && selfTask.trim() ? selfTask : null,
  };
}
