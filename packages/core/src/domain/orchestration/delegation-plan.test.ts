import { describe, it, expect } from 'vitest';
import { PlanParseError } from '../../shared/errors.js';
import { parseDelegationPlan } from './delegation-plan.js';

describe('parseDelegationPlan', () => {
  it('should parse a full plan', () => {
    const plan = parseDelegationPlan(
      JSON.stringify({
        delegate: true,
        reasoning: 'needs research and code',
        subtasks: [
          { agent: 'gemini', prompt: 'find the docs', priority: 'high' },
          { agent: 'codex', prompt: 'write the code' },
        ],
        self_task: 'review the result',
      }),
    );
    expect(plan).toEqual({
      delegate: true,
      reasoning: 'needs research and code',
      subtasks: [
        { agent: 'gemini', prompt: 'find the docs', priority: 'high' },
        { agent: 'codex', prompt: 'write the code', priority: 'medium' },
      ],
      selfTask: 'review the result',
    });
  });

  it('should accept "true" as a string flag', () => {
    expect(parseDelegationPlan('{"delegate": "true", "subtasks": []}').delegate).toBe(true);
  });

  it('should keep missing prompts as null for dispatch to drop', () => {
    const plan = parseDelegationPlan('{"delegate": true, "subtasks": [{"agent": "codex"}]}');
    expect(plan.subtasks).toEqual([{ agent: 'codex', prompt: null, priority: 'medium' }]);
  });

  it('should treat a blank self_task as none', () => {
    expect(parseDelegationPlan('{"delegate": false, "self_task": "  "}').selfTask).toBeNull();
  });

  it('should reject a plan without the delegate key', () => {
    expect(() => parseDelegationPlan('{"reasoning": "no decision"}')).toThrow(PlanParseError);
  });

  it('should reject a JSON array', () => {
    expect(() => parseDelegationPlan('[1, 2, 3]')).toThrow("Delegation plan is not a JSON object");
  });

  it('should raise PlanParseError for prose with no JSON object', () => {
    expect(() => parseDelegationPlan('Not valid JSON at all!!!')).toThrow(PlanParseError);
  });
});
