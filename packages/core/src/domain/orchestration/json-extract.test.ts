import { describe, it, expect } from 'vitest';
import { extractJsonBlock, parseJsonLoose } from './json-extract.js';

describe('extractJsonBlock', () => {
  it('should prefer a fenced block over surrounding prose', () => {
    const text = 'Here is my plan {not this}:\n```json\n{"delegate": false}\n```\nThanks!';
    expect(JSON.parse(extractJsonBlock(text))).toEqual({ delegate: false });
  });

  it('should accept an unlabeled fence', () => {
    const text = '```\n{"delegate": true, "subtasks": []}\n```';
    expect(JSON.parse(extractJsonBlock(text))).toEqual({ delegate: true, subtasks: [] });
  });

  it('should take the outermost braces from unfenced text', () => {
    const text = 'Sure. {"delegate": true, "nested": {"a": 1}} Done.';
    expect(JSON.parse(extractJsonBlock(text))).toEqual({ delegate: true, nested: { a: 1 } });
  });

  it('should repair trailing commas and single quotes', () => {
    expect(parseJsonLoose("{'delegate': false, 'reasoning': 'simple',}")).toEqual({
      delegate: false,
      reasoning: 'simple',
    });
  });
});
