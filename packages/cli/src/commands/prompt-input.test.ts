import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseAgentList, readPromptInput } from './prompt-input.js';

describe('readPromptInput', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'neurones-prompt-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should join positional words', () => {
    expect(readPromptInput(['explain', 'closures'])).toBe('explain closures');
  });

  it('should return null when nothing was given', () => {
    expect(readPromptInput([])).toBeNull();
    expect(readPromptInput(['  '])).toBeNull();
  });

  it('should read and trim a prompt file', async () => {
    const file = join(dir, 'task.md');
    await writeFile(file, '\nRefactor the parser\n', 'utf-8');
    expect(readPromptInput(['ignored'], file)).toBe('Refactor the parser');
  });
});

describe('parseAgentList', () => {
  it('should split and trim names', () => {
    expect(parseAgentList('claude, codex,')).toEqual(['claude', 'codex']);
  });

  it('should treat an empty list as unset', () => {
    expect(parseAgentList(undefined)).toBeUndefined();
    expect(parseAgentList(' , ')).toBeUndefined();
  });
});
