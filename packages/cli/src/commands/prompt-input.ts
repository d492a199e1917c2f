import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/** Prompt from `--file` (`-` for stdin) or the joined positional words; null when neither is given. */
export function readPromptInput(parts: readonly string[], file?: string): string | null {
  if (file) {
    const text = file === '-' ? readFileSync(0, 'utf-8') : readFileSync(resolve(file), 'utf-8');
    return text.trim() || null;
  }
  const joined = parts.join(' ').trim();
  return joined || null;
}

export function parseAgentList(value?: string): string[] | undefined {
  if (!value) return undefined;
  const names = value.split(',').map((s) => s.trim()).filter(Boolean);
  return names.length > 0 ? names : undefined;
}
