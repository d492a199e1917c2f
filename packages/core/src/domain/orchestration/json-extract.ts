import { jsonrepair } from 'jsonrepair';
import { PlanParseError } from '../../shared/errors.js';

const FENCE_PATTERN = /```(?:json)?\s*\n?([\s\S]*?)\n?```/;

/**
 * Pull a JSON object out of free-form model output and repair it into valid
 * JSON text. A fenced code block wins over the surrounding prose; inside it
 * (or the whole text when unfenced) the outermost `{...}` span is used.
 *
 * Throws PlanParseError when nothing repairable is found.
 */
export function extractJsonBlock(text: string): string {
  let candidate = text;

  const fence = FENCE_PATTERN.exec(candidate);
  if (fence) {
    candidate = fence[1].trim();
  }

  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start !== -1 && end > start) {
    candidate = candidate.slice(start, end + 1);
  }

  try {
    return jsonrepair(candidate);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PlanParseError(`Could not repair JSON: ${reason}`, text);
  }
}

/** `extractJsonBlock` followed by `JSON.parse`. */
export function parseJsonLoose(text: string): unknown {
  const repaired = extractJsonBlock(text);
  try {
    return JSON.parse(repaired);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PlanParseError(`Invalid JSON after repair: ${reason}`, text);
  }
}
