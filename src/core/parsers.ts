import { ExtractionParseError } from '../tools/errors.js';
import type { ToolArgs } from '../tools/types.js';

const FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses model output that should hold one JSON value. Tolerates a markdown
 * fence and prose around a single object.
 */
export function extractJsonValue(text: string): unknown | undefined {
  const body = (FENCE.exec(text)?.[1] ?? text).trim();
  try {
    return JSON.parse(body);
  } catch {
    const start = body.indexOf('{');
    const end = body.lastIndexOf('}');
    if (start === -1 || end <= start) return undefined;
    try {
      return JSON.parse(body.slice(start, end + 1));
    } catch {
      return undefined;
    }
  }
}

/**
 * Turns model output into a candidate argument mapping for a tool with the
 * given field names. `null` and blank values count as "not stated" and are
 * dropped.
 */
export function parseCandidate(text: string, fields: readonly string[]): ToolArgs {
  const value = extractJsonValue(text);
  if (value === undefined) throw new ExtractionParseError('no JSON object found', text);
  if (!isRecord(value)) throw new ExtractionParseError('JSON value is not an object', text);

  const allowed = new Set(fields);
  const unexpected = Object.keys(value).filter((k) => !allowed.has(k));
  if (unexpected.length > 0) {
    throw new ExtractionParseError(`unexpected fields: ${unexpected.join(', ')}`, text);
  }

  const out: ToolArgs = {};
  for (const [key, v] of Object.entries(value)) {
    if (v === null || v === undefined) continue;
    if (typeof v === 'string' && !v.trim()) continue;
    out[key] = v;
  }
  return out;
}
