import type { RawFinding } from '../../types/verification';
import { ResponseParseError } from '../errors';

const FENCE_LINE = /^\s*```[\w-]*\s*$/;
const INLINE_FENCE = /```(?:json|python|javascript)?/gi;
const TRAILING_COMMA_BEFORE_CLOSE = /,(\s*[\]}])/g;
const OBJECT_BOUNDARY = /}\s*,/g;

export function stripCodeFences(text: string): string {
  return text
    .split('\n')
    .filter((line) => !FENCE_LINE.test(line))
    .join('\n')
    .replace(INLINE_FENCE, '')
    .trim();
}

function isPlainObject(value: unknown): value is RawFinding {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** undefined when the candidate is not valid JSON */
function tryParse(candidate: string): unknown[] | undefined {
  for (const text of [candidate, candidate.replace(TRAILING_COMMA_BEFORE_CLOSE, '$1')]) {
    try {
      const parsed: unknown = JSON.parse(text);
      return Array.isArray(parsed) ? parsed : [];
    } catch {
      continue;
    }
  }
  return undefined;
}

/**
 * Repair candidates for an array that did not parse as-is, most complete first:
 * cut at the last `]`, close right after the text, then close after each complete
 * `},` element boundary scanning backwards.
 */
export function repairCandidates(body: string): string[] {
  const candidates: string[] = [];

  const lastClose = body.lastIndexOf(']');
  if (lastClose > 0) candidates.push(body.slice(0, lastClose + 1));

  const closed = body.replace(/[\s,]+$/, '');
  if (/}$/.test(closed)) candidates.push(`${closed}]`);

  const boundaries = [...body.matchAll(OBJECT_BOUNDARY)];
  for (let i = boundaries.length - 1; i >= 0; i--) {
    const m = boundaries[i];
    const index = m.index ?? -1;
    if (index < 0) continue;
    candidates.push(`${body.slice(0, index + 1)}]`);
  }

  return [...new Set(candidates)];
}

/**
 * Extracts the array of finding records from a raw model response. Recovers the complete
 * prefix of a response that was cut off mid-array; throws ResponseParseError (with the
 * untouched text) only when nothing can be recovered.
 */
export function parseFindingsResponse(raw: string): RawFinding[] {
  const cleaned = stripCodeFences(raw);

  const start = cleaned.indexOf('[');
  if (start === -1) {
    throw new ResponseParseError('Model response does not contain a JSON array', raw);
  }

  const body = cleaned.slice(start).trimEnd().replace(/,\s*\]$/, ']');

  let parsed: unknown[] | undefined;
  if (body.endsWith(']')) {
    parsed = tryParse(body);
  }

  if (parsed === undefined) {
    for (const candidate of repairCandidates(body)) {
      parsed = tryParse(candidate);
      if (parsed !== undefined) {
        console.warn(`[parse-findings] Recovered truncated response (${candidate.length}/${body.length} chars)`);
        break;
      }
    }
  }

  if (parsed === undefined) {
    throw new ResponseParseError(
      'Could not parse the model response as a JSON array; it may be truncated or malformed',
      raw
    );
  }

  return parsed.filter(isPlainObject);
}
