import type { Finding, FindingStatus, NormalizedBox, RawFinding } from '../../types/verification';

const VALID_STATUSES: ReadonlySet<string> = new Set<FindingStatus>(['error', 'warning', 'suggestion']);

function isFindingStatus(value: string): value is FindingStatus {
  return VALID_STATUSES.has(value);
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return NaN;
}

/**
 * Coerces whatever the model put in a box field into [ymin, xmin, ymax, xmax].
 * Accepts an array of numbers (or numeric strings) and its JSON-encoded string form.
 * Anything else is null.
 */
export function normalizeBox(value: unknown): NormalizedBox | null {
  if (value === null || value === undefined) return null;

  let candidate: unknown = value;
  if (typeof candidate === 'string') {
    try {
      candidate = JSON.parse(candidate.trim());
    } catch {
      return null;
    }
  }

  if (!Array.isArray(candidate) || candidate.length !== 4) return null;

  const nums = candidate.map(toNumber);
  if (!nums.every(Number.isFinite)) return null;

  return [nums[0], nums[1], nums[2], nums[3]];
}

export function normalizeImageIndex(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) return null;
  return value;
}

export function normalizeStatus(value: unknown): FindingStatus {
  if (typeof value === 'string') {
    const s = value.trim().toLowerCase();
    if (isFindingStatus(s)) return s;
  }
  return 'warning';
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

export function toFinding(raw: RawFinding): Finding {
  return {
    category: toText(raw.category),
    status: normalizeStatus(raw.status),
    item: toText(raw.item),
    evidence: toText(raw.evidence),
    target: toText(raw.target),
    message: toText(raw.message),
    // older prompts used the "box_2d" key
    box: normalizeBox(raw.box !== undefined ? raw.box : raw.box_2d),
    image_index: normalizeImageIndex(raw.image_index),
  };
}

export function toFindings(raws: readonly RawFinding[]): Finding[] {
  return raws.map(toFinding);
}
