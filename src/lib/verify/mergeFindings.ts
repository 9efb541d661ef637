import type { Finding, FindingSummary } from '../../types/verification';

export const MISSING_ATTACHMENTS_CATEGORY = 'Missing attachments';
export const INSUFFICIENT_EVIDENCE_CATEGORY = 'Insufficient evidence';
export const FORM_CHECK_CATEGORY = 'Form check';

const GATING_CATEGORIES = new Set(
  [MISSING_ATTACHMENTS_CATEGORY, INSUFFICIENT_EVIDENCE_CATEGORY].map((c) => c.toLowerCase())
);

export function isGatingFinding(finding: Finding): boolean {
  return GATING_CATEGORIES.has(finding.category.trim().toLowerCase());
}

/** Moves form-pass indices (relative to the checked document) into the concatenated space. */
export function shiftImageIndices(findings: readonly Finding[], offset: number): Finding[] {
  return findings.map((f) =>
    f.image_index === null ? { ...f } : { ...f, image_index: f.image_index + offset }
  );
}

export function formCheckFailedFinding(): Finding {
  return {
    category: FORM_CHECK_CATEGORY,
    status: 'warning',
    item: 'Execution error',
    evidence: '',
    target: '',
    message: 'The form check could not be run. Only the cross-reference results are shown.',
    box: null,
    image_index: null,
  };
}

export type FormPassResult =
  | { ok: true; findings: Finding[] }
  | { ok: false };

/**
 * Display order: gating findings first (missing attachments, insufficient evidence),
 * then the form check, then the remaining cross-reference findings. Within a group the
 * model's order is kept.
 */
export function mergeFindings(
  formPass: FormPassResult,
  crossFindings: readonly Finding[],
  evidenceCount: number
): Finding[] {
  const formFindings = formPass.ok
    ? shiftImageIndices(formPass.findings, evidenceCount)
    : [formCheckFailedFinding()];

  const gating = crossFindings.filter(isGatingFinding);
  const others = crossFindings.filter((f) => !isGatingFinding(f));

  return [...gating, ...formFindings, ...others];
}

export function summarizeFindings(findings: readonly Finding[]): FindingSummary {
  let errors = 0;
  let warnings = 0;
  for (const f of findings) {
    if (f.status === 'error') errors++;
    else warnings++;
  }
  return { errors, warnings };
}
