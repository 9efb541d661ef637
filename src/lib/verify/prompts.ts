import { readFileSync } from 'node:fs';

export const FORM_CHECK_MAX_OUTPUT_TOKENS = 4096;
export const CROSS_CHECK_MAX_OUTPUT_TOKENS = 8192;

const templateCache = new Map<string, string>();

function loadTemplate(name: string): string {
  const cached = templateCache.get(name);
  if (cached !== undefined) return cached;
  const text = readFileSync(new URL(`../../../templates/${name}`, import.meta.url), 'utf8');
  templateCache.set(name, text);
  return text;
}

export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (whole: string, key: string) =>
    key in values ? String(values[key]) : whole
  );
}

/** Form pass: sees only the checked document, so image_index 0 is its first page. */
export function buildFormCheckPrompt(targetCount: number): string {
  return fillTemplate(loadTemplate('form-check.md'), { target_count: targetCount });
}

export function buildCrossCheckPrompt(referenceCount: number, targetCount: number): string {
  return fillTemplate(loadTemplate('cross-check.md'), {
    reference_count: referenceCount,
    target_count: targetCount,
  });
}
