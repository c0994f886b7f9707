const NOT_APPLICABLE_SENTINELS: ReadonlySet<string> = new Set([
  'n/a',
  'na',
  'not stated',
  '-',
  '—',
  '',
]);

/**
 * Canonical form used for case-insensitive text equality: NFKC, trimmed,
 * internal whitespace collapsed to one space, lower-cased.
 */
export function normalizeText(input: string): string {
  if (!input) return '';

  return input.normalize('NFKC').trim().replace(/\s+/g, ' ').toLowerCase();
}

export function isNotApplicable(input: string): boolean {
  return NOT_APPLICABLE_SENTINELS.has(normalizeText(input));
}

/**
 * Formulas are case-sensitive (Co vs CO), so only spacing is normalized.
 */
export function normalizeFormula(input: string): string {
  if (!input) return '';

  return input.normalize('NFKC').replace(/\s+/g, '');
}
