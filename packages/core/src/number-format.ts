/**
 * Compact magnitude rendering for resource amounts. Values below one
 * thousand print as integers; larger values print a two-decimal mantissa in
 * engineering notation followed by a magnitude suffix.
 */

const NAMED_SUFFIXES: readonly string[] = Object.freeze(['K', 'M', 'B', 'T', 'Q']);
const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

/**
 * Letter suffixes start at two letters so they never read like the named
 * ones: the first group past the table is `aa`.
 */
const LETTER_SUFFIX_OFFSET = ALPHABET.length;

/**
 * Bijective base-26 column label: 0 → `a`, 25 → `z`, 26 → `aa`, 27 → `ab`.
 */
export function columnLabel(index: number): string {
  if (!Number.isInteger(index) || index < 0) {
    return '';
  }

  let remaining = index;
  let label = '';
  for (;;) {
    label = ALPHABET.charAt(remaining % ALPHABET.length) + label;
    remaining = Math.floor(remaining / ALPHABET.length) - 1;
    if (remaining < 0) {
      return label;
    }
  }
}

/**
 * Suffix for an engineering group, where group `g` covers `10^(3g)`.
 * Group 0 has no suffix, groups 1-5 use the named table and later groups
 * continue with letter pairs (`aa`, `ab`, ...).
 */
export function numberSuffix(group: number): string {
  if (!Number.isInteger(group) || group <= 0) {
    return '';
  }
  if (group <= NAMED_SUFFIXES.length) {
    return NAMED_SUFFIXES[group - 1] ?? '';
  }
  return columnLabel(group - NAMED_SUFFIXES.length - 1 + LETTER_SUFFIX_OFFSET);
}

export function formatNumber(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? '+∞' : '-∞';
  }

  const magnitude = Math.abs(value);
  if (magnitude < 1e3) {
    const rounded = value.toFixed(0);
    return rounded === '-0' ? '0' : rounded;
  }

  const sign = value < 0 ? '-' : '';
  const exponent = Math.floor(Math.log10(magnitude));
  let group = Math.floor(exponent / 3);
  let mantissa = magnitude / Math.pow(10, group * 3);

  // Float error around exact powers of ten can land the mantissa just
  // outside [1, 1000) or round it up to 1000.00.
  if (mantissa < 1) {
    group -= 1;
    mantissa *= 1e3;
  }
  if (Number(mantissa.toFixed(2)) >= 1e3) {
    group += 1;
    mantissa /= 1e3;
  }

  return `${sign}${mantissa.toFixed(2)}${numberSuffix(group)}`;
}

export function describeNumber(value: number): string {
  return `<Number value=${String(value)} display=${formatNumber(value)}>`;
}
