// engine/normalizeFields.ts
// Identifier normalization helpers for the BOM lookup engine.

import { DEFAULT_ENGINE_CONFIG, type NormalizerConfig } from './config';

// ------------------------------------------------------------
// Core string helper
// ------------------------------------------------------------

/**
 * Safely convert any unknown value to a trimmed string.
 * Never returns null/undefined; always returns a string (possibly empty).
 */
export function toSafeTrimmedString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number' && Number.isNaN(value)) return '';
  if (value instanceof Date) return toIsoDate(value);
  return String(value).trim();
}

function toIsoDate(value: Date): string {
  if (Number.isNaN(value.getTime())) return '';
  return value.toISOString().slice(0, 10);
}

/**
 * True for null, NaN, and whitespace-only strings.
 */
export function isEmptyCell(value: unknown): boolean {
  return toSafeTrimmedString(value) === '';
}

// ------------------------------------------------------------
// Punctuation class
// ------------------------------------------------------------

function escapeForCharClass(ch: string): string {
  return /[\\\]\[^-]/.test(ch) ? `\\${ch}` : ch;
}

function punctuationPattern(punctuation: string): RegExp | null {
  const chars = Array.from(new Set(Array.from(punctuation)));
  if (chars.length === 0) return null;
  return new RegExp(`[${chars.map(escapeForCharClass).join('')}]+`, 'gu');
}

// ------------------------------------------------------------
// Identifier normalization
// ------------------------------------------------------------

export type Normalizer = (value: unknown) => string;

/**
 * Build the canonical-form function used for key matching, header comparison
 * and value equality.
 *
 *  1) null / undefined / NaN → ''
 *  2) uppercase
 *  3) every run of configured punctuation → single space
 *  4) whitespace runs → single space, then trim
 *
 * Total and idempotent: normalize(normalize(x)) === normalize(x).
 * Examples: "ab 12" → "AB 12", "AB-12" → "AB 12", "  x__y " → "X Y".
 */
export function createNormalizer(
  config: NormalizerConfig = DEFAULT_ENGINE_CONFIG.normalizer
): Normalizer {
  const pattern = punctuationPattern(config.punctuation);

  return (value: unknown): string => {
    let s = toSafeTrimmedString(value).toUpperCase();
    if (!s) return '';
    if (pattern) {
      s = s.replace(pattern, ' ');
    }
    return s.replace(/\s+/g, ' ').trim();
  };
}

const defaultNormalizer = createNormalizer();

export function normalizeValue(value: unknown, config?: NormalizerConfig): string {
  return config ? createNormalizer(config)(value) : defaultNormalizer(value);
}

/**
 * Compare two cells for lookup purposes.
 * Two numbers compare by value; anything else compares by normalized text.
 */
export function cellsEquivalent(a: unknown, b: unknown, normalize: Normalizer = defaultNormalizer): boolean {
  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) && Number.isNaN(b)) return true;
    return a === b;
  }
  return normalize(a) === normalize(b);
}
