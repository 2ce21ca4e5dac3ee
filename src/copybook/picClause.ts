/**
 * PIC clause → SQL type mapping.
 *
 * Matchers run in a fixed order because the patterns overlap: every decimal
 * clause also contains an integer `9(n)` run. Matching is substring-based on
 * the upper-cased clause, so a leading sign `S` does not get in the way.
 */

import type { PicInterpretation } from './types.js';

type PicMatcher = (pic: string) => PicInterpretation | null;

export const FALLBACK_SQL_TYPE = 'VARCHAR(255)';
export const FALLBACK_LENGTH = 255;

// Widest digit count that still fits a signed 32-bit INTEGER.
export const MAX_INTEGER_DIGITS = 9;

// Largest repeat count a clause may carry; anything above falls back.
export const MAX_PIC_COUNT = 65535;

const DECIMAL_RE = /9\((\d+)\)V(?:9\((\d+)\)|(9+))/;
const INTEGER_RE = /9\((\d+)\)/;
const CHARACTER_RE = /[XA]\((\d+)\)/;
const REPEAT_COUNT_RE = /\((\d+)\)/g;

// Usage suffix glued onto the picture string, e.g. "S9(4)COMP".
const USAGE_SUFFIX_RE = /(COMP(UTATIONAL)?(-[1-5])?|BINARY|PACKED-DECIMAL)$/;

function matchDecimal(pic: string): PicInterpretation | null {
  const m = DECIMAL_RE.exec(pic);
  if (!m || m[1] === undefined) return null;
  const precisionDigits = parseInt(m[1], 10);
  const scale = m[2] !== undefined ? parseInt(m[2], 10) : (m[3] ?? '').length;
  const total = precisionDigits + scale;
  return {
    kind: 'decimal',
    sql_type: `DECIMAL(${total},${scale})`,
    length: total,
    precision: total,
    scale,
  };
}

function matchInteger(pic: string): PicInterpretation | null {
  const m = INTEGER_RE.exec(pic);
  if (!m || m[1] === undefined) return null;
  const digits = parseInt(m[1], 10);
  return {
    kind: 'integer',
    sql_type: digits > MAX_INTEGER_DIGITS ? 'BIGINT' : 'INTEGER',
    length: digits,
  };
}

function matchCharacter(pic: string): PicInterpretation | null {
  const m = CHARACTER_RE.exec(pic);
  if (!m || m[1] === undefined) return null;
  const length = parseInt(m[1], 10);
  return { kind: 'character', sql_type: `VARCHAR(${length})`, length };
}

const PIC_MATCHERS: readonly PicMatcher[] = [matchDecimal, matchInteger, matchCharacter];

export function normalizePic(pic: string): string {
  return pic.trim().toUpperCase();
}

export function fallbackInterpretation(): PicInterpretation {
  return { kind: 'fallback', sql_type: FALLBACK_SQL_TYPE, length: FALLBACK_LENGTH };
}

function hasOversizedCount(pic: string): boolean {
  for (const m of pic.matchAll(REPEAT_COUNT_RE)) {
    if (m[1] !== undefined && parseInt(m[1], 10) > MAX_PIC_COUNT) return true;
  }
  return false;
}

export function interpretPic(pic: string): PicInterpretation {
  const normalized = normalizePic(pic);
  if (USAGE_SUFFIX_RE.test(normalized) || hasOversizedCount(normalized)) {
    return fallbackInterpretation();
  }

  for (const matcher of PIC_MATCHERS) {
    const result = matcher(normalized);
    if (result) return result;
  }
  return fallbackInterpretation();
}

export function isFallbackType(interpretation: PicInterpretation): boolean {
  return interpretation.kind === 'fallback';
}
