import type { LineClass } from './types.js';

// LEVEL NAME [PIC|PICTURE clause]; the clause stops at whitespace or the terminating period.
const DECLARATION_RE = /^\s*(\d{2})\s+([A-Z0-9-]+)(?:\s+(?:PIC|PICTURE)\s+([^\s.]+))?/i;

const SKIP: LineClass = Object.freeze({ kind: 'skip' });

export function splitCopybookLines(content: string): string[] {
  return content.split(/\r?\n/);
}

export function isCommentOrBlank(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length === 0 || trimmed.startsWith('*');
}

/**
 * Classify one copybook line.
 *
 * Comments, blank lines and anything the declaration pattern rejects are
 * skipped without complaint.
 */
export function classifyLine(line: string): LineClass {
  if (isCommentOrBlank(line)) return SKIP;

  const match = DECLARATION_RE.exec(line);
  if (!match) return SKIP;

  const [, levelText, name, pic] = match;
  if (levelText === undefined || name === undefined) return SKIP;

  const level = parseInt(levelText, 10);
  if (pic === undefined || pic.length === 0) {
    return { kind: 'group', level, name };
  }
  return { kind: 'field', level, name, pic };
}
