/**
 * Copybook parser: one linear scan from raw text to typed terminal fields.
 *
 * Each line is classified, group declarations update the open-group stack,
 * and every PIC-bearing line becomes one frozen CopybookField. Nothing here
 * throws; malformed lines are skipped and unknown PIC clauses fall back to
 * VARCHAR(255).
 */

import { classifyLine, splitCopybookLines } from './classifyLine.js';
import { generateCreateTable, type CreateTableOptions } from './ddl.js';
import { HierarchyResolver } from './hierarchy.js';
import type { CopybookField, CopybookScan } from './types.js';

export function scanCopybook(content: string): CopybookScan {
  const lines = splitCopybookLines(content);
  const resolver = new HierarchyResolver();
  const fields: CopybookField[] = [];
  const fallbackFields: string[] = [];
  let skipped = 0;
  let groups = 0;

  for (const line of lines) {
    const cls = classifyLine(line);
    if (cls.kind === 'skip') {
      skipped += 1;
      continue;
    }
    if (cls.kind === 'group') groups += 1;

    const resolved = resolver.accept(cls);
    if (!resolved) continue;
    if (resolved.kind === 'fallback') fallbackFields.push(resolved.field.name);
    fields.push(resolved.field);
  }

  return {
    fields,
    report: {
      total_lines: lines.length,
      skipped_lines: skipped,
      group_count: groups,
      field_count: fields.length,
      fallback_fields: fallbackFields,
    },
  };
}

export function parseCopybook(content: string): CopybookField[] {
  return scanCopybook(content).fields;
}

/**
 * Stateful wrapper for callers that parse, then render DDL for the same
 * layout. Not shared between callers; each parse replaces the previous fields.
 */
export class CopybookParser {
  private fields: CopybookField[] = [];

  parse(content: string): CopybookField[] {
    this.fields = parseCopybook(content);
    return this.fields;
  }

  generateDdl(tableName: string, options?: CreateTableOptions): string {
    return generateCreateTable(this.fields, tableName, options);
  }
}
