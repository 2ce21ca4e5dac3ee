/**
 * Copybook record shapes.
 *
 * Keys on CopybookField are snake_case: they are returned to tool callers as-is.
 */

export interface CopybookField {
  level: number;
  name: string;
  pic: string | null;
  sql_type: string;
  length: number | null;
  parent: string | null;
}

export interface SkipLine {
  kind: 'skip';
}

export interface GroupDeclaration {
  kind: 'group';
  level: number;
  name: string;
}

export interface FieldDeclaration {
  kind: 'field';
  level: number;
  name: string;
  pic: string;
}

export type LineClass = SkipLine | GroupDeclaration | FieldDeclaration;

export type PicKind = 'decimal' | 'integer' | 'character' | 'fallback';

export interface PicInterpretation {
  kind: PicKind;
  sql_type: string;
  length: number;
  precision?: number;
  scale?: number;
}

export interface CopybookScanReport {
  total_lines: number;
  skipped_lines: number;
  group_count: number;
  field_count: number;
  fallback_fields: string[];
}

export interface CopybookScan {
  fields: CopybookField[];
  report: CopybookScanReport;
}
