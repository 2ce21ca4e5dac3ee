import type { CopybookField } from './types.js';

export const DEFAULT_DDL_NAMESPACE = 'bronze';

const COLUMN_INDENT = '    ';

export interface CreateTableOptions {
  namespace?: string;
}

export function toColumnName(fieldName: string): string {
  return fieldName.toLowerCase().replace(/-/g, '_');
}

export function renderColumn(field: Pick<CopybookField, 'name' | 'sql_type'>): string {
  return `${COLUMN_INDENT}${toColumnName(field.name)} ${field.sql_type}`;
}

/**
 * Render fields as a CREATE TABLE statement, columns in declaration order.
 *
 * Table and namespace identifiers are written verbatim. With no fields the
 * statement still renders, with an empty column body.
 */
export function generateCreateTable(
  fields: readonly CopybookField[],
  tableName: string,
  options: CreateTableOptions = {},
): string {
  const namespace = options.namespace ?? DEFAULT_DDL_NAMESPACE;
  const columns = fields.map(renderColumn).join(',\n');
  return `CREATE TABLE ${namespace}.${tableName} (\n${columns}\n);`;
}
