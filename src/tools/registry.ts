import { z } from 'zod';
import { zodToMcpInputSchema } from './mcpSchema.js';
import {
  classifyLine,
  generateCreateTable,
  interpretPic,
  scanCopybook,
  splitCopybookLines,
} from '../copybook/index.js';
import {
  emptyLayout,
  getPackageVersion,
  resolveDdlNamespace,
  resolveToolMode,
  validateNamespace,
} from '../shared/index.js';
import type { ToolExposureMode } from '../shared/index.js';
import {
  COPYBOOK_CLASSIFY_LINES,
  COPYBOOK_GENERATE_DDL,
  COPYBOOK_INFO,
  COPYBOOK_INTERPRET_PIC,
  COPYBOOK_PARSE,
  DEFAULT_TABLE_NAME,
  SERVER_NAME,
} from '../constants.js';

export type { ToolExposureMode };
export type ToolExposure = 'standard' | 'full';

export interface ToolSpec<TSchema extends z.ZodType = z.ZodType> {
  name: string;
  description: string;
  exposure: ToolExposure;
  zodSchema: TSchema;
  handler(params: z.output<TSchema>): Promise<unknown>;
}

function defineTool<TSchema extends z.ZodType>(spec: ToolSpec<TSchema>): ToolSpec<TSchema> {
  return spec;
}

export function isToolExposed(spec: ToolSpec, mode: ToolExposureMode): boolean {
  return mode === 'full' ? true : spec.exposure === 'standard';
}

// Namespace argument wins over COPYBOOK_DDL_NAMESPACE, which wins over the default.
function pickNamespace(namespace: string | undefined): string {
  return namespace !== undefined
    ? validateNamespace(namespace, 'namespace')
    : resolveDdlNamespace();
}

// ── Tool Schemas ──────────────────────────────────────────────────────────

const CopybookText = z.string().describe('Copybook text: one "LEVEL NAME [PIC clause]" declaration per line');

const TableName = z.string().trim().min(1)
  .regex(/^[A-Za-z0-9_]+$/, 'table_name may only contain letters, digits and underscores');

const Namespace = z.string().min(1).optional()
  .describe('Schema qualifier for CREATE TABLE (default: COPYBOOK_DDL_NAMESPACE or "bronze")');

const CopybookParseSchema = z.object({
  copybook: CopybookText,
  table_name: TableName.optional().default(DEFAULT_TABLE_NAME).describe('Target table name'),
  namespace: Namespace,
  require_columns: z.boolean().optional().default(false)
    .describe('Fail with EMPTY_LAYOUT instead of returning a CREATE TABLE with no columns'),
});

const CopybookGenerateDdlSchema = z.object({
  copybook: CopybookText,
  table_name: TableName.describe('Target table name'),
  namespace: Namespace,
});

const CopybookInterpretPicSchema = z.object({
  pic: z.string().trim().min(1).describe('PIC clause text, e.g. "S9(13)V99" or "X(30)"'),
});

const CopybookClassifyLinesSchema = z.object({
  copybook: CopybookText,
});

const CopybookInfoSchema = z.object({});

// ── Tool Specs ────────────────────────────────────────────────────────────

export const TOOL_SPECS: ToolSpec[] = [
  defineTool({
    name: COPYBOOK_INFO,
    description: 'Return server metadata: version, default DDL namespace, tool exposure mode and tool names.',
    exposure: 'standard',
    zodSchema: CopybookInfoSchema,
    handler: async () => {
      const mode = resolveToolMode();
      return {
        server: SERVER_NAME,
        version: getPackageVersion(),
        ddl_namespace: resolveDdlNamespace(),
        tool_mode: mode,
        tools: getToolSpecs(mode).map(s => s.name),
      };
    },
  }),
  defineTool({
    name: COPYBOOK_PARSE,
    description: 'Parse a COBOL copybook into terminal fields (level, name, pic, sql_type, length, parent) and a CREATE TABLE statement. Group items become parents, never columns. Unrecognized PIC clauses map to VARCHAR(255) and are listed in warnings.',
    exposure: 'standard',
    zodSchema: CopybookParseSchema,
    handler: async (params) => {
      const namespace = pickNamespace(params.namespace);
      const { fields, report } = scanCopybook(params.copybook);
      if (fields.length === 0 && params.require_columns) {
        throw emptyLayout('Copybook contains no PIC-bearing fields', {
          total_lines: report.total_lines,
          group_count: report.group_count,
        });
      }

      const warnings: string[] = [];
      if (fields.length === 0) {
        warnings.push('No PIC-bearing fields found; CREATE TABLE has an empty column list');
      }
      for (const name of report.fallback_fields) {
        warnings.push(`${name}: unrecognized PIC clause, typed as VARCHAR(255)`);
      }

      return {
        fields,
        ddl: generateCreateTable(fields, params.table_name, { namespace }),
        report,
        warnings,
      };
    },
  }),
  defineTool({
    name: COPYBOOK_GENERATE_DDL,
    description: 'Generate only the CREATE TABLE statement for a copybook. Column names are field names lower-cased with hyphens replaced by underscores.',
    exposure: 'standard',
    zodSchema: CopybookGenerateDdlSchema,
    handler: async (params) => {
      const namespace = pickNamespace(params.namespace);
      const { fields } = scanCopybook(params.copybook);
      return {
        table: `${namespace}.${params.table_name}`,
        column_count: fields.length,
        ddl: generateCreateTable(fields, params.table_name, { namespace }),
      };
    },
  }),
  defineTool({
    name: COPYBOOK_INTERPRET_PIC,
    description: 'Map a single PIC clause to its SQL type: 9(P)V9(S) → DECIMAL, 9(N) → INTEGER/BIGINT, X(N)/A(N) → VARCHAR(N), anything else → VARCHAR(255).',
    exposure: 'standard',
    zodSchema: CopybookInterpretPicSchema,
    handler: async (params) => ({ pic: params.pic, ...interpretPic(params.pic) }),
  }),
  defineTool({
    name: COPYBOOK_CLASSIFY_LINES,
    description: 'Debug view: classify each copybook line as skip, group or field, with 1-based line numbers.',
    exposure: 'full',
    zodSchema: CopybookClassifyLinesSchema,
    handler: async (params) =>
      splitCopybookLines(params.copybook).map((text, index) => ({
        line: index + 1,
        ...classifyLine(text),
      })),
  }),
];

// ── Exports ───────────────────────────────────────────────────────────────

export function getToolSpec(name: string): ToolSpec | undefined {
  return TOOL_SPECS.find(s => s.name === name);
}

export function getToolSpecs(mode: ToolExposureMode = 'standard'): ToolSpec[] {
  return mode === 'full' ? TOOL_SPECS : TOOL_SPECS.filter(s => s.exposure === 'standard');
}

export function getTools(mode: ToolExposureMode = 'standard'): Array<{
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}> {
  return getToolSpecs(mode).map(s => ({
    name: s.name,
    description: s.description,
    inputSchema: zodToMcpInputSchema(s.zodSchema),
  }));
}
