export const SERVER_NAME = 'copybook-mcp' as const;

export const COPYBOOK_PARSE = 'copybook_parse' as const;
export const COPYBOOK_GENERATE_DDL = 'copybook_generate_ddl' as const;
export const COPYBOOK_INTERPRET_PIC = 'copybook_interpret_pic' as const;
export const COPYBOOK_CLASSIFY_LINES = 'copybook_classify_lines' as const;
export const COPYBOOK_INFO = 'copybook_info' as const;

export type CopybookToolName =
  | typeof COPYBOOK_PARSE
  | typeof COPYBOOK_GENERATE_DDL
  | typeof COPYBOOK_INTERPRET_PIC
  | typeof COPYBOOK_CLASSIFY_LINES
  | typeof COPYBOOK_INFO;

export const DEFAULT_TABLE_NAME = 'table';
