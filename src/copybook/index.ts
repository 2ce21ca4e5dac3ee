export { classifyLine, isCommentOrBlank, splitCopybookLines } from './classifyLine.js';
export { GroupStack, HierarchyResolver } from './hierarchy.js';
export type { ResolvedField } from './hierarchy.js';
export {
  FALLBACK_LENGTH,
  FALLBACK_SQL_TYPE,
  MAX_INTEGER_DIGITS,
  interpretPic,
  isFallbackType,
  normalizePic,
} from './picClause.js';
export { DEFAULT_DDL_NAMESPACE, generateCreateTable, renderColumn, toColumnName } from './ddl.js';
export type { CreateTableOptions } from './ddl.js';
export { CopybookParser, parseCopybook, scanCopybook } from './parseCopybook.js';
export type {
  CopybookField,
  CopybookScan,
  CopybookScanReport,
  FieldDeclaration,
  GroupDeclaration,
  LineClass,
  PicInterpretation,
  PicKind,
  SkipLine,
} from './types.js';
