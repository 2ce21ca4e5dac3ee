export { McpError, emptyLayout, invalidParams } from './errors.js';
export type { ErrorCode } from './errors.js';
export {
  DDL_NAMESPACE_ENV,
  TOOL_MODE_ENV,
  resolveDdlNamespace,
  resolveToolMode,
  validateNamespace,
} from './config.js';
export type { ToolExposureMode } from './config.js';
export { getPackageVersion } from './version.js';
