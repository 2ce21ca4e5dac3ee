export { handleToolCall } from './dispatcher.js';
export type { ToolCallResult } from './dispatcher.js';
export { TOOL_SPECS, getToolSpec, getToolSpecs, getTools, isToolExposed } from './registry.js';
export type { ToolExposure, ToolExposureMode, ToolSpec } from './registry.js';
