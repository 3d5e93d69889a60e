export { handleToolCall } from './dispatcher.js';
export type { ToolCallContext } from './dispatcher.js';
export { TOOL_SPECS, getToolSpec, getToolSpecs, getTools, isToolExposed } from './registry.js';
export type { ToolExposure, ToolExposureMode, ToolHandlerContext, ToolSpec } from './registry.js';
