/**
 * Core conversation agent API
 */

export * from './types';
export { Agent } from './Agent';
export { runToolUse, runToolsSerially, type ToolExecutionContext } from './ToolExecutor';
export { getToolAttribution } from './utils';
