/**
 * Tool registration and dispatch
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';

import {
  workStartTool,
  workStartHandler,
  workStopTool,
  workStopHandler,
  statusTool,
  statusHandler,
} from './work.js';
import {
  recordsTool,
  recordsHandler,
  recordEditTool,
  recordEditHandler,
  recordDeleteTool,
  recordDeleteHandler,
} from './records.js';
import { statsTool, statsHandler, reportTool, reportHandler } from './stats.js';
import {
  projectListTool,
  projectListHandler,
  projectAddTool,
  projectAddHandler,
  projectRemoveTool,
  projectRemoveHandler,
  projectRenameTool,
  projectRenameHandler,
  projectMoveTool,
  projectMoveHandler,
} from './projects.js';

type ToolHandler = (args: Record<string, unknown>) => Promise<ToolResult>;

// Tool registry
const tools: Map<string, Tool> = new Map();
const handlers: Map<string, ToolHandler> = new Map();

function register(tool: Tool, handler: ToolHandler): void {
  tools.set(tool.name, tool);
  handlers.set(tool.name, handler);
}

/**
 * Register all tools
 */
export function registerTools(): void {
  // Work tracking
  register(workStartTool, workStartHandler);
  register(workStopTool, workStopHandler);
  register(statusTool, statusHandler);

  // Records
  register(recordsTool, recordsHandler);
  register(recordEditTool, recordEditHandler);
  register(recordDeleteTool, recordDeleteHandler);

  // Reports
  register(statsTool, statsHandler);
  register(reportTool, reportHandler);

  // Project hierarchy
  register(projectListTool, projectListHandler);
  register(projectAddTool, projectAddHandler);
  register(projectRemoveTool, projectRemoveHandler);
  register(projectRenameTool, projectRenameHandler);
  register(projectMoveTool, projectMoveHandler);
}

/**
 * Get all tool definitions
 */
export function getToolDefinitions(): Tool[] {
  if (tools.size === 0) {
    registerTools();
  }
  return Array.from(tools.values());
}

/**
 * Handle a tool call
 */
export async function handleToolCall(
  name: string,
  args: Record<string, unknown>
): Promise<ToolResult> {
  if (handlers.size === 0) {
    registerTools();
  }

  const handler = handlers.get(name);
  if (!handler) {
    return {
      success: false,
      error: `Unknown tool: ${name}`,
      code: 'UNKNOWN_TOOL',
    };
  }

  return handler(args);
}
