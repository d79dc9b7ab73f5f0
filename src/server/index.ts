/**
 * MCP Server Module Exports
 *
 * @module server
 */

export {
  ERROR_CATEGORIES,
  MCPError,
  formatErrorResponse,
  pathNotFoundError,
  writerNotConfiguredError,
  type ErrorCategory,
  type ErrorResponse,
} from './errors.js';

export {
  successResult,
  type CityOption,
  type SessionContext,
  type ToolError,
  type ToolResult,
  type ToolResultFailure,
  type ToolResultSuccess,
} from './types.js';

export { TwinCitiesConfigSchema, loadConfig, type TwinCitiesConfig } from './config.js';
export { closeSession, createSession, type SessionOptions } from './state.js';
