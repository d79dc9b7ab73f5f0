/**
 * MCP Tool Module Exports
 *
 * @module tools
 */

export * from './shared.js';
export * from './twin-cities.js';
