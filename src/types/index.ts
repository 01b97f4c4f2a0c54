/**
 * Type exports
 */

export * from './config.js';
export * from './content.js';
export * from './mcp.js';
