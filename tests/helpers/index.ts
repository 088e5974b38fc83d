/**
 * Test helpers and utilities
 *
 * @module tests/helpers
 */

// In-process MCP server stand-in over PassThrough streams
export * from './fake-server.js';

// UTCP manual builders
export * from './builders.js';

// Async testing utilities (waitFor, delay)
export * from './async-utils.js';

// Temp files and directories with cleanup
export * from './fs-utils.js';
