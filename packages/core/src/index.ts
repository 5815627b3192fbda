/**
 * @mdm-mcp/core
 *
 * Constants, error envelope, request schemas and response normalizers
 * shared by the API client and the tool server.
 */

export * from './constants.js';
export * from './types/index.js';
export * from './errors/index.js';
export * from './validation/index.js';
export * from './utils/index.js';
