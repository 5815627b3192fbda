/**
 * @mdm-mcp/connector-api
 *
 * Authenticated client for the Reltio MDM REST API
 */

export * from './reltio/index.js';
