/**
 * API Layer Exports
 *
 * API layer is thin - delegates to the orchestrator, registry and services.
 */

export { createApp } from './app.js';
export type { ApiServices, ErrorResponse, SuccessResponse } from './types.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
