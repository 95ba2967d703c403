/**
 * API Layer Exports
 */

export { createApp } from './app.js';
export type { ApiServices } from './app.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
export type { ErrorResponse, SuccessResponse } from './types.js';
