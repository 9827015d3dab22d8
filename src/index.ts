/**
 * Plantgate – Unified SDK Entry Point
 *
 * Re-exports the access control engine alongside its audit, identity,
 * logging and HTTP modules.
 *
 * @module plantgate
 */

// ─── Access Control Module ───
export * from './access/index.js';

// ─── Audit Module ───
export * from './audit/index.js';

// ─── Identity Module ───
export * from './identity/index.js';

// ─── Logging Module ───
export * from './logging/index.js';

// ─── Configuration ───
export {
  DEFAULT_ACCESS_CONTROL_CONFIG,
  loadAccessControlConfig,
  type AccessControlConfig,
} from './config/accessControlConfig.js';

// ─── Composition ───
export {
  createAccessControlEngine,
  type AccessControlEngine,
  type AccessControlEngineOptions,
} from './engine.js';

// ─── HTTP ───
export { createApp, REQUEST_ID_HEADER, type AppDependencies } from './app.js';
export { createAccessRouter, USER_ID_HEADER } from './http/accessRouter.js';
export type { AccessRouterDependencies } from './http/accessRouter.js';
export {
  formatErrorResponse,
  getHttpStatusForError,
  type ErrorResponse,
} from './http/responses.js';
