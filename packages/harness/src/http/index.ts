/**
 * HTTP Layer Exports
 */

export { createRoutes, errorHandler, ValidationError } from './routes.js';
export type { RunRoutesDeps } from './routes.js';
