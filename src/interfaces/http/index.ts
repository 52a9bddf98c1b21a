export { default as statusRoutes } from './status-routes.js';
export type { RelayStatus, StatusRoutesOptions } from './status-routes.js';
export { createStatusServer } from './status-server.js';
