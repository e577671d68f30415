export { default as auditRoutes } from './audit-routes.js';
export { default as operationRoutes } from './operation-routes.js';
export { sendKnownError } from './error-response.js';
