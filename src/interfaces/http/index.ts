export { default as servicesPlugin } from './services-plugin.js';
export type { AppServices } from './services-plugin.js';
export { default as errorHandler, httpStatusFor } from './error-handler.js';
export { default as pipelineRoutes } from './pipeline-routes.js';
export { default as validationRoutes } from './validation-routes.js';
export { default as eventRoutes } from './event-routes.js';
export { default as alertRoutes } from './alert-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { buildApp } from './app.js';
