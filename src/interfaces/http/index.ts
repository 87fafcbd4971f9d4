export { default as collectorRoutes, WARMUP_HEADER } from './collector-routes.js';
export type { CollectorRoutesOptions } from './collector-routes.js';
export { default as healthRoutes } from './health-routes.js';
export type { HealthRoutesOptions } from './health-routes.js';
