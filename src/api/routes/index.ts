export { registerAnalysisRoutes } from './analysis';
export { registerHealthRoutes, type HealthCheckable } from './health';
