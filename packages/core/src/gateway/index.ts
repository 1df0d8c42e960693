export {
  SonarGateway,
  type SonarGatewayOptions,
  type GetOptions,
  type MutateOptions,
  type CacheInfo,
  type CacheOptimizationReport,
  type HealthReport,
} from './sonar-gateway.js';
export { DEFAULT_RESOURCE_ROUTES, type ResourceRoute } from './resources.js';
