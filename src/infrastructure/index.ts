/**
 * Infrastructure Module
 *
 * - Health checks (storage and broadcaster status)
 * - Prometheus metrics
 */

export {
  checkStorageHealth,
  checkBroadcasterHealth,
  getHealthStatus,
  type HealthCheckResult,
  type HealthStatus,
  type HealthSources,
} from './healthCheck';

export { renderMetrics, setSubscriberCountSource } from './metrics';
