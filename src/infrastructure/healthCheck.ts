/**
 * Health Check Utilities
 *
 * Used by the /api/health endpoint to report detailed status.
 */

import { promises as fs, constants as fsConstants } from 'fs';
import { createLogger, errorMessage } from '../utils/logger';

const logger = createLogger('healthCheck');

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface HealthCheckResult {
  ok: boolean;
  latencyMs?: number;
  error?: string;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  subscribers: number;
  checks: {
    storage: HealthCheckResult;
    broadcaster: HealthCheckResult;
  };
}

/** What the health check needs to know about the running service. */
export interface HealthSources {
  reportsDir: string;
  subscriberCount(): number;
  isBroadcasterClosed(): boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Individual Health Checks
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check that the reports directory exists and is writable.
 */
export async function checkStorageHealth(dir: string): Promise<HealthCheckResult> {
  const start = Date.now();
  try {
    await fs.access(dir, fsConstants.W_OK);
    return { ok: true, latencyMs: Date.now() - start };
  } catch (error) {
    const message = errorMessage(error);
    logger.warn({ dir, error: message }, 'Storage health check failed');
    return { ok: false, latencyMs: Date.now() - start, error: message };
  }
}

export function checkBroadcasterHealth(sources: HealthSources): HealthCheckResult {
  return sources.isBroadcasterClosed()
    ? { ok: false, error: 'Broadcaster is closed' }
    : { ok: true };
}

// ─────────────────────────────────────────────────────────────────────────────
// Aggregated Health Check
// ─────────────────────────────────────────────────────────────────────────────

const startTime = Date.now();

/**
 * Storage failing makes the service unhealthy (nothing can be saved); a
 * closed broadcaster while storage works is degraded.
 */
export async function getHealthStatus(sources: HealthSources): Promise<HealthStatus> {
  const storage = await checkStorageHealth(sources.reportsDir);
  const broadcaster = checkBroadcasterHealth(sources);

  let status: HealthStatus['status'];
  if (!storage.ok) {
    status = 'unhealthy';
  } else if (!broadcaster.ok) {
    status = 'degraded';
  } else {
    status = 'healthy';
  }

  return {
    status,
    timestamp: new Date().toISOString(),
    uptime: Math.floor((Date.now() - startTime) / 1000),
    subscribers: sources.subscriberCount(),
    checks: {
      storage,
      broadcaster,
    },
  };
}
