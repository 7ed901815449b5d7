/**
 * Health report shared by GET /api/health (serverless and Express)
 */
import type { IndexCache, IndexCacheStatus } from '../../src/service/vector-store/indexCache.js';

export interface HealthReport {
  status: 'ok' | 'degraded';
  timestamp: string;
  index: IndexCacheStatus;
}

export function buildHealthReport(indexCache: IndexCache, now: Date = new Date()): HealthReport {
  const index = indexCache.status();
  return {
    status: index.state === 'failed' ? 'degraded' : 'ok',
    timestamp: now.toISOString(),
    index,
  };
}
