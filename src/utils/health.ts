/**
 * Liveness report for the health endpoint
 *
 * The store is loaded before the server listens, so a process that answers at all
 * has its data; the report adds per-kind record counts and the start time.
 */

import type { ContentKind } from '../types/content.js';

export interface HealthReport {
  status: 'healthy';
  data_loaded: true;
  counts: Record<ContentKind, number>;
  started_at: string;
}

export interface HealthSource {
  counts(): Record<ContentKind, number>;
}

export function buildHealthReport(source: HealthSource, startedAt: string): HealthReport {
  return {
    status: 'healthy',
    data_loaded: true,
    counts: source.counts(),
    started_at: startedAt,
  };
}
