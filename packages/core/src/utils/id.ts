/**
 * Run ID Generation
 */

import { randomBytes } from 'node:crypto';

/**
 * Generate a run ID used to name a run's temp directories. The UTC
 * timestamp keeps directories of failed runs (left for diagnosis) sortable.
 *
 * @example
 * generateRunId(new Date('2026-01-02T03:04:05.678Z')) // "run_20260102T030405Z_9f8e7d6c"
 */
export function generateRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d+Z$/, 'Z');
  return `run_${stamp}_${randomBytes(4).toString('hex')}`;
}
