import type { RunStats } from './types.js';

const REPORT_KEYS = ['seeded', 'fetched', 'generated', 'written', 'failed', 'skipped'] as const;

/**
 * Serialize run counters as JSON with a fixed key order.
 */
export function formatRunReport(stats: RunStats, indent?: number): string {
  const report: Record<string, number> = {};
  for (const key of REPORT_KEYS) {
    report[key] = stats[key];
  }
  return JSON.stringify(report, null, indent);
}
