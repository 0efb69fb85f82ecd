import fs from 'node:fs/promises';
import path from 'node:path';
import type { TaskMetrics } from './types.js';

const METRICS_FILE_SUFFIX = '_backtest_metrics.json';

export interface BacktestResultFile {
  file: string;
  metrics: TaskMetrics;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Numeric entries of the report's `metrics` object; everything else is dropped. */
export const numericMetrics = (report: unknown): TaskMetrics => {
  if (!isRecord(report) || !isRecord(report.metrics)) return {};
  const metrics: TaskMetrics = {};
  for (const [key, value] of Object.entries(report.metrics)) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      metrics[key] = value;
    }
  }
  return metrics;
};

/**
 * Reads the most recently written `*_backtest_metrics.json` in `resultsDir`.
 * Resolves null when the directory holds no such file.
 */
export const readLatestBacktestMetrics = async (resultsDir: string): Promise<BacktestResultFile | null> => {
  const entries = await fs.readdir(resultsDir, { withFileTypes: true });
  const candidates = await Promise.all(
    entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(METRICS_FILE_SUFFIX))
      .map(async (entry) => {
        const file = path.join(resultsDir, entry.name);
        const stats = await fs.stat(file);
        return { file, mtimeMs: stats.mtimeMs };
      }),
  );

  const latest = candidates.sort((a, b) => b.mtimeMs - a.mtimeMs || b.file.localeCompare(a.file))[0];
  if (!latest) return null;

  const report: unknown = JSON.parse(await fs.readFile(latest.file, 'utf8'));
  return { file: latest.file, metrics: numericMetrics(report) };
};
