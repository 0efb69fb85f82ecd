import { z } from 'zod';
import { formatSchemaIssues } from '../utils/zod.js';
import type { TaskKind } from './types.js';

const positiveSeconds = z.number().positive().max(7 * 24 * 60 * 60);

export const miningParamsSchema = z.object({
  direction: z.string().trim().min(1, 'direction is required'),
  directions: z.array(z.string().trim().min(1)).max(32).optional(),
  parallel: z.boolean().optional(),
  numDirections: z.number().int().min(1).max(32).optional(),
  maxRounds: z.number().int().min(1).max(1000).optional(),
  maxLoops: z.number().int().min(1).max(1000).optional(),
  factorsPerHypothesis: z.number().int().min(1).max(100).optional(),
  librarySuffix: z.string().trim().regex(/^[A-Za-z0-9._-]+$/, 'librarySuffix may only contain letters, digits, ".", "_" and "-"').optional(),
  configPath: z.string().trim().min(1).optional(),
  timeoutSeconds: positiveSeconds.optional(),
});

export const backtestParamsSchema = z.object({
  factorJson: z.string().trim().min(1, 'factorJson is required'),
  factorSource: z.enum(['custom', 'combined']).default('custom'),
  configPath: z.string().trim().min(1).optional(),
  resultsDir: z.string().trim().min(1).optional(),
  timeoutSeconds: positiveSeconds.optional(),
});

export type MiningParams = z.infer<typeof miningParamsSchema>;
export type BacktestParams = z.infer<typeof backtestParamsSchema>;

export type TrialRequest =
  | { kind: 'mining'; params: MiningParams }
  | { kind: 'backtest'; params: BacktestParams };

export class TrialRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TrialRequestError';
  }
}

export const parseTrialRequest = (kind: TaskKind, params: unknown): TrialRequest => {
  if (kind === 'mining') {
    const parsed = miningParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new TrialRequestError(`Invalid mining request:\n${formatSchemaIssues(parsed.error.issues)}`);
    }
    return { kind, params: parsed.data };
  }

  const parsed = backtestParamsSchema.safeParse(params);
  if (!parsed.success) {
    throw new TrialRequestError(`Invalid backtest request:\n${formatSchemaIssues(parsed.error.issues)}`);
  }
  return { kind, params: parsed.data };
};
