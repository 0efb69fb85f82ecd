import path from 'node:path';
import { describeError } from '../trial/errors.js';
import { ensureDir } from '../utils/path.js';
import type { Branch, BranchOutcome } from './types.js';

export interface BranchLayout {
  /** Parent directory for per-branch log directories. */
  logRoot?: string;
  prefix?: string;
}

export interface RunBranchesOptions {
  parallel: boolean;
  /** Runs one branch to completion and resolves with its exit code. */
  runBranch: (branch: Branch) => Promise<number>;
  /** Checked before each sequential launch; false stops launching further branches. */
  shouldContinue?: () => boolean;
}

const branchDirName = (prefix: string, index: number) => `${prefix}_${String(index).padStart(2, '0')}`;

/**
 * Turns requested directions into branches. No directions means a single
 * unnamed branch; a single branch keeps the plain, directory-less layout.
 */
export const planBranches = (directions: ReadonlyArray<string | undefined>, layout: BranchLayout = {}): Branch[] => {
  const normalized = directions.length > 0 ? directions : [undefined];
  const splitLogs = normalized.length > 1 && Boolean(layout.logRoot);
  const prefix = layout.prefix?.trim() || 'branch';

  return normalized.map((direction, offset) => {
    const index = offset + 1;
    const text = direction?.trim();
    return {
      index,
      direction: text ? text : undefined,
      logPath: splitLogs && layout.logRoot ? path.join(layout.logRoot, branchDirName(prefix, index)) : undefined,
    };
  });
};

const settle = async (branch: Branch, runBranch: RunBranchesOptions['runBranch']): Promise<BranchOutcome> => {
  try {
    if (branch.logPath) {
      await ensureDir(branch.logPath);
    }
    const exitCode = await runBranch(branch);
    return {
      ...branch,
      status: exitCode === 0 ? 'succeeded' : 'failed',
      exitCode,
      error: exitCode === 0 ? undefined : `exited with code ${exitCode}`,
    };
  } catch (error) {
    return { ...branch, status: 'failed', error: describeError(error) };
  }
};

/**
 * Runs every branch and joins all of them; one failing branch never stops its
 * siblings. Outcomes come back in branch order.
 */
export const runBranches = async (branches: Branch[], options: RunBranchesOptions): Promise<BranchOutcome[]> => {
  if (options.parallel && branches.length > 1) {
    return Promise.all(branches.map((branch) => settle(branch, options.runBranch)));
  }

  const outcomes: BranchOutcome[] = [];
  for (const branch of branches) {
    if (options.shouldContinue && !options.shouldContinue()) break;
    outcomes.push(await settle(branch, options.runBranch));
  }
  return outcomes;
};

export const summarizeBranches = (outcomes: BranchOutcome[]) => {
  const succeeded = outcomes.filter((outcome) => outcome.status === 'succeeded').length;
  return {
    succeeded,
    failed: outcomes.length - succeeded,
    total: outcomes.length,
  };
};
