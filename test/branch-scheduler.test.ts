import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { access, mkdtemp, rm } from 'node:fs/promises';
import path from 'node:path';
import { tmpdir } from 'node:os';
import { planBranches, runBranches, summarizeBranches } from '../src/orchestration/branch-scheduler.js';
import type { Branch } from '../src/orchestration/types.js';

const exists = async (target: string) =>
  access(target)
    .then(() => true)
    .catch(() => false);

describe('branch scheduler', () => {
  let sandbox = '';

  beforeEach(async () => {
    sandbox = await mkdtemp(path.join(tmpdir(), 'branch-scheduler-'));
  });

  afterEach(async () => {
    await rm(sandbox, { recursive: true, force: true });
  });

  it('plans a single unnamed branch when no direction is given', () => {
    expect(planBranches([], { logRoot: sandbox })).toEqual([{ index: 1, direction: undefined, logPath: undefined }]);
  });

  it('gives each branch its own numbered log directory only when there are several', () => {
    const single = planBranches(['momentum'], { logRoot: sandbox, prefix: 'branch' });
    expect(single).toEqual([{ index: 1, direction: 'momentum', logPath: undefined }]);

    const several = planBranches(['momentum', ' ', 'value'], { logRoot: sandbox, prefix: 'branch' });
    expect(several.map((branch) => branch.logPath)).toEqual([
      path.join(sandbox, 'branch_01'),
      path.join(sandbox, 'branch_02'),
      path.join(sandbox, 'branch_03'),
    ]);
    expect(several[1].direction).toBeUndefined();
  });

  it('runs parallel branches together and joins all of them when one fails', async () => {
    const branches = planBranches(['a', 'b', 'c'], { logRoot: sandbox });
    let started = 0;
    let releaseAll: () => void = () => undefined;
    const allStarted = new Promise<void>((resolve) => {
      releaseAll = resolve;
    });

    const outcomes = await runBranches(branches, {
      parallel: true,
      runBranch: async (branch: Branch) => {
        started += 1;
        if (started === branches.length) releaseAll();
        await allStarted;
        return branch.index === 2 ? 1 : 0;
      },
    });

    expect(outcomes.map((outcome) => outcome.status)).toEqual(['succeeded', 'failed', 'succeeded']);
    expect(outcomes[1]).toMatchObject({ index: 2, exitCode: 1, error: 'exited with code 1' });
    expect(summarizeBranches(outcomes)).toEqual({ succeeded: 2, failed: 1, total: 3 });
    for (const name of ['branch_01', 'branch_02', 'branch_03']) {
      expect(await exists(path.join(sandbox, name))).toBe(true);
    }
  });

  it('records a thrown branch error as a failed outcome', async () => {
    const outcomes = await runBranches(planBranches(['a', 'b']), {
      parallel: false,
      runBranch: async (branch) => {
        if (branch.index === 1) throw new Error('launch refused');
        return 0;
      },
    });

    expect(outcomes).toEqual([
      { index: 1, direction: 'a', logPath: undefined, status: 'failed', error: 'launch refused' },
      { index: 2, direction: 'b', logPath: undefined, status: 'succeeded', exitCode: 0, error: undefined },
    ]);
  });

  it('stops launching sequential branches once told to stop', async () => {
    let stop = false;
    const ran: number[] = [];
    const outcomes = await runBranches(planBranches(['a', 'b', 'c']), {
      parallel: false,
      shouldContinue: () => !stop,
      runBranch: async (branch) => {
        ran.push(branch.index);
        stop = true;
        return 0;
      },
    });

    expect(ran).toEqual([1]);
    expect(outcomes).toHaveLength(1);
  });
});
