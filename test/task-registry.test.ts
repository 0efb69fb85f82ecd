import { describe, expect, it } from 'vitest';
import { TaskNotFoundError, TaskRegistry } from '../src/orchestration/task-registry.js';
import type { TaskEvent } from '../src/orchestration/types.js';

const createTask = (registry: TaskRegistry) =>
  registry.create({
    kind: 'mining',
    config: { direction: 'momentum' },
    progress: { phase: 'planning', currentRound: 0, totalRounds: 3, percent: 0, message: 'Initializing experiment...' },
  });

describe('task registry', () => {
  it('keeps only the newest entries once the log limit is reached', () => {
    const registry = new TaskRegistry();
    const task = createTask(registry);

    for (let index = 1; index <= 510; index += 1) {
      registry.appendLog(task.id, 'info', `line ${index}`, { broadcast: false });
    }

    const logs = registry.get(task.id).logs;
    expect(logs).toHaveLength(500);
    expect(logs[0].message).toBe('line 11');
    expect(logs[499].id).toBe(`${task.id}-510`);
    expect(registry.recentLogs(task.id, 2).map((entry) => entry.message)).toEqual(['line 509', 'line 510']);
  });

  it('lets the first terminal transition win', () => {
    const registry = new TaskRegistry();
    const task = createTask(registry);

    expect(registry.finish(task.id, 'cancelled')).toBe(true);
    expect(registry.finish(task.id, 'failed', { error: 'exited with code 1' })).toBe(false);

    const record = registry.get(task.id);
    expect(record.status).toBe('cancelled');
    expect(record.error).toBeUndefined();
    expect(record.finishedAt).toBeDefined();
  });

  it('hands out copies that cannot change the stored record', () => {
    const registry = new TaskRegistry();
    const task = createTask(registry);

    const copy = registry.get(task.id);
    copy.status = 'failed';
    copy.metrics.rankIc = 1;

    expect(registry.statusOf(task.id)).toBe('running');
    expect(registry.get(task.id).metrics).toEqual({});
  });

  it('lists newest tasks first, falling back to creation order on equal timestamps', () => {
    const fixed = new Date('2026-01-05T10:00:00.000Z');
    const registry = new TaskRegistry({ now: () => fixed });
    const first = createTask(registry);
    const second = createTask(registry);

    expect(registry.list().map((task) => task.id)).toEqual([second.id, first.id]);
  });

  it('tracks live process ids in one handle per task', () => {
    const registry = new TaskRegistry();
    const task = createTask(registry);

    registry.attachProcess(task.id, 101);
    registry.attachProcess(task.id, 102);
    expect(registry.get(task.id).processHandle).toEqual({ pids: [101, 102] });

    registry.detachProcess(task.id, 101);
    expect(registry.get(task.id).processHandle).toEqual({ pids: [102] });

    registry.detachProcess(task.id, 102);
    expect(registry.get(task.id).processHandle).toBeUndefined();

    registry.attachProcess(task.id, 103);
    expect(registry.get(task.id).processHandle).toEqual({ pids: [103] });
  });

  it('publishes mutations unless broadcasting is turned off', () => {
    const registry = new TaskRegistry();
    const task = createTask(registry);
    const events: TaskEvent[] = [];
    const unsubscribe = registry.onEvent((event) => events.push(event));

    registry.appendLog(task.id, 'info', 'quiet', { broadcast: false });
    registry.appendLog(task.id, 'warning', 'loud');
    registry.updateProgress(task.id, { phase: 'evolving', percent: 30 });
    registry.mergeMetrics(task.id, { rankIc: 0.02 });
    unsubscribe();
    registry.mergeMetrics(task.id, { ic: 0.01 });

    expect(events.map((event) => event.type)).toEqual(['log', 'progress', 'metrics']);
    const [log, progress, metrics] = events;
    expect(log.type === 'log' && log.data.message).toBe('loud');
    expect(progress.type === 'progress' && progress.data.percent).toBe(30);
    expect(metrics.data).toEqual({ rankIc: 0.02 });
    expect(registry.get(task.id).metrics).toEqual({ rankIc: 0.02, ic: 0.01 });
  });

  it('throws a not-found error for unknown ids', () => {
    const registry = new TaskRegistry();
    expect(() => registry.get('task-missing')).toThrow(TaskNotFoundError);
    expect(registry.find('task-missing')).toBeNull();
  });
});
