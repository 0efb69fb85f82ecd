import { randomUUID } from 'node:crypto';
import type {
  BranchOutcome,
  LogEntry,
  LogLevel,
  TaskEvent,
  TaskEventPayload,
  TaskKind,
  TaskMetrics,
  TaskProgress,
  TaskRecord,
  TaskStatus,
} from './types.js';
import { LOG_MESSAGE_LIMIT } from './output-classifier.js';

export const DEFAULT_LOG_LIMIT = 500;

const TERMINAL_STATUSES = new Set<TaskStatus>(['completed', 'failed', 'cancelled']);

export const isTerminalStatus = (status: TaskStatus) => TERMINAL_STATUSES.has(status);

const randomId = (prefix: string) => `${prefix}-${Date.now().toString(36)}-${randomUUID().slice(0, 8)}`;

export class TaskNotFoundError extends Error {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
    this.taskId = taskId;
  }
}

export type TaskEventListener = (event: TaskEvent) => void;

export interface CreateTaskInput {
  kind: TaskKind;
  config: Record<string, unknown>;
  progress: Omit<TaskProgress, 'timestamp'>;
}

export interface TaskRegistryOptions {
  logLimit?: number;
  now?: () => Date;
}

interface TaskSlot {
  record: TaskRecord;
  sequence: number;
  logSequence: number;
  pids: Set<number>;
}

/**
 * In-memory store of every task one supervisor knows about. Each mutation
 * refreshes `updatedAt`; mutations that observers care about are published to
 * `onEvent` listeners.
 */
export class TaskRegistry {
  private readonly slots = new Map<string, TaskSlot>();
  private readonly listeners = new Set<TaskEventListener>();
  private readonly logLimit: number;
  private readonly now: () => Date;
  private created = 0;

  constructor(options: TaskRegistryOptions = {}) {
    this.logLimit = options.logLimit ?? DEFAULT_LOG_LIMIT;
    this.now = options.now ?? (() => new Date());
  }

  private timestamp() {
    return this.now().toISOString();
  }

  private slot(taskId: string): TaskSlot {
    const slot = this.slots.get(taskId);
    if (!slot) {
      throw new TaskNotFoundError(taskId);
    }
    return slot;
  }

  private touch(record: TaskRecord) {
    record.updatedAt = this.timestamp();
    return record.updatedAt;
  }

  create(input: CreateTaskInput): TaskRecord {
    const at = this.timestamp();
    let id = randomId('task');
    while (this.slots.has(id)) {
      id = randomId('task');
    }

    const record: TaskRecord = {
      id,
      kind: input.kind,
      status: 'running',
      progress: { ...input.progress, timestamp: at },
      metrics: {},
      logs: [],
      config: structuredClone(input.config),
      createdAt: at,
      updatedAt: at,
    };

    this.created += 1;
    this.slots.set(id, { record, sequence: this.created, logSequence: 0, pids: new Set() });
    return structuredClone(record);
  }

  /** Read-only copy of the current record. */
  get(taskId: string): TaskRecord {
    return structuredClone(this.slot(taskId).record);
  }

  find(taskId: string): TaskRecord | null {
    return this.slots.has(taskId) ? this.get(taskId) : null;
  }

  list(): TaskRecord[] {
    return Array.from(this.slots.values())
      .sort((a, b) => b.record.createdAt.localeCompare(a.record.createdAt) || b.sequence - a.sequence)
      .map((slot) => structuredClone(slot.record));
  }

  statusOf(taskId: string): TaskStatus {
    return this.slot(taskId).record.status;
  }

  progressOf(taskId: string): TaskProgress {
    return { ...this.slot(taskId).record.progress };
  }

  isTerminal(taskId: string) {
    return isTerminalStatus(this.statusOf(taskId));
  }

  recentLogs(taskId: string, count: number): LogEntry[] {
    if (count <= 0) return [];
    return structuredClone(this.slot(taskId).record.logs.slice(-count));
  }

  appendLog(taskId: string, level: LogLevel, message: string, options: { broadcast?: boolean } = {}): LogEntry {
    const slot = this.slot(taskId);
    slot.logSequence += 1;
    const entry: LogEntry = {
      id: `${taskId}-${slot.logSequence}`,
      timestamp: this.timestamp(),
      level,
      message: message.slice(0, LOG_MESSAGE_LIMIT),
    };

    const logs = slot.record.logs;
    logs.push(entry);
    if (logs.length > this.logLimit) {
      logs.splice(0, logs.length - this.logLimit);
    }
    this.touch(slot.record);

    if (options.broadcast ?? true) {
      this.publish({ type: 'log', taskId, data: { ...entry } });
    }
    return { ...entry };
  }

  updateProgress(taskId: string, patch: Partial<Omit<TaskProgress, 'timestamp'>>, options: { broadcast?: boolean } = {}) {
    const record = this.slot(taskId).record;
    record.progress = { ...record.progress, ...patch, timestamp: this.timestamp() };
    this.touch(record);
    if (options.broadcast ?? true) {
      this.publish({ type: 'progress', taskId, data: { ...record.progress } });
    }
    return { ...record.progress };
  }

  mergeMetrics(taskId: string, metrics: TaskMetrics, options: { broadcast?: boolean } = {}) {
    const record = this.slot(taskId).record;
    Object.assign(record.metrics, metrics);
    this.touch(record);
    if (options.broadcast ?? true) {
      this.publish({ type: 'metrics', taskId, data: { ...record.metrics } });
    }
    return { ...record.metrics };
  }

  setBranches(taskId: string, branches: BranchOutcome[]) {
    const record = this.slot(taskId).record;
    record.branches = structuredClone(branches);
    this.touch(record);
  }

  attachProcess(taskId: string, pid: number) {
    const slot = this.slot(taskId);
    slot.pids.add(pid);
    slot.record.processHandle = { pids: Array.from(slot.pids) };
    this.touch(slot.record);
  }

  /** Drops one pid; the handle disappears with the last live process. */
  detachProcess(taskId: string, pid: number) {
    const slot = this.slot(taskId);
    if (!slot.pids.delete(pid)) return;
    if (slot.pids.size > 0) {
      slot.record.processHandle = { pids: Array.from(slot.pids) };
    } else {
      delete slot.record.processHandle;
    }
    this.touch(slot.record);
  }

  /**
   * Moves a running task to a terminal status. The first terminal transition
   * wins; later calls return false and change nothing.
   */
  finish(taskId: string, status: Exclude<TaskStatus, 'running'>, details: { error?: string } = {}): boolean {
    const record = this.slot(taskId).record;
    if (isTerminalStatus(record.status)) {
      return false;
    }

    record.status = status;
    record.finishedAt = this.touch(record);
    if (details.error) {
      record.error = details.error;
    }
    return true;
  }

  publish(payload: TaskEventPayload) {
    const event: TaskEvent = { ...payload, timestamp: this.timestamp() };
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  onEvent(listener: TaskEventListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  size() {
    return this.slots.size;
  }
}
