import type { Logger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import type { TaskRegistry } from './task-registry.js';
import type { TaskEvent } from './types.js';

export const DEFAULT_REPLAY_LOGS = 20;

/** A live consumer of one task's events. A throw or rejection counts as a failed delivery. */
export interface TaskSubscriber {
  send(event: TaskEvent): void | Promise<void>;
}

export interface EventBroadcasterOptions {
  replayLogs?: number;
  logger?: Logger;
}

const isPromiseLike = (value: unknown): value is PromiseLike<void> =>
  typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';

export class EventBroadcaster {
  private readonly subscribers = new Map<string, Set<TaskSubscriber>>();
  private readonly replayLogs: number;
  private readonly logger: Logger;
  private readonly unsubscribe: () => void;

  constructor(private readonly registry: TaskRegistry, options: EventBroadcasterOptions = {}) {
    this.replayLogs = options.replayLogs ?? DEFAULT_REPLAY_LOGS;
    this.logger = options.logger ?? createLogger('orchestration.events');
    this.unsubscribe = registry.onEvent((event) => this.publish(event));
  }

  /**
   * Sends the current progress and the most recent log entries, then keeps the
   * subscriber attached for live events. Returns a detach function.
   */
  attach(taskId: string, subscriber: TaskSubscriber): () => void {
    const task = this.registry.get(taskId);
    let subscribers = this.subscribers.get(taskId);
    if (!subscribers) {
      subscribers = new Set();
      this.subscribers.set(taskId, subscribers);
    }
    subscribers.add(subscriber);

    const at = new Date().toISOString();
    const replay: TaskEvent[] = [
      { type: 'progress', taskId, data: task.progress, timestamp: at },
      ...this.registry.recentLogs(taskId, this.replayLogs).map(
        (entry): TaskEvent => ({ type: 'log', taskId, data: entry, timestamp: at }),
      ),
    ];
    for (const event of replay) {
      if (!this.deliver(taskId, subscriber, event)) break;
    }

    return () => this.detach(taskId, subscriber);
  }

  detach(taskId: string, subscriber: TaskSubscriber) {
    const subscribers = this.subscribers.get(taskId);
    if (!subscribers) return;
    subscribers.delete(subscriber);
    if (subscribers.size === 0) {
      this.subscribers.delete(taskId);
    }
  }

  publish(event: TaskEvent) {
    const subscribers = this.subscribers.get(event.taskId);
    if (!subscribers) return;
    for (const subscriber of Array.from(subscribers)) {
      this.deliver(event.taskId, subscriber, event);
    }
  }

  heartbeat(taskId: string, subscriber: TaskSubscriber) {
    return this.deliver(taskId, subscriber, {
      type: 'heartbeat',
      taskId,
      data: {},
      timestamp: new Date().toISOString(),
    });
  }

  subscriberCount(taskId: string) {
    return this.subscribers.get(taskId)?.size ?? 0;
  }

  close() {
    this.unsubscribe();
    this.subscribers.clear();
  }

  private deliver(taskId: string, subscriber: TaskSubscriber, event: TaskEvent): boolean {
    try {
      const pending = subscriber.send(event);
      if (isPromiseLike(pending)) {
        void pending.then(undefined, (error: unknown) => this.prune(taskId, subscriber, error));
      }
      return true;
    } catch (error) {
      this.prune(taskId, subscriber, error);
      return false;
    }
  }

  private prune(taskId: string, subscriber: TaskSubscriber, error: unknown) {
    if (!this.subscribers.get(taskId)?.has(subscriber)) return;
    this.detach(taskId, subscriber);
    this.logger.debug(`dropped subscriber of task ${taskId} after failed delivery`, error);
  }
}
