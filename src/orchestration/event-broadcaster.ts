import { randomUUID } from 'node:crypto';
import type { LoggerLike } from '../utils/logger.js';
import { isTerminalTaskStatus, type BroadcastMessage, type SubscriberOverflowNotice, type Task, type TaskEvent } from './types.js';

export interface EventBroadcasterOptions {
  queueDepth: number;
  replayBufferSize: number;
  logger: LoggerLike;
}

export interface SubscribeOptions {
  /** Resume after this revision when the replay buffer still covers it. */
  afterRevision?: number;
}

export interface Subscription {
  id: string;
  taskId: string;
  snapshot: Task;
  events: AsyncIterable<BroadcastMessage>;
  close(): void;
}

type OfferOutcome = 'queued' | 'overflow' | 'closed';

const isTerminalEvent = (event: TaskEvent) => event.type === 'task_completed' || event.type === 'task_failed';

class SubscriberQueue implements AsyncIterable<BroadcastMessage> {
  private readonly items: BroadcastMessage[] = [];
  private waiter?: (result: IteratorResult<BroadcastMessage>) => void;
  private ending = false;
  private closed = false;
  lastQueuedRevision: number | null = null;

  constructor(
    readonly id: string,
    readonly taskId: string,
    private readonly depth: number,
    private readonly onDetach: (queue: SubscriberQueue) => void,
  ) {}

  offer(event: TaskEvent): OfferOutcome {
    if (this.ending || this.closed) return 'closed';

    if (this.waiter && this.items.length === 0) {
      const waiter = this.waiter;
      this.waiter = undefined;
      this.lastQueuedRevision = event.revision;
      waiter({ value: event, done: false });
      return 'queued';
    }

    if (this.items.length >= this.depth) {
      return 'overflow';
    }

    this.items.push(event);
    this.lastQueuedRevision = event.revision;
    return 'queued';
  }

  /** Stops accepting events; the consumer still drains what is queued, then `notice` if given. */
  end(notice?: SubscriberOverflowNotice) {
    if (this.ending || this.closed) return;
    this.ending = true;

    if (notice) {
      if (this.waiter && this.items.length === 0) {
        const waiter = this.waiter;
        this.waiter = undefined;
        waiter({ value: notice, done: false });
        return;
      }
      this.items.push(notice);
      return;
    }

    if (this.waiter && this.items.length === 0) {
      this.finish();
    }
  }

  close() {
    if (this.closed) return;
    this.items.length = 0;
    this.finish();
  }

  private finish() {
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = undefined;
    this.onDetach(this);
    waiter?.({ value: undefined, done: true });
  }

  private next(): Promise<IteratorResult<BroadcastMessage>> {
    const item = this.items.shift();
    if (item) {
      return Promise.resolve({ value: item, done: false });
    }

    if (this.ending || this.closed) {
      if (!this.closed) this.finish();
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<BroadcastMessage> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}

/**
 * Per-task fan-out of transition events. Holds no task state of its own: the
 * snapshot handed to a new subscriber comes from `snapshotOf`, and every event
 * published afterwards lands in that subscriber's private bounded queue.
 */
export class EventBroadcaster {
  private readonly subscribers = new Map<string, Map<string, SubscriberQueue>>();
  private readonly replay = new Map<string, TaskEvent[]>();

  constructor(
    private readonly snapshotOf: (taskId: string) => Task | null,
    private readonly options: EventBroadcasterOptions,
  ) {}

  subscribe(taskId: string, options: SubscribeOptions = {}): Subscription | null {
    const snapshot = this.snapshotOf(taskId);
    if (!snapshot) return null;

    const queue = new SubscriberQueue(randomUUID(), taskId, this.options.queueDepth, (detached) => this.detach(detached));

    const buffered = this.replay.get(taskId) ?? [];
    let from = snapshot.revision;
    if (options.afterRevision !== undefined && options.afterRevision < snapshot.revision) {
      const oldest = buffered[0]?.revision;
      if (oldest !== undefined && oldest <= options.afterRevision + 1) {
        from = options.afterRevision;
      }
    }

    let overflowed = false;
    for (const event of buffered) {
      if (event.revision <= from) continue;
      if (queue.offer(event) === 'overflow') {
        this.overflow(queue);
        overflowed = true;
        break;
      }
    }

    if (isTerminalTaskStatus(snapshot.status)) {
      queue.end();
    } else if (!overflowed) {
      const forTask = this.subscribers.get(taskId) ?? new Map<string, SubscriberQueue>();
      forTask.set(queue.id, queue);
      this.subscribers.set(taskId, forTask);
    }

    return {
      id: queue.id,
      taskId,
      snapshot,
      events: queue,
      close: () => queue.close(),
    };
  }

  publish(taskId: string, event: TaskEvent) {
    if (this.options.replayBufferSize > 0) {
      const buffered = this.replay.get(taskId) ?? [];
      buffered.push(event);
      if (buffered.length > this.options.replayBufferSize) {
        buffered.splice(0, buffered.length - this.options.replayBufferSize);
      }
      this.replay.set(taskId, buffered);
    }

    const forTask = this.subscribers.get(taskId);
    if (!forTask) return;

    for (const queue of Array.from(forTask.values())) {
      if (queue.offer(event) === 'overflow') {
        this.overflow(queue);
      }
    }

    if (isTerminalEvent(event)) {
      for (const queue of Array.from(forTask.values())) {
        queue.end();
      }
      this.subscribers.delete(taskId);
    }
  }

  /** Ends every subscription for the task and forgets its replay buffer. */
  release(taskId: string) {
    const forTask = this.subscribers.get(taskId);
    this.subscribers.delete(taskId);
    this.replay.delete(taskId);
    for (const queue of forTask?.values() ?? []) {
      queue.end();
    }
  }

  subscriberCount(taskId?: string) {
    if (taskId !== undefined) {
      return this.subscribers.get(taskId)?.size ?? 0;
    }
    let total = 0;
    for (const forTask of this.subscribers.values()) {
      total += forTask.size;
    }
    return total;
  }

  private overflow(queue: SubscriberQueue) {
    const notice: SubscriberOverflowNotice = {
      type: 'subscriber_overflow',
      taskId: queue.taskId,
      at: new Date().toISOString(),
      queueDepth: this.options.queueDepth,
      lastQueuedRevision: queue.lastQueuedRevision,
    };
    this.options.logger.warn('subscriber overflowed its queue and was detached', {
      taskId: queue.taskId,
      subscriberId: queue.id,
      queueDepth: this.options.queueDepth,
      lastQueuedRevision: queue.lastQueuedRevision,
    });
    this.detach(queue);
    queue.end(notice);
  }

  private detach(queue: SubscriberQueue) {
    const forTask = this.subscribers.get(queue.taskId);
    if (!forTask) return;
    forTask.delete(queue.id);
    if (forTask.size === 0) {
      this.subscribers.delete(queue.taskId);
    }
  }
}
