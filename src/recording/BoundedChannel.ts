import { createError } from './errors';

interface PendingReceive<T> {
  resolve: (item: T | undefined) => void;
  timer: NodeJS.Timeout | null;
}

interface PendingPush<T> {
  item: T;
  resolve: (accepted: boolean) => void;
}

/**
 * Fixed-capacity FIFO between one producer and one consumer.
 *
 * `push` waits while the channel is full, so a slow consumer slows the producer. Callers that
 * must not wait indefinitely watch `isFull()` instead. Once closed, pushes resolve `false`
 * immediately and the item is counted as dropped, unless `countsAsDropped` leaves it out.
 */
export class BoundedChannel<T extends {}> {
  private readonly items: T[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private readonly senders: PendingPush<T>[] = [];
  private closed = false;
  private dropped = 0;

  constructor(
    readonly capacity: number,
    private readonly countsAsDropped: (item: T) => boolean = () => true,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw createError(`Channel capacity must be a positive integer, got ${capacity}`, 400);
    }
  }

  get size() {
    return this.items.length;
  }

  isFull() {
    return this.items.length >= this.capacity;
  }

  isClosed() {
    return this.closed;
  }

  getDroppedCount() {
    return this.dropped;
  }

  push(item: T): Promise<boolean> {
    if (this.closed) {
      this.drop(item);
      return Promise.resolve(false);
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      this.settleReceiver(receiver, item);
      return Promise.resolve(true);
    }
    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      this.senders.push({ item, resolve });
    });
  }

  /** Resolves the next item, or `undefined` when `timeoutMs` elapses or the channel closes. */
  receive(timeoutMs?: number): Promise<T | undefined> {
    const next = this.items.shift();
    if (next !== undefined) {
      this.admitPendingSender();
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise<T | undefined>((resolve) => {
      const pending: PendingReceive<T> = { resolve, timer: null };
      if (timeoutMs !== undefined) {
        pending.timer = setTimeout(() => {
          const index = this.receivers.indexOf(pending);
          if (index !== -1) this.receivers.splice(index, 1);
          resolve(undefined);
        }, timeoutMs);
      }
      this.receivers.push(pending);
    });
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    this.items.splice(0).forEach((item) => this.drop(item));
    for (const sender of this.senders.splice(0)) {
      this.drop(sender.item);
      sender.resolve(false);
    }
    for (const receiver of this.receivers.splice(0)) {
      this.settleReceiver(receiver, undefined);
    }
  }

  private drop(item: T) {
    if (this.countsAsDropped(item)) this.dropped += 1;
  }

  private admitPendingSender() {
    const sender = this.senders.shift();
    if (!sender) return;
    this.items.push(sender.item);
    sender.resolve(true);
  }

  private settleReceiver(receiver: PendingReceive<T>, item: T | undefined) {
    if (receiver.timer) clearTimeout(receiver.timer);
    receiver.resolve(item);
  }
}
