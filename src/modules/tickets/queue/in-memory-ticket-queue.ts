import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import pipelineConfig from '../../../config/pipeline.config';
import { TicketDraft } from '../tickets.types';
import { QueueDelivery, TicketQueue } from './ticket-queue';

export class DequeueAbortedError extends Error {
  constructor(message = 'Dequeue aborted') {
    super(message);
    this.name = 'DequeueAbortedError';
  }
}

interface QueuedMessage {
  readonly id: number;
  readonly draft: TicketDraft;
  deliveryCount: number;
}

interface Waiter {
  resolve: (delivery: QueueDelivery) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort: () => void;
}

/**
 * In-process queue with at-least-once delivery.
 *
 * A dequeued draft stays in flight until acked. If no ack arrives within
 * the visibility timeout it becomes visible again; after `maxAttempts`
 * deliveries it is parked as a dead letter instead.
 */
@Injectable()
export class InMemoryTicketQueue extends TicketQueue implements OnModuleDestroy {
  private readonly logger = new Logger(InMemoryTicketQueue.name);
  private readonly pending: QueuedMessage[] = [];
  private readonly inFlight = new Map<number, { message: QueuedMessage; timer: NodeJS.Timeout }>();
  private readonly waiters: Waiter[] = [];
  private readonly deadLetters: TicketDraft[] = [];
  private nextId = 1;
  private closed = false;

  constructor(
    @Inject(pipelineConfig.KEY)
    private readonly config: ConfigType<typeof pipelineConfig>,
  ) {
    super();
  }

  async enqueue(draft: TicketDraft): Promise<void> {
    if (this.closed) {
      throw new Error('Ticket queue is closed');
    }
    // cloned before insertion so a failure leaves nothing half-queued
    const message: QueuedMessage = { id: this.nextId++, draft: structuredClone(draft), deliveryCount: 0 };
    this.push(message);
    this.logger.debug(`Enqueued ticket ${draft.ticketId}`);
  }

  /** Resolves with the next visible draft, waiting while the queue is empty. */
  dequeue(signal?: AbortSignal): Promise<QueueDelivery> {
    if (this.closed || signal?.aborted) {
      return Promise.reject(new DequeueAbortedError());
    }

    const message = this.pending.shift();
    if (message) {
      return Promise.resolve(this.deliver(message));
    }

    return new Promise<QueueDelivery>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        signal,
        onAbort: () => {
          this.removeWaiter(waiter);
          reject(new DequeueAbortedError());
        },
      };
      signal?.addEventListener('abort', waiter.onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  size(): number {
    return this.pending.length;
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  getDeadLetters(): readonly TicketDraft[] {
    return this.deadLetters;
  }

  close(): void {
    this.closed = true;
    for (const { timer } of this.inFlight.values()) {
      clearTimeout(timer);
    }
    for (const waiter of this.waiters.splice(0)) {
      waiter.signal?.removeEventListener('abort', waiter.onAbort);
      waiter.reject(new DequeueAbortedError('Ticket queue is closed'));
    }
  }

  onModuleDestroy(): void {
    this.close();
  }

  private push(message: QueuedMessage): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.signal?.removeEventListener('abort', waiter.onAbort);
      waiter.resolve(this.deliver(message));
      return;
    }
    this.pending.push(message);
  }

  private deliver(message: QueuedMessage): QueueDelivery {
    message.deliveryCount += 1;
    const timer = setTimeout(() => this.expire(message.id), this.config.visibilityTimeoutMs);
    timer.unref();
    this.inFlight.set(message.id, { message, timer });

    return {
      draft: structuredClone(message.draft),
      deliveryCount: message.deliveryCount,
      ack: () => this.ack(message.id),
    };
  }

  private ack(id: number): void {
    const entry = this.inFlight.get(id);
    if (entry) {
      clearTimeout(entry.timer);
      this.inFlight.delete(id);
      return;
    }
    // a late ack for a delivery that already timed out
    const index = this.pending.findIndex((message) => message.id === id);
    if (index >= 0) {
      this.pending.splice(index, 1);
    }
  }

  private expire(id: number): void {
    const entry = this.inFlight.get(id);
    if (!entry || this.closed) {
      return;
    }
    this.inFlight.delete(id);

    const { message } = entry;
    if (message.deliveryCount >= this.config.maxAttempts) {
      this.deadLetters.push(message.draft);
      this.logger.error(
        `Ticket ${message.draft.ticketId} exhausted ${message.deliveryCount} deliveries, moved to dead letters`,
      );
      return;
    }

    this.logger.warn(`Ticket ${message.draft.ticketId} was not acknowledged in time, redelivering`);
    this.push(message);
  }

  private removeWaiter(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) {
      this.waiters.splice(index, 1);
    }
  }
}
