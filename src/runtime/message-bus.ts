/**
 * MessageBus - the broker capability every session talks through.
 *
 * Sessions only publish bytes to named queues and consume bytes from them. Delivery
 * guarantees, redelivery and connection recovery belong to the implementation.
 * `InMemoryMessageBus` runs everything inside one process.
 */

import { logger } from '../utils/logger.js';

const log = logger.child({ name: 'bus' });

export type MessageHandler = (body: Uint8Array) => void | Promise<void>;

export type TimeoutHandler = () => void | Promise<void>;

export interface MessageBus {
  start(): Promise<void>;
  stop(): Promise<void>;
  publish(queueName: string, body: Uint8Array): Promise<void>;
  /**
   * Consume every message on a queue until unsubscribed.
   */
  subscribe(queueName: string, onMessage: MessageHandler): Promise<void>;
  /**
   * Stop consuming a queue. Unsubscribing a queue without consumer is a no-op.
   */
  unsubscribe(queueName: string): Promise<void>;
  /**
   * Consume exactly one message from a queue, then stop. Without a timeout the
   * consumer waits indefinitely; with one, `onTimeout` runs if nothing arrived in time.
   */
  receiveOnce(
    queueName: string,
    timeoutMs: number | undefined,
    onMessage: MessageHandler,
    onTimeout?: TimeoutHandler | undefined
  ): Promise<void>;
}

interface Consumer {
  handler: MessageHandler;
  once: boolean;
  timer?: ReturnType<typeof setTimeout> | undefined;
}

interface QueueState {
  /** Messages not yet delivered, oldest first */
  buffer: Uint8Array[];
  consumer?: Consumer | undefined;
  dispatching: boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * In-process message bus.
 *
 * Queues are durable: messages published while a queue has no consumer wait for one.
 * Each queue has at most one consumer, and its messages are handed to the consumer
 * strictly in order, one at a time, never on the publishing call stack. Errors thrown
 * by handlers are logged and do not reach the publisher.
 *
 * @example
 * ```typescript
 * const bus = new InMemoryMessageBus();
 * await bus.start();
 * await bus.subscribe('jobs.1.progress', (body) => console.log(body.length));
 * await bus.publish('jobs.1.progress', new Uint8Array([1]));
 * await bus.drain();
 * ```
 */
export class InMemoryMessageBus implements MessageBus {
  private readonly queues = new Map<string, QueueState>();
  private readonly inFlight = new Set<Promise<void>>();
  private started = false;

  async start(): Promise<void> {
    this.started = true;
    log.debug('In-memory message bus started');
  }

  /**
   * Remove every consumer and wait for running handlers. Undelivered messages stay
   * queued.
   */
  async stop(): Promise<void> {
    for (const [queueName, state] of this.queues) {
      this.removeConsumer(queueName, state);
    }
    await this.drain();
    this.started = false;
    log.debug('In-memory message bus stopped');
  }

  async publish(queueName: string, body: Uint8Array): Promise<void> {
    this.assertStarted();
    const state = this.getQueue(queueName);
    state.buffer.push(body);
    log.debug('Published message', { queueName, bytes: body.byteLength });
    this.schedule(queueName, state);
  }

  async subscribe(queueName: string, onMessage: MessageHandler): Promise<void> {
    this.addConsumer(queueName, { handler: onMessage, once: false });
  }

  async unsubscribe(queueName: string): Promise<void> {
    const state = this.queues.get(queueName);
    if (state) {
      this.removeConsumer(queueName, state);
    }
  }

  async receiveOnce(
    queueName: string,
    timeoutMs: number | undefined,
    onMessage: MessageHandler,
    onTimeout?: TimeoutHandler | undefined
  ): Promise<void> {
    const consumer: Consumer = { handler: onMessage, once: true };
    const state = this.addConsumer(queueName, consumer);

    if (timeoutMs !== undefined && state.consumer === consumer) {
      consumer.timer = setTimeout(() => {
        if (state.consumer !== consumer) {
          return;
        }
        this.removeConsumer(queueName, state);
        log.debug('Timed out waiting for message', { queueName, timeoutMs });
        if (onTimeout) {
          this.track(queueName, async () => {
            await onTimeout();
          });
        }
      }, timeoutMs);
    }
  }

  /**
   * Wait until no handler is running or scheduled.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  /**
   * Number of messages waiting on a queue.
   */
  pendingMessages(queueName: string): number {
    return this.queues.get(queueName)?.buffer.length ?? 0;
  }

  /**
   * Number of queues that have a consumer, waiting messages or a running dispatch.
   * Idle queues are forgotten.
   */
  queueCount(): number {
    return this.queues.size;
  }

  /**
   * Whether a queue currently has a consumer.
   */
  hasConsumer(queueName: string): boolean {
    return this.queues.get(queueName)?.consumer !== undefined;
  }

  private assertStarted(): void {
    if (!this.started) {
      throw new Error('Message bus is not started');
    }
  }

  private getQueue(queueName: string): QueueState {
    let state = this.queues.get(queueName);
    if (!state) {
      state = { buffer: [], dispatching: false };
      this.queues.set(queueName, state);
    }
    return state;
  }

  private addConsumer(queueName: string, consumer: Consumer): QueueState {
    this.assertStarted();
    const state = this.getQueue(queueName);
    if (state.consumer) {
      throw new Error(`Queue ${queueName} already has a consumer`);
    }
    state.consumer = consumer;
    log.debug('Consumer added', { queueName, once: consumer.once });
    this.schedule(queueName, state);
    return state;
  }

  private removeConsumer(queueName: string, state: QueueState): void {
    if (state.consumer?.timer !== undefined) {
      clearTimeout(state.consumer.timer);
    }
    state.consumer = undefined;
    this.forgetIfIdle(queueName, state);
  }

  private forgetIfIdle(queueName: string, state: QueueState): void {
    if (!state.consumer && !state.dispatching && state.buffer.length === 0) {
      this.queues.delete(queueName);
    }
  }

  private schedule(queueName: string, state: QueueState): void {
    if (state.dispatching || !state.consumer || state.buffer.length === 0) {
      return;
    }
    state.dispatching = true;

    this.track(queueName, async () => {
      try {
        // Deliver on a later turn of the event loop, never on the caller's stack.
        await new Promise<void>((resolve) => setImmediate(resolve));
        for (;;) {
          const consumer = state.consumer;
          const body = state.buffer[0];
          if (!consumer || body === undefined) {
            break;
          }
          state.buffer.shift();
          if (consumer.once) {
            this.removeConsumer(queueName, state);
          }
          try {
            await consumer.handler(body);
          } catch (error) {
            log.error('Message handler failed', { queueName, error: errorMessage(error) });
          }
        }
      } finally {
        state.dispatching = false;
        this.forgetIfIdle(queueName, state);
      }
    });
  }

  private track(queueName: string, task: () => Promise<void>): void {
    const run = task().catch((error: unknown) => {
      log.error('Message dispatch failed', { queueName, error: errorMessage(error) });
    });
    this.inFlight.add(run);
    void run.finally(() => {
      this.inFlight.delete(run);
    });
  }
}
