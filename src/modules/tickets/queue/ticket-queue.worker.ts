import { Inject, Injectable, Logger, OnApplicationBootstrap, OnApplicationShutdown } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { runWithContext } from '../../../common/logger/request-context';
import pipelineConfig from '../../../config/pipeline.config';
import { TicketProcessingService } from '../services/ticket-processing.service';
import { DequeueAbortedError, InMemoryTicketQueue } from './in-memory-ticket-queue';
import { QueueDelivery } from './ticket-queue';

/**
 * Consumer loops for the in-memory queue. A delivery is acked only after the
 * processor finished; on failure it is left to the visibility timeout.
 */
@Injectable()
export class TicketQueueWorker implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(TicketQueueWorker.name);
  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];

  constructor(
    private readonly queue: InMemoryTicketQueue,
    private readonly processingService: TicketProcessingService,
    @Inject(pipelineConfig.KEY)
    private readonly config: ConfigType<typeof pipelineConfig>,
  ) {}

  onApplicationBootstrap(): void {
    this.start();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  start(): void {
    if (this.controller) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;

    const concurrency = Math.max(1, this.config.workerConcurrency);
    this.loops = Array.from({ length: concurrency }, (_, index) => this.consume(index, controller.signal));
    this.logger.log(`Started ${concurrency} ticket consumer(s)`);
  }

  /** Stops taking new deliveries and waits for in-flight ones to finish. */
  async stop(): Promise<void> {
    if (!this.controller) {
      return;
    }
    this.controller.abort();
    this.controller = null;
    await Promise.all(this.loops);
    this.loops = [];
  }

  async handle(delivery: QueueDelivery): Promise<void> {
    const { draft } = delivery;
    await runWithContext({ correlationId: draft.ticketId, ticketId: draft.ticketId }, async () => {
      try {
        await this.processingService.process(draft);
        delivery.ack();
      } catch (error) {
        this.logger.warn(
          `Ticket ${draft.ticketId} failed on delivery ${delivery.deliveryCount}, awaiting redelivery: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      }
    });
  }

  private async consume(index: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let delivery: QueueDelivery;
      try {
        delivery = await this.queue.dequeue(signal);
      } catch (error) {
        if (!(error instanceof DequeueAbortedError)) {
          this.logger.error(`Consumer ${index} stopped: ${error instanceof Error ? error.message : String(error)}`);
        }
        return;
      }
      await this.handle(delivery);
    }
  }
}
