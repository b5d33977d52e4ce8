import { OnWorkerEvent, Processor, WorkerHost } from '@nestjs/bullmq';
import { Inject, Logger, OnApplicationBootstrap } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { Job } from 'bullmq';
import { runWithContext } from '../../../common/logger/request-context';
import pipelineConfig from '../../../config/pipeline.config';
import { TicketProcessingService } from '../services/ticket-processing.service';
import { TICKET_QUEUE, TicketDraft } from '../tickets.types';

/** The parts of a BullMQ job the processor reads. */
export type TicketJob = Pick<Job<TicketDraft>, 'id' | 'data' | 'attemptsMade' | 'opts'>;

/**
 * BullMQ consumer of ticket drafts. A thrown error fails the attempt and
 * BullMQ retries it with backoff; stalled jobs are picked up again by
 * BullMQ's own stall detection.
 */
@Processor(TICKET_QUEUE)
export class TicketJobProcessor extends WorkerHost implements OnApplicationBootstrap {
  private readonly logger = new Logger(TicketJobProcessor.name);

  constructor(
    private readonly processingService: TicketProcessingService,
    @Inject(pipelineConfig.KEY)
    private readonly config: ConfigType<typeof pipelineConfig>,
  ) {
    super();
  }

  onApplicationBootstrap(): void {
    this.worker.concurrency = Math.max(1, this.config.workerConcurrency);
  }

  async process(job: TicketJob): Promise<void> {
    const draft = job.data;
    await runWithContext({ correlationId: draft.ticketId, ticketId: draft.ticketId }, async () => {
      this.logger.log(`Processing ticket ${draft.ticketId} (attempt ${job.attemptsMade + 1})`);
      await this.processingService.process(draft);
    });
  }

  @OnWorkerEvent('failed')
  onFailed(job: TicketJob | undefined, error: Error): void {
    if (!job) {
      this.logger.error(`Ticket job failed outside of a job: ${error.message}`);
      return;
    }

    const attempts = job.opts.attempts ?? 1;
    if (job.attemptsMade >= attempts) {
      // left in the failed set for manual recovery
      this.logger.error(
        `Ticket ${job.data.ticketId} exhausted ${job.attemptsMade} attempts, moved to dead letters: ${error.message}`,
        error.stack,
      );
      return;
    }
    this.logger.warn(`Ticket ${job.data.ticketId} failed attempt ${job.attemptsMade}, retrying: ${error.message}`);
  }
}
