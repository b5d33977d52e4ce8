import { InjectQueue } from '@nestjs/bullmq';
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { Queue } from 'bullmq';
import pipelineConfig from '../../../config/pipeline.config';
import { PROCESS_TICKET_JOB, TICKET_QUEUE, TicketDraft } from '../tickets.types';
import { TicketQueue } from './ticket-queue';

/**
 * Redis-backed ticket queue. The ticket id doubles as the job id, so a
 * retried enqueue of the same draft does not create a second job.
 */
@Injectable()
export class BullTicketQueue extends TicketQueue {
  private readonly logger = new Logger(BullTicketQueue.name);

  constructor(
    @InjectQueue(TICKET_QUEUE)
    private readonly queue: Queue<TicketDraft>,
    @Inject(pipelineConfig.KEY)
    private readonly config: ConfigType<typeof pipelineConfig>,
  ) {
    super();
  }

  async enqueue(draft: TicketDraft): Promise<void> {
    await this.queue.add(PROCESS_TICKET_JOB, draft, {
      jobId: draft.ticketId,
      attempts: this.config.maxAttempts,
      backoff: { type: 'exponential', delay: 2000 },
      removeOnComplete: true,
      removeOnFail: false,
    });
    this.logger.log(`Queued ticket ${draft.ticketId}`);
  }
}
