import { Inject, Injectable, Logger } from '@nestjs/common';
import { QueueUnavailableException, TicketValidationException } from '../../../common/exceptions';
import { TicketQueue } from '../queue/ticket-queue';
import { Clock, IdGenerator, TICKET_CLOCK, TICKET_ID_GENERATOR } from '../tickets.tokens';
import { TicketRequest } from '../tickets.types';
import { validateTicketRequest } from '../validation/ticket.validator';

@Injectable()
export class TicketIntakeService {
  private readonly logger = new Logger(TicketIntakeService.name);

  constructor(
    private readonly queue: TicketQueue,
    @Inject(TICKET_CLOCK)
    private readonly clock: Clock,
    @Inject(TICKET_ID_GENERATOR)
    private readonly newTicketId: IdGenerator,
  ) {}

  /**
   * Validates a request and hands the draft to the queue. Resolves with the
   * ticket id only once the queue has taken the draft.
   */
  async submit(request: TicketRequest): Promise<string> {
    const result = validateTicketRequest(request, { now: this.clock(), newTicketId: this.newTicketId });
    if (!result.valid) {
      this.logger.log(`Ticket request rejected: ${result.errors.map((issue) => issue.reason).join(', ')}`);
      throw new TicketValidationException(result.errors);
    }

    const { draft } = result;
    try {
      await this.queue.enqueue(draft);
    } catch (error) {
      this.logger.error(
        `Failed to enqueue ticket ${draft.ticketId}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new QueueUnavailableException();
    }

    this.logger.log(`Ticket ${draft.ticketId} accepted for processing`);
    return draft.ticketId;
  }
}
