import { Inject, Injectable, Logger } from '@nestjs/common';
import { Notifier } from '../../mail/notifier';
import { TicketStore } from '../store/ticket-store';
import { Clock, TICKET_CLOCK } from '../tickets.tokens';
import { contactOf, outcomeOf, Ticket, TicketDraft } from '../tickets.types';
import { evaluateEligibility } from '../validation/ticket.validator';

/**
 * Turns a queued draft into a stored, notified ticket.
 *
 * Safe to run more than once for the same draft: an existing record is never
 * rewritten, and the requester is only notified while the store has no
 * notification marker for the ticket. Store and notifier failures propagate
 * so the delivery is not acknowledged.
 */
@Injectable()
export class TicketProcessingService {
  private readonly logger = new Logger(TicketProcessingService.name);

  constructor(
    private readonly store: TicketStore,
    private readonly notifier: Notifier,
    @Inject(TICKET_CLOCK)
    private readonly clock: Clock,
  ) {}

  async process(draft: TicketDraft): Promise<Ticket> {
    const existing = await this.store.get(draft.ticketId);
    if (existing) {
      this.logger.debug(`Ticket ${draft.ticketId} was already processed, skipping write`);
      if (!(await this.store.isNotified(draft.ticketId))) {
        await this.deliver(existing);
      }
      return existing;
    }

    const issues = evaluateEligibility(draft);
    const ticket: Ticket = {
      ...draft,
      status: issues.length === 0 ? 'accepted' : 'rejected',
      rejectionReason: issues.length === 0 ? null : issues[0].reason,
      processedAt: this.clock().toISOString(),
    };

    await this.store.put(ticket);
    this.logger.log(
      `Ticket ${ticket.ticketId} ${ticket.status}${ticket.rejectionReason ? ` (${ticket.rejectionReason})` : ''}`,
    );

    await this.deliver(ticket);
    return ticket;
  }

  private async deliver(ticket: Ticket): Promise<void> {
    await this.notifier.notify(contactOf(ticket), outcomeOf(ticket));
    await this.store.markNotified(ticket.ticketId, this.clock());
  }
}
