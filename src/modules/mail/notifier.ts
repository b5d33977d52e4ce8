import { RequesterContact, TicketOutcome } from '../tickets/tickets.types';

/**
 * Tells a requester how their ticket was decided. Resolves once the message
 * is handed off; rejects when delivery failed.
 */
export abstract class Notifier {
  abstract notify(contact: RequesterContact, outcome: TicketOutcome): Promise<void>;
}
