import { Ticket } from '../tickets.types';

/**
 * Durable key-value storage of processed tickets, keyed by ticket id.
 * The notification marker lives beside the ticket, never inside it.
 */
export abstract class TicketStore {
  /** Upserts by id; never clears the notification marker. */
  abstract put(ticket: Ticket): Promise<void>;
  abstract get(ticketId: string): Promise<Ticket | null>;
  abstract isNotified(ticketId: string): Promise<boolean>;
  abstract markNotified(ticketId: string, at: Date): Promise<void>;
}

export class TicketNotFoundError extends Error {
  constructor(public readonly ticketId: string) {
    super(`Ticket ${ticketId} does not exist`);
    this.name = 'TicketNotFoundError';
  }
}
