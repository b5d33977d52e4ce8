import { Injectable } from '@nestjs/common';
import { Ticket } from '../tickets.types';
import { TicketNotFoundError, TicketStore } from './ticket-store';

interface StoredTicket {
  ticket: Ticket;
  notifiedAt: string | null;
}

/** Process-local store. Records are cloned on the way in and out. */
@Injectable()
export class InMemoryTicketStore extends TicketStore {
  private readonly records = new Map<string, StoredTicket>();

  async put(ticket: Ticket): Promise<void> {
    const existing = this.records.get(ticket.ticketId);
    this.records.set(ticket.ticketId, {
      ticket: structuredClone(ticket),
      notifiedAt: existing?.notifiedAt ?? null,
    });
  }

  async get(ticketId: string): Promise<Ticket | null> {
    const record = this.records.get(ticketId);
    return record ? structuredClone(record.ticket) : null;
  }

  async isNotified(ticketId: string): Promise<boolean> {
    return (this.records.get(ticketId)?.notifiedAt ?? null) !== null;
  }

  async markNotified(ticketId: string, at: Date): Promise<void> {
    const record = this.records.get(ticketId);
    if (!record) {
      throw new TicketNotFoundError(ticketId);
    }
    record.notifiedAt = at.toISOString();
  }

  size(): number {
    return this.records.size;
  }
}
