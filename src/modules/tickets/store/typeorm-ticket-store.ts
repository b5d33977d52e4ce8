import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { TicketRecord } from '../entities/ticket-record.entity';
import { Ticket } from '../tickets.types';
import { TicketNotFoundError, TicketStore } from './ticket-store';

function toTicket(record: TicketRecord): Ticket {
  return {
    ticketId: record.ticketId,
    fullName: record.fullName,
    nationalId: record.nationalId,
    email: record.email,
    phone: record.phone,
    address: record.address,
    device: record.device,
    notes: record.notes,
    openedAt: record.openedAt,
    status: record.status,
    rejectionReason: record.rejectionReason,
    processedAt: record.processedAt,
  };
}

@Injectable()
export class TypeOrmTicketStore extends TicketStore {
  constructor(
    @InjectRepository(TicketRecord)
    private readonly repository: Repository<TicketRecord>,
  ) {
    super();
  }

  async put(ticket: Ticket): Promise<void> {
    // notified_at is left out so an upsert never overwrites the marker
    await this.repository.upsert(
      {
        ticketId: ticket.ticketId,
        fullName: ticket.fullName,
        nationalId: ticket.nationalId,
        email: ticket.email,
        phone: ticket.phone,
        address: { ...ticket.address },
        device: { ...ticket.device },
        notes: ticket.notes,
        status: ticket.status,
        rejectionReason: ticket.rejectionReason,
        openedAt: ticket.openedAt,
        processedAt: ticket.processedAt,
      },
      { conflictPaths: ['ticketId'] },
    );
  }

  async get(ticketId: string): Promise<Ticket | null> {
    const record = await this.repository.findOneBy({ ticketId });
    return record ? toTicket(record) : null;
  }

  async isNotified(ticketId: string): Promise<boolean> {
    const record = await this.repository.findOne({
      where: { ticketId },
      select: { ticketId: true, notifiedAt: true },
    });
    return record !== null && record.notifiedAt !== null;
  }

  async markNotified(ticketId: string, at: Date): Promise<void> {
    const result = await this.repository.update({ ticketId }, { notifiedAt: at.toISOString() });
    if (result.affected === 0) {
      throw new TicketNotFoundError(ticketId);
    }
  }
}
