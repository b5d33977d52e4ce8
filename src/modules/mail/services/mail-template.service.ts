import { Injectable } from '@nestjs/common';
import * as Handlebars from 'handlebars';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { RequesterContact, TicketOutcome, TicketStatus } from '../../tickets/tickets.types';

export interface RenderedMessage {
  subject: string;
  text: string;
}

const STATUS_LABELS: Record<TicketStatus, string> = {
  accepted: 'APROVADO',
  rejected: 'REJEITADO',
};

export const TICKET_OUTCOME_TEMPLATE = join(__dirname, '..', 'templates', 'ticket-outcome.hbs');

/**
 * Renders the outcome message sent to requesters. The template is plain
 * text, so Handlebars escaping is off.
 */
@Injectable()
export class MailTemplateService {
  private readonly outcomeTemplate: Handlebars.TemplateDelegate;

  constructor() {
    this.outcomeTemplate = Handlebars.compile(readFileSync(TICKET_OUTCOME_TEMPLATE, 'utf8'), {
      noEscape: true,
      strict: true,
    });
  }

  renderTicketOutcome(contact: RequesterContact, outcome: TicketOutcome): RenderedMessage {
    return {
      subject: `Status do Ticket #${outcome.ticketId.slice(0, 8)}`,
      text: this.outcomeTemplate({
        name: contact.name,
        ticketId: outcome.ticketId,
        statusLabel: STATUS_LABELS[outcome.status],
        rejectionReason: outcome.rejectionReason ?? '',
        brand: outcome.device.brand,
        model: outcome.device.model,
        serialNumber: outcome.device.serialNumber,
        openedAt: outcome.openedAt,
      }),
    };
  }
}
