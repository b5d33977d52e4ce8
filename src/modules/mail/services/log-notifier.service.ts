import { Injectable, Logger } from '@nestjs/common';
import { RequesterContact, TicketOutcome } from '../../tickets/tickets.types';
import { Notifier } from '../notifier';
import { MailTemplateService } from './mail-template.service';

/** Writes the rendered outcome message to the log instead of sending it. */
@Injectable()
export class LogNotifier extends Notifier {
  private readonly logger = new Logger(LogNotifier.name);

  constructor(private readonly templateService: MailTemplateService) {
    super();
  }

  async notify(contact: RequesterContact, outcome: TicketOutcome): Promise<void> {
    const { subject, text } = this.templateService.renderTicketOutcome(contact, outcome);
    this.logger.log({ message: `[DEV] ${subject}`, ticketId: outcome.ticketId, body: text });
  }
}
