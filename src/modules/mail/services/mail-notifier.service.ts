import { MailerService } from '@nestjs-modules/mailer';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { NotificationDeliveryError } from '../../../common/exceptions';
import { CallBreaker, circuitBreakerToken } from '../../../common/resilience/resilience.module';
import { RequesterContact, TicketOutcome } from '../../tickets/tickets.types';
import { Notifier } from '../notifier';
import { MailTemplateService } from './mail-template.service';

/**
 * Emails the outcome to the requester. Sends go through the mail circuit
 * breaker; a failed or short-circuited send rejects and the queue redelivers.
 */
@Injectable()
export class MailNotifier extends Notifier {
  private readonly logger = new Logger(MailNotifier.name);

  constructor(
    private readonly mailerService: MailerService,
    private readonly templateService: MailTemplateService,
    @Inject(circuitBreakerToken('mail'))
    private readonly breaker: CallBreaker,
  ) {
    super();
  }

  async notify(contact: RequesterContact, outcome: TicketOutcome): Promise<void> {
    const { subject, text } = this.templateService.renderTicketOutcome(contact, outcome);

    try {
      await this.breaker.fire(() => this.mailerService.sendMail({ to: contact.email, subject, text }));
    } catch (error) {
      this.logger.warn(
        `Outcome mail for ticket ${outcome.ticketId} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new NotificationDeliveryError(outcome.ticketId, error);
    }

    this.logger.log(`Outcome mail for ticket ${outcome.ticketId} sent (${outcome.status})`);
  }
}
