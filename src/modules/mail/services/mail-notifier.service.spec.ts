import { MailerService } from '@nestjs-modules/mailer';
import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { createTicket } from '../../../../test/helpers/mock-factories';
import { NotificationDeliveryError } from '../../../common/exceptions';
import { CallBreaker, circuitBreakerToken, createCallBreaker } from '../../../common/resilience/resilience.module';
import { contactOf, outcomeOf } from '../../tickets/tickets.types';
import { MailNotifier } from './mail-notifier.service';
import { MailTemplateService } from './mail-template.service';

describe('MailNotifier', () => {
  let notifier: MailNotifier;
  let breaker: CallBreaker;
  const mockMailerService = {
    sendMail: jest.fn(),
  };

  const ticket = createTicket({ status: 'rejected', rejectionReason: 'INVALID_SERIAL' });

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    mockMailerService.sendMail.mockResolvedValue({ messageId: 'test-message' });
    breaker = createCallBreaker({ name: 'mail' });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MailNotifier,
        MailTemplateService,
        { provide: MailerService, useValue: mockMailerService },
        { provide: circuitBreakerToken('mail'), useValue: breaker },
      ],
    }).compile();

    notifier = module.get(MailNotifier);
  });

  afterEach(() => {
    breaker.shutdown();
    jest.restoreAllMocks();
  });

  it('should mail the rendered outcome to the requester', async () => {
    await notifier.notify(contactOf(ticket), outcomeOf(ticket));

    expect(mockMailerService.sendMail).toHaveBeenCalledWith({
      to: 'maria.souza@example.com',
      subject: 'Status do Ticket #0b9f7c56',
      text: expect.stringContaining('Motivo: INVALID_SERIAL'),
    });
  });

  it('should reject with a delivery error when the mailer fails', async () => {
    mockMailerService.sendMail.mockRejectedValue(new Error('SMTP timeout'));

    const result = notifier.notify(contactOf(ticket), outcomeOf(ticket));

    await expect(result).rejects.toBeInstanceOf(NotificationDeliveryError);
    await expect(result).rejects.toThrow(
      'Notification for ticket 0b9f7c56-2f43-4c1a-9d0e-3a8f7b6c5d4e was not delivered: SMTP timeout',
    );
  });

  it('should not call the mailer while the breaker is open', async () => {
    breaker.open();

    await expect(notifier.notify(contactOf(ticket), outcomeOf(ticket))).rejects.toBeInstanceOf(
      NotificationDeliveryError,
    );
    expect(mockMailerService.sendMail).not.toHaveBeenCalled();
  });
});
