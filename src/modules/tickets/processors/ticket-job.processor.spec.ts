import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { createTicket, createTicketDraft, TICKET_ID } from '../../../../test/helpers/mock-factories';
import { getRequestContext } from '../../../common/logger/request-context';
import pipelineConfig from '../../../config/pipeline.config';
import { TicketProcessingService } from '../services/ticket-processing.service';
import { TicketJob, TicketJobProcessor } from './ticket-job.processor';

describe('TicketJobProcessor', () => {
  let processor: TicketJobProcessor;
  const mockProcessingService = {
    process: jest.fn(),
  };

  function job(overrides: Partial<TicketJob> = {}): TicketJob {
    return { id: TICKET_ID, data: createTicketDraft(), attemptsMade: 0, opts: { attempts: 5 }, ...overrides };
  }

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();
    mockProcessingService.process.mockResolvedValue(createTicket());

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TicketJobProcessor,
        { provide: TicketProcessingService, useValue: mockProcessingService },
        {
          provide: pipelineConfig.KEY,
          useValue: { visibilityTimeoutMs: 30000, maxAttempts: 5, workerConcurrency: 2 },
        },
      ],
    }).compile();

    processor = module.get(TicketJobProcessor);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('process', () => {
    it('should hand the draft to the processing service', async () => {
      const ticketJob = job();

      await processor.process(ticketJob);

      expect(mockProcessingService.process).toHaveBeenCalledWith(ticketJob.data);
    });

    it('should run with the ticket id in the logging context', async () => {
      let seen: string | undefined = undefined;
      mockProcessingService.process.mockImplementation(async () => {
        seen = getRequestContext()?.correlationId;
      });

      await processor.process(job());

      expect(seen).toBe(TICKET_ID);
    });

    it('should rethrow so BullMQ retries the job', async () => {
      mockProcessingService.process.mockRejectedValue(new Error('SMTP timeout'));

      await expect(processor.process(job())).rejects.toThrow('SMTP timeout');
    });
  });

  describe('onFailed', () => {
    it('should warn while attempts remain', () => {
      processor.onFailed(job({ attemptsMade: 2 }), new Error('SMTP timeout'));

      expect(Logger.prototype.warn).toHaveBeenCalledWith(
        `Ticket ${TICKET_ID} failed attempt 2, retrying: SMTP timeout`,
      );
      expect(Logger.prototype.error).not.toHaveBeenCalled();
    });

    it('should report a dead letter once attempts are exhausted', () => {
      const error = new Error('SMTP timeout');

      processor.onFailed(job({ attemptsMade: 5 }), error);

      expect(Logger.prototype.error).toHaveBeenCalledWith(
        `Ticket ${TICKET_ID} exhausted 5 attempts, moved to dead letters: SMTP timeout`,
        error.stack,
      );
    });
  });
});
