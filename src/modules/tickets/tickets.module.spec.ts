import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import pipelineConfig from '../../config/pipeline.config';
import { Notifier } from '../mail/notifier';
import { LogNotifier } from '../mail/services/log-notifier.service';
import { InMemoryTicketQueue } from './queue/in-memory-ticket-queue';
import { TicketQueue } from './queue/ticket-queue';
import { InMemoryTicketStore } from './store/in-memory-ticket-store';
import { TicketStore } from './store/ticket-store';
import { TicketsModule } from './tickets.module';

describe('TicketsModule', () => {
  it('should wire the in-memory adapters', async () => {
    const module = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, load: [pipelineConfig] }),
        TicketsModule.register({ queue: 'memory', store: 'memory', notifier: 'log' }),
      ],
    }).compile();

    expect(module.get(TicketQueue)).toBeInstanceOf(InMemoryTicketQueue);
    expect(module.get(TicketStore)).toBeInstanceOf(InMemoryTicketStore);
    expect(module.get(Notifier, { strict: false })).toBeInstanceOf(LogNotifier);

    await module.close();
  });

  it('should register the BullMQ queue and TypeORM repository for networked drivers', () => {
    const dynamic = TicketsModule.register({ queue: 'bullmq', store: 'typeorm', notifier: 'log' });

    expect(dynamic.imports).toHaveLength(3);
    expect(dynamic.exports).toEqual([TicketQueue, TicketStore, expect.any(Function)]);
  });
});
