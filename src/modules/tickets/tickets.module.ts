import { BullModule } from '@nestjs/bullmq';
import { DynamicModule, Module, ModuleMetadata, Provider } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { v4 as uuidv4 } from 'uuid';
import { PipelineDrivers } from '../../config/pipeline.config';
import { MailModule } from '../mail/mail.module';
import { TicketsController } from './controllers/tickets.controller';
import { TicketRecord } from './entities/ticket-record.entity';
import { TicketJobProcessor } from './processors/ticket-job.processor';
import { BullTicketQueue } from './queue/bull-ticket-queue';
import { InMemoryTicketQueue } from './queue/in-memory-ticket-queue';
import { TicketQueue } from './queue/ticket-queue';
import { TicketQueueWorker } from './queue/ticket-queue.worker';
import { TicketIntakeService } from './services/ticket-intake.service';
import { TicketProcessingService } from './services/ticket-processing.service';
import { InMemoryTicketStore } from './store/in-memory-ticket-store';
import { TicketStore } from './store/ticket-store';
import { TypeOrmTicketStore } from './store/typeorm-ticket-store';
import { TICKET_CLOCK, TICKET_ID_GENERATOR } from './tickets.tokens';
import { TICKET_QUEUE } from './tickets.types';

/**
 * Intake, queue, processing and storage of warranty tickets. The queue,
 * store and notifier adapters are picked by the drivers; everything else
 * only sees their abstract classes.
 */
@Module({})
export class TicketsModule {
  static register(drivers: PipelineDrivers): DynamicModule {
    const imports: NonNullable<ModuleMetadata['imports']> = [MailModule.register(drivers.notifier)];
    const providers: Provider[] = [
      TicketIntakeService,
      TicketProcessingService,
      { provide: TICKET_CLOCK, useValue: () => new Date() },
      { provide: TICKET_ID_GENERATOR, useValue: () => uuidv4() },
    ];

    if (drivers.queue === 'bullmq') {
      imports.push(BullModule.registerQueue({ name: TICKET_QUEUE }));
      providers.push(BullTicketQueue, TicketJobProcessor, { provide: TicketQueue, useExisting: BullTicketQueue });
    } else {
      providers.push(InMemoryTicketQueue, TicketQueueWorker, {
        provide: TicketQueue,
        useExisting: InMemoryTicketQueue,
      });
    }

    if (drivers.store === 'typeorm') {
      imports.push(TypeOrmModule.forFeature([TicketRecord]));
      providers.push(TypeOrmTicketStore, { provide: TicketStore, useExisting: TypeOrmTicketStore });
    } else {
      providers.push(InMemoryTicketStore, { provide: TicketStore, useExisting: InMemoryTicketStore });
    }

    return {
      module: TicketsModule,
      imports,
      controllers: [TicketsController],
      providers,
      exports: [TicketQueue, TicketStore, TicketProcessingService],
    };
  }
}
