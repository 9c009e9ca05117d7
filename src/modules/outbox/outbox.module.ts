import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { OutboxEventEntity } from './entities/outbox-event.entity';
import { EventDispatcherService } from './event-dispatcher.service';
import { OutboxSchedulerService } from './outbox-scheduler.service';
import { OUTBOX_STORE } from './outbox.tokens';
import { OutboxRepository } from './repository/outbox.repository';

@Module({
  imports: [TypeOrmModule.forFeature([OutboxEventEntity])],
  providers: [
    OutboxRepository,
    { provide: OUTBOX_STORE, useExisting: OutboxRepository },
    EventDispatcherService,
    OutboxSchedulerService,
  ],
  exports: [EventDispatcherService, OUTBOX_STORE],
})
export class OutboxModule {}
