import { Module } from '@nestjs/common';
import { OutboxModule } from '../outbox/outbox.module';
import { HelpdeskEventLogHandler } from './helpdesk-event-log.handler';

@Module({
  imports: [OutboxModule],
  providers: [HelpdeskEventLogHandler],
})
export class HelpdeskEventsModule {}
