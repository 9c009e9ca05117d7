import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { DatabaseModule } from './infra/database/typeorm/database.module';
import { HelpdeskEventsModule } from './modules/helpdesk-events/helpdesk-events.module';
import { OutboxModule } from './modules/outbox/outbox.module';
import { WebhookModule } from './modules/webhook/webhook.module';
import { SharedModule } from './shared.module';

@Module({
  imports: [
    SharedModule,
    DatabaseModule,
    ScheduleModule.forRoot(),
    OutboxModule,
    WebhookModule,
    HelpdeskEventsModule,
  ],
})
export class AppModule {}
