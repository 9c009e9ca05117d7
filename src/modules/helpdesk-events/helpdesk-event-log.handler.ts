import { OutboxEventEntity } from '@/modules/outbox/entities/outbox-event.entity';
import { EventDispatcherService } from '@/modules/outbox/event-dispatcher.service';
import { HELPDESK_EVENT_TYPES } from '@/modules/outbox/events/helpdesk.event';
import { Injectable, Logger, OnModuleInit } from '@nestjs/common';

/**
 * Audit trail of helpdesk events as they leave the outbox.
 */
@Injectable()
export class HelpdeskEventLogHandler implements OnModuleInit {
  private readonly logger = new Logger(HelpdeskEventLogHandler.name);

  constructor(private readonly dispatcher: EventDispatcherService) {}

  onModuleInit() {
    for (const eventType of HELPDESK_EVENT_TYPES) {
      this.dispatcher.registerHandler(eventType, (event) => this.handle(event));
    }
  }

  handle(event: OutboxEventEntity): void {
    const tenant = event.tenantId === null ? 'global' : `tenant ${event.tenantId}`;
    this.logger.log(
      `${event.eventType} on ${event.aggregateType}:${event.aggregateId} (${tenant})`,
    );
  }
}
