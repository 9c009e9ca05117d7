import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { OutboxModule } from '../outbox/outbox.module';
import { WebhookDeliveryEntity } from './entities/webhook-delivery.entity';
import { WebhookEndpointEntity } from './entities/webhook-endpoint.entity';
import { WebhookDeliveryRepository } from './repository/webhook-delivery.repository';
import { WebhookEndpointRepository } from './repository/webhook-endpoint.repository';
import { WebhookManagerService } from './webhook-manager.service';
import { WebhookSchedulerService } from './webhook-scheduler.service';
import { WebhookSenderService } from './webhook-sender.service';
import { WebhookWorkerService } from './webhook-worker.service';
import { WEBHOOK_DELIVERY_STORE, WEBHOOK_ENDPOINT_STORE } from './webhook.tokens';

@Module({
  imports: [
    TypeOrmModule.forFeature([WebhookEndpointEntity, WebhookDeliveryEntity]),
    HttpModule,
    OutboxModule,
  ],
  providers: [
    WebhookEndpointRepository,
    WebhookDeliveryRepository,
    { provide: WEBHOOK_ENDPOINT_STORE, useExisting: WebhookEndpointRepository },
    { provide: WEBHOOK_DELIVERY_STORE, useExisting: WebhookDeliveryRepository },
    WebhookSenderService,
    WebhookWorkerService,
    WebhookManagerService,
    WebhookSchedulerService,
  ],
  exports: [WebhookManagerService, WebhookWorkerService],
})
export class WebhookModule {}
