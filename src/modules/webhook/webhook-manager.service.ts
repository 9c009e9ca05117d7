import { BusinessException } from '@/common/exceptions/business.exception';
import { EventType } from '@/modules/outbox/enums/event-type.enum';
import { ErrorCodeEnum } from '@/shared/constants/error-code.constant';
import { validateDto } from '@/shared/utils/validation.util';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { CreateWebhookEndpointDto } from './dto/create-webhook-endpoint.dto';
import { WebhookEndpointEntity } from './entities/webhook-endpoint.entity';
import { WebhookDeliveryStore } from './repository/webhook-delivery.repository';
import { WebhookEndpointStore } from './repository/webhook-endpoint.repository';
import { DeliveryOutcome, WebhookSenderService } from './webhook-sender.service';
import { WEBHOOK_DELIVERY_STORE, WEBHOOK_ENDPOINT_STORE } from './webhook.tokens';

export interface CreateWebhookEndpointInput {
  name: string;
  url: string;
  eventTypes: string[];
  secret?: string | null;
  active?: boolean;
  timeoutSeconds?: number;
  maxRetries?: number;
  tenantId?: number | null;
}

export interface EndpointStats {
  totalDeliveries: number;
  successfulDeliveries: number;
  failedDeliveries: number;
  successRate: number;
  averageDurationMs: number;
  periodDays: number;
}

@Injectable()
export class WebhookManagerService {
  private readonly logger = new Logger(WebhookManagerService.name);

  constructor(
    @Inject(WEBHOOK_ENDPOINT_STORE) private readonly endpoints: WebhookEndpointStore,
    @Inject(WEBHOOK_DELIVERY_STORE) private readonly deliveries: WebhookDeliveryStore,
    private readonly sender: WebhookSenderService,
  ) {}

  async createEndpoint(input: CreateWebhookEndpointInput): Promise<WebhookEndpointEntity> {
    const dto = validateDto(CreateWebhookEndpointDto, input, ErrorCodeEnum.WebhookEndpointInvalid);

    const endpoint = await this.endpoints.create({
      name: dto.name,
      url: dto.url,
      secret: dto.secret || null,
      eventTypes: [...new Set(dto.eventTypes)],
      active: dto.active ?? true,
      timeoutSeconds: dto.timeoutSeconds ?? 30,
      maxRetries: dto.maxRetries ?? 3,
      tenantId: dto.tenantId ?? null,
    });

    this.logger.log(`Webhook endpoint ${endpoint.id} created for ${endpoint.url}`);

    return endpoint;
  }

  async getEndpoint(id: number): Promise<WebhookEndpointEntity> {
    const endpoint = await this.endpoints.findById(id);
    if (!endpoint) {
      throw new BusinessException(ErrorCodeEnum.WebhookEndpointNotFound, String(id));
    }

    return endpoint;
  }

  async listEndpoints(tenantId?: number | null): Promise<WebhookEndpointEntity[]> {
    return this.endpoints.findAll(tenantId);
  }

  async setEndpointActive(id: number, active: boolean): Promise<WebhookEndpointEntity> {
    const updated = await this.endpoints.setActive(id, active);
    if (!updated) {
      throw new BusinessException(ErrorCodeEnum.WebhookEndpointNotFound, String(id));
    }

    this.logger.log(`Webhook endpoint ${id} ${active ? 'activated' : 'deactivated'}`);

    return this.getEndpoint(id);
  }

  /**
   * Sends a synthetic `webhook.test` event through the regular signing and
   * delivery path. Works for inactive endpoints too.
   */
  async testEndpoint(id: number): Promise<DeliveryOutcome> {
    const endpoint = await this.getEndpoint(id);

    return this.sender.send(
      {
        eventId: randomUUID(),
        eventType: EventType.WEBHOOK_TEST,
        aggregateType: 'test',
        aggregateId: 'test-123',
        payload: { message: 'This is a test webhook delivery' },
        metadata: { test: true },
        tenantId: endpoint.tenantId,
        createdAt: new Date(),
      },
      endpoint,
    );
  }

  async stats(id: number, days = 7): Promise<EndpointStats> {
    await this.getEndpoint(id);

    const since = new Date(Date.now() - days * 24 * 60 * 60 * 1000);
    const rows = await this.deliveries.findByEndpointSince(id, since);

    const total = rows.length;
    const successful = rows.filter((row) => row.success).length;
    const durations = rows
      .map((row) => row.durationMs)
      .filter((duration): duration is number => duration !== null);
    const average =
      durations.length > 0 ? durations.reduce((sum, d) => sum + d, 0) / durations.length : 0;

    return {
      totalDeliveries: total,
      successfulDeliveries: successful,
      failedDeliveries: total - successful,
      successRate: total > 0 ? successful / total : 0,
      averageDurationMs: Math.round(average * 100) / 100,
      periodDays: days,
    };
  }
}
