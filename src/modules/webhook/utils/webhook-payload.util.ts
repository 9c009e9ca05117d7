import * as crypto from 'crypto';
import { OutboxEventEntity } from '@/modules/outbox/entities/outbox-event.entity';

export const SIGNATURE_HEADER = 'X-Hub-Signature-256';
export const DELIVERY_HEADER = 'X-Webhook-Delivery';

export type WebhookEventSource = Pick<
  OutboxEventEntity,
  | 'eventId'
  | 'eventType'
  | 'aggregateType'
  | 'aggregateId'
  | 'payload'
  | 'metadata'
  | 'tenantId'
  | 'createdAt'
>;

/**
 * JSON body POSTed to subscribers.
 */
export interface WebhookPayload {
  event_id: string;
  event_type: string;
  aggregate_type: string;
  aggregate_id: string;
  payload: Record<string, unknown>;
  metadata: Record<string, unknown>;
  timestamp: string;
  tenant_id: number | null;
}

export const buildWebhookPayload = (event: WebhookEventSource): WebhookPayload => ({
  event_id: event.eventId,
  event_type: event.eventType,
  aggregate_type: event.aggregateType,
  aggregate_id: event.aggregateId,
  payload: event.payload,
  metadata: event.metadata ?? {},
  timestamp: event.createdAt.toISOString(),
  tenant_id: event.tenantId,
});

export const serializeWebhookPayload = (payload: WebhookPayload): string =>
  JSON.stringify(payload);

export const signPayload = (secret: string, body: string): string =>
  `sha256=${crypto.createHmac('sha256', secret).update(body).digest('hex')}`;

export const buildWebhookHeaders = (
  body: string,
  secret: string | null,
  userAgent: string,
  now: Date = new Date(),
): Record<string, string> => {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': userAgent,
    [DELIVERY_HEADER]: String(now.getTime() / 1000),
  };

  if (secret) {
    headers[SIGNATURE_HEADER] = signPayload(secret, body);
  }

  return headers;
};
