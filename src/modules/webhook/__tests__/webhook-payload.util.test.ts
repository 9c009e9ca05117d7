import * as crypto from 'crypto';
import {
  buildWebhookHeaders,
  buildWebhookPayload,
  serializeWebhookPayload,
  signPayload,
  WebhookEventSource,
} from '../utils/webhook-payload.util';

const event: WebhookEventSource = {
  eventId: 'evt-1',
  eventType: 'ticket.created',
  aggregateType: 'ticket',
  aggregateId: '42',
  payload: { numero: 'TKT-1', tags: ['printer'] },
  metadata: null,
  tenantId: 1,
  createdAt: new Date('2025-01-02T03:04:05.678Z'),
};

describe('webhook payload', () => {
  it('should carry the event fields through serialization', () => {
    const body = serializeWebhookPayload(buildWebhookPayload(event));

    expect(JSON.parse(body)).toEqual({
      event_id: 'evt-1',
      event_type: 'ticket.created',
      aggregate_type: 'ticket',
      aggregate_id: '42',
      payload: { numero: 'TKT-1', tags: ['printer'] },
      metadata: {},
      timestamp: '2025-01-02T03:04:05.678Z',
      tenant_id: 1,
    });
  });

  it('should sign deterministically per secret and body', () => {
    const body = serializeWebhookPayload(buildWebhookPayload(event));
    const expected = crypto.createHmac('sha256', 's3cr3t').update(body).digest('hex');

    expect(signPayload('s3cr3t', body)).toBe(`sha256=${expected}`);
    expect(signPayload('s3cr3t', body)).toBe(signPayload('s3cr3t', body));
    expect(signPayload('other-secret', body)).not.toBe(signPayload('s3cr3t', body));
  });

  it('should change the signature when one byte changes', () => {
    const body = serializeWebhookPayload(buildWebhookPayload(event));
    const tampered = body.replace('TKT-1', 'TKT-2');

    expect(tampered).not.toBe(body);
    expect(signPayload('s3cr3t', tampered)).not.toBe(signPayload('s3cr3t', body));
  });

  it('should only add the signature header when a secret is set', () => {
    const now = new Date('2025-01-01T00:00:00.500Z');

    expect(buildWebhookHeaders('{}', null, 'Helpdesk-Webhook/1.0', now)).toEqual({
      'Content-Type': 'application/json',
      'User-Agent': 'Helpdesk-Webhook/1.0',
      'X-Webhook-Delivery': '1735689600.5',
    });

    expect(buildWebhookHeaders('{}', 'test-secret', 'Helpdesk-Webhook/1.0', now)).toHaveProperty(
      'X-Hub-Signature-256',
      signPayload('test-secret', '{}'),
    );
  });
});
