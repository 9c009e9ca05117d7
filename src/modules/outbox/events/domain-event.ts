import { randomUUID } from 'crypto';

export type EventPayload = Record<string, unknown>;

export interface DomainEventInput<TPayload extends EventPayload = EventPayload> {
  eventId?: string;
  eventType: string;
  aggregateType: string;
  aggregateId: string;
  payload: TPayload;
  metadata?: EventPayload | null;
  tenantId?: number | null;
  occurredAt?: Date;
}

/**
 * One domain occurrence, as handed to the dispatcher by a producer.
 */
export interface DomainEvent<TPayload extends EventPayload = EventPayload> {
  readonly eventId: string;
  readonly eventType: string;
  readonly aggregateType: string;
  readonly aggregateId: string;
  readonly payload: Readonly<TPayload>;
  readonly metadata: Readonly<EventPayload> | null;
  readonly tenantId: number | null;
  readonly occurredAt: Date;
}

export function createDomainEvent<TPayload extends EventPayload>(
  input: DomainEventInput<TPayload>,
): DomainEvent<TPayload> {
  return Object.freeze({
    eventId: input.eventId?.trim() ? input.eventId : randomUUID(),
    eventType: input.eventType,
    aggregateType: input.aggregateType,
    aggregateId: input.aggregateId,
    payload: input.payload,
    metadata: input.metadata ?? null,
    tenantId: input.tenantId ?? null,
    occurredAt: input.occurredAt ?? new Date(),
  });
}
