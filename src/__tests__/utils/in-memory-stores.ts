import { OutboxEventEntity } from '@/modules/outbox/entities/outbox-event.entity';
import { EventStatus } from '@/modules/outbox/enums/event-status.enum';
import {
  CreateOutboxEventData,
  FindPendingOptions,
  OutboxEventPatch,
  OutboxStore,
} from '@/modules/outbox/repository/outbox.repository';
import { WebhookDeliveryEntity } from '@/modules/webhook/entities/webhook-delivery.entity';
import { WebhookEndpointEntity } from '@/modules/webhook/entities/webhook-endpoint.entity';
import {
  CreateWebhookDeliveryData,
  WebhookDeliveryStore,
} from '@/modules/webhook/repository/webhook-delivery.repository';
import {
  CreateWebhookEndpointData,
  WebhookEndpointStore,
} from '@/modules/webhook/repository/webhook-endpoint.repository';

const byCreation = (a: OutboxEventEntity, b: OutboxEventEntity): number =>
  a.createdAt.getTime() - b.createdAt.getTime() || Number(a.id) - Number(b.id);

const isDue = (event: OutboxEventEntity, now: Date): boolean =>
  event.nextRetryAt === null || event.nextRetryAt <= now;

/**
 * Map-backed OutboxStore. Reads hand out copies, as a database would.
 */
export class InMemoryOutboxStore implements OutboxStore {
  readonly rows = new Map<string, OutboxEventEntity>();
  private sequence = 0;

  async create(data: CreateOutboxEventData): Promise<OutboxEventEntity> {
    if (this.rows.has(data.eventId)) {
      throw new Error(`duplicate key value violates unique constraint "event_id"`);
    }

    const entity = Object.assign(new OutboxEventEntity(), {
      ...data,
      id: String(++this.sequence),
      status: EventStatus.PENDING,
      retryCount: 0,
      createdAt: new Date(),
      processedAt: null,
      nextRetryAt: null,
      lastError: null,
      deliveredAt: null,
      nextDeliveryAt: null,
    });
    this.rows.set(entity.eventId, entity);

    return this.copy(entity);
  }

  /** Test accessor for the stored row itself. */
  get(eventId: string): OutboxEventEntity | undefined {
    return this.rows.get(eventId);
  }

  async findByEventId(eventId: string): Promise<OutboxEventEntity | null> {
    const row = this.rows.get(eventId);
    return row ? this.copy(row) : null;
  }

  async findPending({ limit, now, eventTypes }: FindPendingOptions): Promise<OutboxEventEntity[]> {
    return this.select(
      (e) =>
        e.status === EventStatus.PENDING &&
        isDue(e, now) &&
        (!eventTypes || eventTypes.length === 0 || eventTypes.includes(e.eventType)),
      limit,
    );
  }

  async findProcessable(limit: number, now: Date): Promise<OutboxEventEntity[]> {
    return this.select(
      (e) =>
        (e.status === EventStatus.PENDING && isDue(e, now)) ||
        (e.status === EventStatus.RETRYING && e.nextRetryAt !== null && e.nextRetryAt <= now),
      limit,
    );
  }

  async findUndelivered(limit: number, now: Date): Promise<OutboxEventEntity[]> {
    return this.select(
      (e) =>
        e.status === EventStatus.PUBLISHED &&
        e.deliveredAt === null &&
        (e.nextDeliveryAt === null || e.nextDeliveryAt <= now),
      limit,
    );
  }

  async findFailed(limit: number): Promise<OutboxEventEntity[]> {
    return this.select((e) => e.status === EventStatus.FAILED, limit);
  }

  async transition(
    eventId: string,
    from: EventStatus[],
    patch: OutboxEventPatch,
    expectedRetryCount?: number,
  ): Promise<boolean> {
    const row = this.rows.get(eventId);
    if (!row || !from.includes(row.status)) {
      return false;
    }
    if (expectedRetryCount !== undefined && row.retryCount !== expectedRetryCount) {
      return false;
    }

    Object.assign(row, patch);
    return true;
  }

  async markDelivered(eventId: string, at: Date): Promise<void> {
    const row = this.rows.get(eventId);
    if (row && row.status === EventStatus.PUBLISHED && row.deliveredAt === null) {
      row.deliveredAt = at;
      row.nextDeliveryAt = null;
    }
  }

  async deferDelivery(eventId: string, until: Date): Promise<void> {
    const row = this.rows.get(eventId);
    if (row && row.status === EventStatus.PUBLISHED && row.deliveredAt === null) {
      row.nextDeliveryAt = until;
    }
  }

  async deletePublishedBefore(cutoff: Date): Promise<number> {
    let deleted = 0;
    for (const [eventId, row] of this.rows) {
      if (row.status === EventStatus.PUBLISHED && row.processedAt !== null && row.processedAt < cutoff) {
        this.rows.delete(eventId);
        deleted++;
      }
    }

    return deleted;
  }

  async countByStatus(): Promise<Record<EventStatus, number>> {
    const counts: Record<EventStatus, number> = {
      [EventStatus.PENDING]: 0,
      [EventStatus.PROCESSING]: 0,
      [EventStatus.PUBLISHED]: 0,
      [EventStatus.RETRYING]: 0,
      [EventStatus.FAILED]: 0,
    };
    for (const row of this.rows.values()) {
      counts[row.status]++;
    }

    return counts;
  }

  async findOldestPendingCreatedAt(): Promise<Date | null> {
    const [oldest] = this.sorted().filter(
      (e) => e.status === EventStatus.PENDING || e.status === EventStatus.RETRYING,
    );
    return oldest ? oldest.createdAt : null;
  }

  private select(predicate: (e: OutboxEventEntity) => boolean, limit: number): OutboxEventEntity[] {
    return this.sorted()
      .filter(predicate)
      .slice(0, limit)
      .map((e) => this.copy(e));
  }

  private sorted(): OutboxEventEntity[] {
    return [...this.rows.values()].sort(byCreation);
  }

  private copy(entity: OutboxEventEntity): OutboxEventEntity {
    return Object.assign(new OutboxEventEntity(), entity);
  }
}

export class InMemoryWebhookEndpointStore implements WebhookEndpointStore {
  readonly rows: WebhookEndpointEntity[] = [];
  private sequence = 0;

  async create(data: CreateWebhookEndpointData): Promise<WebhookEndpointEntity> {
    const now = new Date();
    const entity = Object.assign(new WebhookEndpointEntity(), {
      ...data,
      eventTypes: [...data.eventTypes],
      id: ++this.sequence,
      createdAt: now,
      updatedAt: now,
    });
    this.rows.push(entity);

    return entity;
  }

  async findById(id: number): Promise<WebhookEndpointEntity | null> {
    return this.rows.find((e) => e.id === id) ?? null;
  }

  async findActive(): Promise<WebhookEndpointEntity[]> {
    return this.rows.filter((e) => e.active);
  }

  async findAll(tenantId?: number | null): Promise<WebhookEndpointEntity[]> {
    return tenantId === undefined ? [...this.rows] : this.rows.filter((e) => e.tenantId === tenantId);
  }

  async setActive(id: number, active: boolean): Promise<boolean> {
    const endpoint = this.rows.find((e) => e.id === id);
    if (!endpoint) {
      return false;
    }

    endpoint.active = active;
    endpoint.updatedAt = new Date();
    return true;
  }
}

export class InMemoryWebhookDeliveryStore implements WebhookDeliveryStore {
  readonly rows: WebhookDeliveryEntity[] = [];
  private sequence = 0;

  async create(data: CreateWebhookDeliveryData): Promise<WebhookDeliveryEntity> {
    return this.insert(data, new Date());
  }

  /** Seeds a historical attempt with an explicit timestamp. */
  insert(data: CreateWebhookDeliveryData, attemptedAt: Date): WebhookDeliveryEntity {
    const entity = Object.assign(new WebhookDeliveryEntity(), {
      ...data,
      id: String(++this.sequence),
      attemptedAt,
    });
    this.rows.push(entity);

    return entity;
  }

  async findByEventIds(eventIds: string[]): Promise<WebhookDeliveryEntity[]> {
    return this.rows.filter((row) => eventIds.includes(row.eventId));
  }

  async findByEndpointSince(endpointId: number, since: Date): Promise<WebhookDeliveryEntity[]> {
    return this.rows.filter((row) => row.endpointId === endpointId && row.attemptedAt >= since);
  }

  async deleteBefore(cutoff: Date): Promise<number> {
    const kept = this.rows.filter((row) => row.attemptedAt >= cutoff);
    const deleted = this.rows.length - kept.length;
    this.rows.splice(0, this.rows.length, ...kept);

    return deleted;
  }
}
