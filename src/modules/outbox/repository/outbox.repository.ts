import { Injectable } from '@nestjs/common';
import {
  DataSource,
  EntityManager,
  FindOptionsWhere,
  In,
  IsNull,
  LessThan,
  LessThanOrEqual,
  Repository,
} from 'typeorm';
import { OutboxEventEntity } from '../entities/outbox-event.entity';
import { EventStatus } from '../enums/event-status.enum';

export interface CreateOutboxEventData {
  eventId: string;
  eventType: string;
  aggregateType: string;
  aggregateId: string;
  payload: Record<string, unknown>;
  metadata: Record<string, unknown> | null;
  tenantId: number | null;
  occurredAt: Date;
  maxRetries: number;
}

export interface FindPendingOptions {
  limit: number;
  now: Date;
  eventTypes?: string[];
}

export type OutboxEventPatch = Partial<
  Pick<
    OutboxEventEntity,
    | 'status'
    | 'retryCount'
    | 'processedAt'
    | 'nextRetryAt'
    | 'lastError'
    | 'deliveredAt'
    | 'nextDeliveryAt'
  >
>;

/**
 * Persistence port for outbox records. Every method takes an optional unit of
 * work; without one it runs on the default connection.
 */
export interface OutboxStore {
  create(data: CreateOutboxEventData, manager: EntityManager): Promise<OutboxEventEntity>;
  findByEventId(eventId: string, manager?: EntityManager): Promise<OutboxEventEntity | null>;
  findPending(options: FindPendingOptions, manager?: EntityManager): Promise<OutboxEventEntity[]>;
  findProcessable(limit: number, now: Date, manager?: EntityManager): Promise<OutboxEventEntity[]>;
  /**
   * PUBLISHED records not yet delivered whose next webhook attempt is due at `now`.
   */
  findUndelivered(limit: number, now: Date, manager?: EntityManager): Promise<OutboxEventEntity[]>;
  findFailed(limit: number, manager?: EntityManager): Promise<OutboxEventEntity[]>;
  /**
   * Conditional update: applies `patch` only while the record is in one of
   * `from` (and, when given, still has `retryCount`). Resolves to whether a row changed.
   */
  transition(
    eventId: string,
    from: EventStatus[],
    patch: OutboxEventPatch,
    expectedRetryCount?: number,
    manager?: EntityManager,
  ): Promise<boolean>;
  markDelivered(eventId: string, at: Date, manager?: EntityManager): Promise<void>;
  deferDelivery(eventId: string, until: Date, manager?: EntityManager): Promise<void>;
  deletePublishedBefore(cutoff: Date, manager?: EntityManager): Promise<number>;
  countByStatus(manager?: EntityManager): Promise<Record<EventStatus, number>>;
  findOldestPendingCreatedAt(manager?: EntityManager): Promise<Date | null>;
}

@Injectable()
export class OutboxRepository implements OutboxStore {
  constructor(private readonly dataSource: DataSource) {}

  private repo(manager?: EntityManager): Repository<OutboxEventEntity> {
    return (manager ?? this.dataSource.manager).getRepository(OutboxEventEntity);
  }

  /**
   * Insert through the caller's unit of work so the row shares the fate of
   * the business change it describes.
   */
  async create(data: CreateOutboxEventData, manager: EntityManager): Promise<OutboxEventEntity> {
    const repo = this.repo(manager);
    const entity = repo.create({
      ...data,
      status: EventStatus.PENDING,
      retryCount: 0,
      processedAt: null,
      nextRetryAt: null,
      lastError: null,
      deliveredAt: null,
      nextDeliveryAt: null,
    });

    return repo.save(entity);
  }

  async findByEventId(eventId: string, manager?: EntityManager): Promise<OutboxEventEntity | null> {
    return this.repo(manager).findOneBy({ eventId });
  }

  async findPending(
    { limit, now, eventTypes }: FindPendingOptions,
    manager?: EntityManager,
  ): Promise<OutboxEventEntity[]> {
    const base: FindOptionsWhere<OutboxEventEntity> = { status: EventStatus.PENDING };
    if (eventTypes && eventTypes.length > 0) {
      base.eventType = In(eventTypes);
    }

    return this.repo(manager).find({
      where: [
        { ...base, nextRetryAt: IsNull() },
        { ...base, nextRetryAt: LessThanOrEqual(now) },
      ],
      order: { createdAt: 'ASC' },
      take: limit,
    });
  }

  async findProcessable(
    limit: number,
    now: Date,
    manager?: EntityManager,
  ): Promise<OutboxEventEntity[]> {
    return this.repo(manager).find({
      where: [
        { status: EventStatus.PENDING, nextRetryAt: IsNull() },
        { status: EventStatus.PENDING, nextRetryAt: LessThanOrEqual(now) },
        { status: EventStatus.RETRYING, nextRetryAt: LessThanOrEqual(now) },
      ],
      order: { createdAt: 'ASC' },
      take: limit,
    });
  }

  async findUndelivered(
    limit: number,
    now: Date,
    manager?: EntityManager,
  ): Promise<OutboxEventEntity[]> {
    const base: FindOptionsWhere<OutboxEventEntity> = {
      status: EventStatus.PUBLISHED,
      deliveredAt: IsNull(),
    };

    return this.repo(manager).find({
      where: [
        { ...base, nextDeliveryAt: IsNull() },
        { ...base, nextDeliveryAt: LessThanOrEqual(now) },
      ],
      order: { createdAt: 'ASC' },
      take: limit,
    });
  }

  async findFailed(limit: number, manager?: EntityManager): Promise<OutboxEventEntity[]> {
    return this.repo(manager).find({
      where: { status: EventStatus.FAILED },
      order: { createdAt: 'ASC' },
      take: limit,
    });
  }

  async transition(
    eventId: string,
    from: EventStatus[],
    patch: OutboxEventPatch,
    expectedRetryCount?: number,
    manager?: EntityManager,
  ): Promise<boolean> {
    const where: FindOptionsWhere<OutboxEventEntity> = { eventId, status: In(from) };
    if (expectedRetryCount !== undefined) {
      where.retryCount = expectedRetryCount;
    }

    const result = await this.repo(manager).update(where, patch);
    return (result.affected ?? 0) > 0;
  }

  async markDelivered(eventId: string, at: Date, manager?: EntityManager): Promise<void> {
    await this.repo(manager).update(
      { eventId, status: EventStatus.PUBLISHED, deliveredAt: IsNull() },
      { deliveredAt: at, nextDeliveryAt: null },
    );
  }

  async deferDelivery(eventId: string, until: Date, manager?: EntityManager): Promise<void> {
    await this.repo(manager).update(
      { eventId, status: EventStatus.PUBLISHED, deliveredAt: IsNull() },
      { nextDeliveryAt: until },
    );
  }

  async deletePublishedBefore(cutoff: Date, manager?: EntityManager): Promise<number> {
    const result = await this.repo(manager).delete({
      status: EventStatus.PUBLISHED,
      processedAt: LessThan(cutoff),
    });

    return result.affected ?? 0;
  }

  async countByStatus(manager?: EntityManager): Promise<Record<EventStatus, number>> {
    const rows = await this.repo(manager)
      .createQueryBuilder('event')
      .select('event.status', 'status')
      .addSelect('COUNT(*)', 'count')
      .groupBy('event.status')
      .getRawMany<{ status: EventStatus; count: string }>();

    const counts: Record<EventStatus, number> = {
      [EventStatus.PENDING]: 0,
      [EventStatus.PROCESSING]: 0,
      [EventStatus.PUBLISHED]: 0,
      [EventStatus.RETRYING]: 0,
      [EventStatus.FAILED]: 0,
    };
    for (const row of rows) {
      counts[row.status] = Number(row.count);
    }

    return counts;
  }

  async findOldestPendingCreatedAt(manager?: EntityManager): Promise<Date | null> {
    const oldest = await this.repo(manager).findOne({
      where: { status: In([EventStatus.PENDING, EventStatus.RETRYING]) },
      order: { createdAt: 'ASC' },
      select: { createdAt: true },
    });

    return oldest?.createdAt ?? null;
  }
}
