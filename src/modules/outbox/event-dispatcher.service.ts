import { BusinessException } from '@/common/exceptions/business.exception';
import { ErrorCodeEnum } from '@/shared/constants/error-code.constant';
import { IOutboxConfig } from '@/shared/interfaces/relay-config.interface';
import { AppConfigService } from '@/shared/services/config.service';
import { validateDto } from '@/shared/utils/validation.util';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { PublishEventDto } from './dto/publish-event.dto';
import { OutboxEventEntity } from './entities/outbox-event.entity';
import { canTransition, EventStatus, sourcesOf } from './enums/event-status.enum';
import { createDomainEvent, DomainEventInput } from './events/domain-event';
import { OUTBOX_STORE } from './outbox.tokens';
import { OutboxStore } from './repository/outbox.repository';

export type EventHandler = (event: OutboxEventEntity) => Promise<void> | void;

export interface ProcessPendingResult {
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface OutboxStats {
  totalEvents: number;
  pendingEvents: number;
  processingEvents: number;
  publishedEvents: number;
  retryingEvents: number;
  failedEvents: number;
  oldestPendingAge: number | null;
}

type ProcessOutcome = 'published' | 'failed' | 'skipped';

const MAX_ERROR_LENGTH = 1000;

@Injectable()
export class EventDispatcherService {
  private readonly logger = new Logger(EventDispatcherService.name);
  private readonly handlers = new Map<string, EventHandler[]>();
  private readonly config: IOutboxConfig;

  constructor(
    @Inject(OUTBOX_STORE) private readonly store: OutboxStore,
    configService: AppConfigService,
  ) {
    this.config = configService.outboxConfig;
  }

  /**
   * Save an event to the outbox table.
   * Runs on the caller's EntityManager and never opens a transaction of its own.
   */
  async publish(manager: EntityManager, input: DomainEventInput): Promise<OutboxEventEntity> {
    const event = createDomainEvent(input);
    validateDto(PublishEventDto, { ...event }, ErrorCodeEnum.EventValidationFailed);

    const record = await this.store.create(
      {
        eventId: event.eventId,
        eventType: event.eventType,
        aggregateType: event.aggregateType,
        aggregateId: event.aggregateId,
        payload: { ...event.payload },
        metadata: event.metadata ? { ...event.metadata } : null,
        tenantId: event.tenantId,
        occurredAt: event.occurredAt,
        maxRetries: this.config.maxRetries,
      },
      manager,
    );

    this.logger.debug(
      `Outbox event saved: ${record.eventType} for ${record.aggregateType}:${record.aggregateId}`,
    );

    return record;
  }

  async publishBatch(
    manager: EntityManager,
    inputs: DomainEventInput[],
  ): Promise<OutboxEventEntity[]> {
    const records: OutboxEventEntity[] = [];
    for (const input of inputs) {
      records.push(await this.publish(manager, input));
    }

    return records;
  }

  async listPending(
    limit: number = this.config.batchSize,
    eventTypes?: string[],
    manager?: EntityManager,
  ): Promise<OutboxEventEntity[]> {
    return this.store.findPending({ limit, now: new Date(), eventTypes }, manager);
  }

  /**
   * PENDING records plus RETRYING records whose backoff has elapsed, oldest first.
   */
  async listProcessable(limit: number = this.config.batchSize): Promise<OutboxEventEntity[]> {
    return this.store.findProcessable(limit, new Date());
  }

  async markProcessing(eventId: string): Promise<void> {
    const claimed = await this.claim(eventId);
    if (!claimed) {
      await this.rejectTransition(eventId, EventStatus.PROCESSING);
    }
  }

  async markPublished(eventId: string): Promise<void> {
    const updated = await this.store.transition(eventId, sourcesOf(EventStatus.PUBLISHED), {
      status: EventStatus.PUBLISHED,
      processedAt: new Date(),
      nextRetryAt: null,
    });

    if (!updated) {
      await this.rejectTransition(eventId, EventStatus.PUBLISHED);
    }

    this.logger.debug(`Outbox event marked as published: ${eventId}`);
  }

  /**
   * Record a failed attempt. The record goes to FAILED once `retryCount`
   * reaches `maxRetries`, otherwise to RETRYING with a linear backoff of
   * `retryDelayMinutes * retryCount`.
   */
  async markFailed(
    eventId: string,
    error: string,
    retryDelayMinutes: number = this.config.retryDelayMinutes,
  ): Promise<EventStatus> {
    const record = await this.store.findByEventId(eventId);
    if (!record) {
      throw new BusinessException(ErrorCodeEnum.OutboxEventNotFound, eventId);
    }

    const retryCount = record.retryCount + 1;
    const status = retryCount >= record.maxRetries ? EventStatus.FAILED : EventStatus.RETRYING;
    if (!canTransition(record.status, status)) {
      throw new BusinessException(
        ErrorCodeEnum.OutboxIllegalTransition,
        `${eventId}: ${record.status} -> ${status}`,
      );
    }

    const nextRetryAt =
      status === EventStatus.RETRYING
        ? new Date(Date.now() + retryDelayMinutes * retryCount * 60_000)
        : null;

    const updated = await this.store.transition(
      eventId,
      sourcesOf(status),
      { status, retryCount, nextRetryAt, lastError: error.substring(0, MAX_ERROR_LENGTH) },
      record.retryCount,
    );
    if (!updated) {
      // someone else moved the record between our read and write
      throw new BusinessException(
        ErrorCodeEnum.OutboxIllegalTransition,
        `${eventId} changed concurrently`,
      );
    }

    if (status === EventStatus.FAILED) {
      this.logger.error(`Outbox event ${eventId} failed permanently after ${retryCount} attempts`);
    } else {
      this.logger.warn(`Outbox event ${eventId} scheduled for retry ${retryCount}`);
    }

    return status;
  }

  /**
   * Handlers live in memory only; register them on every start before polling begins.
   */
  registerHandler(eventType: string, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType) ?? [];
    handlers.push(handler);
    this.handlers.set(eventType, handlers);

    this.logger.debug(`Handler registered for ${eventType}`);
  }

  /**
   * Claim the record and run its handlers. Never throws: a failing handler
   * routes the record to markFailed and resolves to false.
   */
  async process(record: OutboxEventEntity): Promise<boolean> {
    return (await this.processRecord(record)) === 'published';
  }

  async processPending(limit: number = this.config.batchSize): Promise<ProcessPendingResult> {
    const records = await this.listProcessable(limit);
    const result: ProcessPendingResult = {
      processed: records.length,
      succeeded: 0,
      failed: 0,
      skipped: 0,
    };

    for (const record of records) {
      const outcome = await this.processRecord(record);
      if (outcome === 'published') {
        result.succeeded++;
      } else if (outcome === 'failed') {
        result.failed++;
      } else {
        result.skipped++;
      }
    }

    return result;
  }

  async purge(olderThanDays: number = this.config.retentionDays): Promise<number> {
    const cutoff = new Date(Date.now() - olderThanDays * 24 * 60 * 60 * 1000);
    const deleted = await this.store.deletePublishedBefore(cutoff);

    this.logger.log(`Deleted ${deleted} published events older than ${olderThanDays} days`);

    return deleted;
  }

  async getFailedEvents(limit = 100): Promise<OutboxEventEntity[]> {
    return this.store.findFailed(limit);
  }

  async getStats(): Promise<OutboxStats> {
    const counts = await this.store.countByStatus();
    const oldest = await this.store.findOldestPendingCreatedAt();

    return {
      totalEvents: Object.values(counts).reduce((sum, count) => sum + count, 0),
      pendingEvents: counts[EventStatus.PENDING],
      processingEvents: counts[EventStatus.PROCESSING],
      publishedEvents: counts[EventStatus.PUBLISHED],
      retryingEvents: counts[EventStatus.RETRYING],
      failedEvents: counts[EventStatus.FAILED],
      // minutes
      oldestPendingAge: oldest ? Math.floor((Date.now() - oldest.getTime()) / 1000 / 60) : null,
    };
  }

  private async processRecord(record: OutboxEventEntity): Promise<ProcessOutcome> {
    let claimed: boolean;
    try {
      claimed = await this.claim(record.eventId);
    } catch (error) {
      this.logger.error(`Failed to claim outbox event ${record.eventId}`, errorMessage(error));
      return 'failed';
    }

    if (!claimed) {
      this.logger.debug(`Outbox event ${record.eventId} already claimed, skipping`);
      return 'skipped';
    }

    const claimedRecord = Object.assign(new OutboxEventEntity(), record, {
      status: EventStatus.PROCESSING,
    });

    try {
      for (const handler of this.handlers.get(record.eventType) ?? []) {
        await handler(claimedRecord);
      }
      await this.markPublished(record.eventId);

      return 'published';
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(
        `Failed to process event ${record.eventId} (attempt ${record.retryCount + 1}): ${message}`,
      );

      try {
        await this.markFailed(record.eventId, message);
      } catch (markError) {
        this.logger.error(`Failed to record failure for ${record.eventId}`, errorMessage(markError));
      }

      return 'failed';
    }
  }

  private async claim(eventId: string): Promise<boolean> {
    return this.store.transition(eventId, sourcesOf(EventStatus.PROCESSING), {
      status: EventStatus.PROCESSING,
    });
  }

  private async rejectTransition(eventId: string, to: EventStatus): Promise<never> {
    const record = await this.store.findByEventId(eventId);
    if (!record) {
      throw new BusinessException(ErrorCodeEnum.OutboxEventNotFound, eventId);
    }

    throw new BusinessException(
      ErrorCodeEnum.OutboxIllegalTransition,
      `${eventId}: ${record.status} -> ${to}`,
    );
  }
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
