import { OutboxEventEntity } from '@/modules/outbox/entities/outbox-event.entity';
import { OUTBOX_STORE } from '@/modules/outbox/outbox.tokens';
import { OutboxStore } from '@/modules/outbox/repository/outbox.repository';
import { IWebhookConfig } from '@/shared/interfaces/relay-config.interface';
import { AppConfigService } from '@/shared/services/config.service';
import { Semaphore } from '@/shared/utils/semaphore.util';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { WebhookDeliveryEntity } from './entities/webhook-delivery.entity';
import { WebhookEndpointEntity } from './entities/webhook-endpoint.entity';
import { WebhookDeliveryStore } from './repository/webhook-delivery.repository';
import { WebhookEndpointStore } from './repository/webhook-endpoint.repository';
import { WebhookSenderService } from './webhook-sender.service';
import { WEBHOOK_DELIVERY_STORE, WEBHOOK_ENDPOINT_STORE } from './webhook.tokens';

export interface WorkerRunResult {
  events: number;
  attempted: number;
  succeeded: number;
  failed: number;
  delivered: number;
}

interface PairHistory {
  succeeded: boolean;
  failures: number;
  lastAttemptAt: Date;
}

/**
 * Endpoints that want `event`: the type is subscribed and the endpoint is
 * either global (no tenant) or scoped to the event's tenant.
 */
export const matchEndpoints = (
  event: Pick<OutboxEventEntity, 'eventType' | 'tenantId'>,
  endpoints: WebhookEndpointEntity[],
): WebhookEndpointEntity[] =>
  endpoints.filter(
    (endpoint) =>
      endpoint.eventTypes.includes(event.eventType) &&
      (endpoint.tenantId === null || endpoint.tenantId === event.tenantId),
  );

const pairKey = (eventId: string, endpointId: number): string => `${eventId}:${endpointId}`;

const earliest = (current: number | null, candidate: number): number =>
  current === null ? candidate : Math.min(current, candidate);

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

interface EventDeliveryResult {
  attempted: number;
  succeeded: number;
  settled: boolean;
  // epoch ms at which the earliest outstanding pair leaves backoff
  nextAttemptAt: number | null;
}

@Injectable()
export class WebhookWorkerService {
  private readonly logger = new Logger(WebhookWorkerService.name);
  private readonly config: IWebhookConfig;
  private readonly semaphore: Semaphore;
  // attempts whose delivery row could not be written, kept until the event settles
  private readonly unloggedAttempts = new Map<string, PairHistory>();

  constructor(
    @Inject(OUTBOX_STORE) private readonly outbox: OutboxStore,
    @Inject(WEBHOOK_ENDPOINT_STORE) private readonly endpoints: WebhookEndpointStore,
    @Inject(WEBHOOK_DELIVERY_STORE) private readonly deliveries: WebhookDeliveryStore,
    private readonly sender: WebhookSenderService,
    configService: AppConfigService,
  ) {
    this.config = configService.webhookConfig;
    this.semaphore = new Semaphore(this.config.maxConcurrentDeliveries);
  }

  /**
   * Deliver one batch of published, not yet delivered events that have a
   * delivery due. Events are taken oldest first; the endpoints of one event
   * are called concurrently.
   */
  async runOnce(): Promise<WorkerRunResult> {
    const result: WorkerRunResult = { events: 0, attempted: 0, succeeded: 0, failed: 0, delivered: 0 };

    const endpoints = await this.endpoints.findActive();
    if (endpoints.length === 0) {
      return result;
    }

    const events = await this.outbox.findUndelivered(this.config.batchSize, new Date());
    if (events.length === 0) {
      return result;
    }

    result.events = events.length;
    const history = this.summarize(
      await this.deliveries.findByEventIds(events.map((event) => event.eventId)),
    );

    for (const [index, event] of events.entries()) {
      const matched = matchEndpoints(event, endpoints);
      const { attempted, succeeded, settled, nextAttemptAt } = await this.deliverEvent(
        event,
        matched,
        history,
      );

      result.attempted += attempted;
      result.succeeded += succeeded;
      result.failed += attempted - succeeded;

      if (settled) {
        try {
          await this.outbox.markDelivered(event.eventId, new Date());
          result.delivered++;
          this.forgetUnlogged(event.eventId, matched);
        } catch (error) {
          this.logger.error(`Failed to mark event ${event.eventId} as delivered`, error);
        }
      } else if (nextAttemptAt !== null) {
        try {
          await this.outbox.deferDelivery(event.eventId, new Date(nextAttemptAt));
        } catch (error) {
          this.logger.error(`Failed to defer delivery of event ${event.eventId}`, error);
        }
      }

      if (index < events.length - 1 && this.config.eventThrottleMs > 0) {
        await sleep(this.config.eventThrottleMs);
      }
    }

    if (result.attempted > 0) {
      this.logger.log(
        `Webhook batch complete: ${result.succeeded} succeeded, ${result.failed} failed, ${result.delivered} events settled`,
      );
    }

    return result;
  }

  async purgeDeliveries(olderThanDays: number = this.config.deliveryRetentionDays): Promise<number> {
    const cutoff = new Date(Date.now() - olderThanDays * 24 * 60 * 60 * 1000);
    const deleted = await this.deliveries.deleteBefore(cutoff);

    this.logger.log(`Deleted ${deleted} webhook deliveries older than ${olderThanDays} days`);

    return deleted;
  }

  /**
   * Attempts every due (event, endpoint) pair. `settled` is true once no
   * matching pair can produce another attempt.
   */
  private async deliverEvent(
    event: OutboxEventEntity,
    matched: WebhookEndpointEntity[],
    history: Map<string, PairHistory>,
  ): Promise<EventDeliveryResult> {
    const now = Date.now();
    const due: WebhookEndpointEntity[] = [];
    let settled = true;
    let nextAttemptAt: number | null = null;

    for (const endpoint of matched) {
      const pair = this.pairHistory(pairKey(event.eventId, endpoint.id), history);
      if (!pair) {
        due.push(endpoint);
        continue;
      }
      if (pair.succeeded || this.isExhausted(endpoint, pair.failures)) {
        continue;
      }

      const retryAt = this.retryAt(pair.lastAttemptAt.getTime(), pair.failures);
      if (retryAt <= now) {
        due.push(endpoint);
      } else {
        settled = false;
        nextAttemptAt = earliest(nextAttemptAt, retryAt);
      }
    }

    const results = await Promise.allSettled(
      due.map((endpoint) => this.semaphore.run(() => this.sender.send(event, endpoint))),
    );

    const finishedAt = Date.now();
    let succeeded = 0;
    for (const [i, outcome] of results.entries()) {
      const endpoint = due[i];
      const key = pairKey(event.eventId, endpoint.id);
      const failures = (this.pairHistory(key, history)?.failures ?? 0) + 1;
      const success = outcome.status === 'fulfilled' && outcome.value.success;
      if (outcome.status === 'rejected' || !outcome.value.logged) {
        this.rememberUnlogged(key, success, new Date(finishedAt));
      }

      if (success) {
        succeeded++;
        continue;
      }

      if (!this.isExhausted(endpoint, failures)) {
        settled = false;
        nextAttemptAt = earliest(nextAttemptAt, this.retryAt(finishedAt, failures));
      } else {
        this.logger.warn(
          `Giving up on event ${event.eventId} for endpoint ${endpoint.id} after ${failures} attempts`,
        );
      }
    }

    return { attempted: due.length, succeeded, settled, nextAttemptAt };
  }

  private retryAt(lastAttemptAt: number, failures: number): number {
    return lastAttemptAt + this.config.retryDelaySeconds * failures * 1000;
  }

  /** Delivery rows merged with attempts that never made it into the log. */
  private pairHistory(key: string, history: Map<string, PairHistory>): PairHistory | undefined {
    const logged = history.get(key);
    const unlogged = this.unloggedAttempts.get(key);
    if (!logged || !unlogged) {
      return logged ?? unlogged;
    }

    return {
      succeeded: logged.succeeded || unlogged.succeeded,
      failures: logged.failures + unlogged.failures,
      lastAttemptAt:
        unlogged.lastAttemptAt > logged.lastAttemptAt ? unlogged.lastAttemptAt : logged.lastAttemptAt,
    };
  }

  private rememberUnlogged(key: string, success: boolean, at: Date): void {
    const entry = this.unloggedAttempts.get(key) ?? {
      succeeded: false,
      failures: 0,
      lastAttemptAt: at,
    };
    if (success) {
      entry.succeeded = true;
    } else {
      entry.failures++;
    }
    entry.lastAttemptAt = at;

    this.unloggedAttempts.set(key, entry);
  }

  private forgetUnlogged(eventId: string, matched: WebhookEndpointEntity[]): void {
    for (const endpoint of matched) {
      this.unloggedAttempts.delete(pairKey(eventId, endpoint.id));
    }
  }

  // first attempt plus maxRetries retries
  private isExhausted(endpoint: WebhookEndpointEntity, failures: number): boolean {
    return failures >= endpoint.maxRetries + 1;
  }

  private summarize(rows: WebhookDeliveryEntity[]): Map<string, PairHistory> {
    const history = new Map<string, PairHistory>();
    for (const row of rows) {
      const key = pairKey(row.eventId, row.endpointId);
      const pair = history.get(key) ?? {
        succeeded: false,
        failures: 0,
        lastAttemptAt: row.attemptedAt,
      };

      if (row.success) {
        pair.succeeded = true;
      } else {
        pair.failures++;
      }
      if (row.attemptedAt > pair.lastAttemptAt) {
        pair.lastAttemptAt = row.attemptedAt;
      }

      history.set(key, pair);
    }

    return history;
  }
}
