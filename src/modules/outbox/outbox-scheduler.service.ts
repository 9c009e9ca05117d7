import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { EventDispatcherService } from './event-dispatcher.service';

@Injectable()
export class OutboxSchedulerService implements OnModuleDestroy {
  private readonly logger = new Logger(OutboxSchedulerService.name);
  private isProcessing = false;
  private isShuttingDown = false;

  constructor(private readonly dispatcher: EventDispatcherService) {}

  async onModuleDestroy() {
    this.logger.log('Outbox scheduler shutting down...');
    this.isShuttingDown = true;

    while (this.isProcessing) {
      await new Promise((resolve) => setTimeout(resolve, 100));
    }

    this.logger.log('Outbox scheduler shutdown complete');
  }

  /**
   * Consumer loop, every 5 seconds
   */
  @Cron(CronExpression.EVERY_5_SECONDS)
  async processOutboxEvents(): Promise<void> {
    if (this.isProcessing || this.isShuttingDown) {
      return;
    }

    this.isProcessing = true;

    try {
      const result = await this.dispatcher.processPending();
      if (result.processed === 0) {
        return;
      }

      this.logger.log(
        `Batch processing complete: ${result.succeeded} succeeded, ${result.failed} failed, ${result.skipped} skipped`,
      );
    } catch (error) {
      this.logger.error('Error in outbox processing loop', error);
    } finally {
      this.isProcessing = false;
    }
  }

  @Cron(CronExpression.EVERY_DAY_AT_2AM)
  async cleanupOldEvents(): Promise<void> {
    try {
      this.logger.log('Starting cleanup of old published events');
      await this.dispatcher.purge();
    } catch (error) {
      this.logger.error('Error during cleanup', error);
    }
  }

  @Cron(CronExpression.EVERY_HOUR)
  async monitorFailedEvents(): Promise<void> {
    try {
      const failedEvents = await this.dispatcher.getFailedEvents();

      if (failedEvents.length > 0) {
        this.logger.warn(
          `ALERT: ${failedEvents.length} outbox events exceeded max retries: ${failedEvents
            .map((e) => e.eventId)
            .join(', ')}`,
        );
      }
    } catch (error) {
      this.logger.error('Error monitoring failed events', error);
    }
  }
}
