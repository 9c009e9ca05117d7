import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { WebhookWorkerService } from './webhook-worker.service';

@Injectable()
export class WebhookSchedulerService implements OnModuleDestroy {
  private readonly logger = new Logger(WebhookSchedulerService.name);
  private isProcessing = false;
  private isShuttingDown = false;

  constructor(private readonly worker: WebhookWorkerService) {}

  async onModuleDestroy() {
    this.isShuttingDown = true;

    while (this.isProcessing) {
      await new Promise((resolve) => setTimeout(resolve, 100));
    }

    this.logger.log('Webhook scheduler shutdown complete');
  }

  @Cron(CronExpression.EVERY_10_SECONDS)
  async deliverWebhooks(): Promise<void> {
    if (this.isProcessing || this.isShuttingDown) {
      return;
    }

    this.isProcessing = true;

    try {
      await this.worker.runOnce();
    } catch (error) {
      this.logger.error('Error in webhook delivery loop', error);
    } finally {
      this.isProcessing = false;
    }
  }

  @Cron(CronExpression.EVERY_DAY_AT_3AM)
  async cleanupOldDeliveries(): Promise<void> {
    try {
      await this.worker.purgeDeliveries();
    } catch (error) {
      this.logger.error('Error during delivery log cleanup', error);
    }
  }
}
