import { WebhookSchedulerService } from '../webhook-scheduler.service';
import { WebhookWorkerService } from '../webhook-worker.service';

describe('WebhookSchedulerService', () => {
  const createMockWorker = () => ({
    runOnce: jest.fn().mockResolvedValue({ events: 0, attempted: 0, succeeded: 0, failed: 0, delivered: 0 }),
    purgeDeliveries: jest.fn().mockResolvedValue(0),
  });

  it('should not overlap delivery runs', async () => {
    const worker = createMockWorker();
    const scheduler = new WebhookSchedulerService(worker as unknown as WebhookWorkerService);
    let finish: () => void = () => undefined;
    worker.runOnce.mockReturnValueOnce(
      new Promise<void>((resolve) => {
        finish = () => resolve();
      }),
    );

    const running = scheduler.deliverWebhooks();
    await scheduler.deliverWebhooks();
    finish();
    await running;

    expect(worker.runOnce).toHaveBeenCalledTimes(1);
  });

  it('should swallow purge failures into the log', async () => {
    const worker = createMockWorker();
    worker.purgeDeliveries.mockRejectedValueOnce(new Error('database unavailable'));
    const scheduler = new WebhookSchedulerService(worker as unknown as WebhookWorkerService);

    await expect(scheduler.cleanupOldDeliveries()).resolves.toBeUndefined();
  });
});
