import { EventDispatcherService } from '../event-dispatcher.service';
import { OutboxSchedulerService } from '../outbox-scheduler.service';

const createMockDispatcher = () => ({
  processPending: jest.fn().mockResolvedValue({ processed: 0, succeeded: 0, failed: 0, skipped: 0 }),
  purge: jest.fn().mockResolvedValue(0),
  getFailedEvents: jest.fn().mockResolvedValue([]),
});

describe('OutboxSchedulerService', () => {
  let dispatcher: ReturnType<typeof createMockDispatcher>;
  let scheduler: OutboxSchedulerService;

  beforeEach(() => {
    dispatcher = createMockDispatcher();
    scheduler = new OutboxSchedulerService(dispatcher as unknown as EventDispatcherService);
  });

  it('should not start a run while one is in flight', async () => {
    let finish: () => void = () => undefined;
    dispatcher.processPending.mockReturnValueOnce(
      new Promise((resolve) => {
        finish = () => resolve({ processed: 1, succeeded: 1, failed: 0, skipped: 0 });
      }),
    );

    const running = scheduler.processOutboxEvents();
    await scheduler.processOutboxEvents();
    finish();
    await running;

    expect(dispatcher.processPending).toHaveBeenCalledTimes(1);
  });

  it('should keep ticking after a failed run', async () => {
    dispatcher.processPending.mockRejectedValueOnce(new Error('connection lost'));

    await expect(scheduler.processOutboxEvents()).resolves.toBeUndefined();
    await scheduler.processOutboxEvents();

    expect(dispatcher.processPending).toHaveBeenCalledTimes(2);
  });

  it('should stop polling once shutting down', async () => {
    await scheduler.onModuleDestroy();
    await scheduler.processOutboxEvents();

    expect(dispatcher.processPending).not.toHaveBeenCalled();
  });

  it('should purge with the configured retention', async () => {
    await scheduler.cleanupOldEvents();

    expect(dispatcher.purge).toHaveBeenCalledWith();
  });
});
