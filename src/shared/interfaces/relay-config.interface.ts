export interface IOutboxConfig {
  batchSize: number;
  maxRetries: number;
  retryDelayMinutes: number;
  retentionDays: number;
}

export interface IWebhookConfig {
  batchSize: number;
  maxConcurrentDeliveries: number;
  eventThrottleMs: number;
  retryDelaySeconds: number;
  deliveryRetentionDays: number;
  userAgent: string;
}
