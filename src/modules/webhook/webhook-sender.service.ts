import { AppConfigService } from '@/shared/services/config.service';
import { HttpService } from '@nestjs/axios';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { isAxiosError } from 'axios';
import { WebhookEndpointEntity } from './entities/webhook-endpoint.entity';
import {
  CreateWebhookDeliveryData,
  WebhookDeliveryStore,
} from './repository/webhook-delivery.repository';
import {
  buildWebhookHeaders,
  buildWebhookPayload,
  serializeWebhookPayload,
  WebhookEventSource,
} from './utils/webhook-payload.util';
import { WEBHOOK_DELIVERY_STORE } from './webhook.tokens';

type AttemptResult = Pick<
  CreateWebhookDeliveryData,
  'success' | 'statusCode' | 'responseBody' | 'durationMs' | 'errorMessage'
>;

export interface DeliveryOutcome extends AttemptResult {
  // false when the delivery row could not be written
  logged: boolean;
}

const MAX_RESPONSE_BODY_LENGTH = 10_000;
const MAX_CONTENT_LENGTH = 1024 * 1024;
// ERR_CANCELED is the abort signal firing at the endpoint's deadline
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);

const isTimeout = (error: unknown): boolean =>
  (isAxiosError(error) && TIMEOUT_CODES.has(error.code ?? '')) ||
  (error instanceof Error && error.name === 'AbortError');

/**
 * Signs and POSTs one event to one endpoint. Every call writes exactly one
 * delivery row and resolves with its outcome; nothing is thrown to the caller.
 */
@Injectable()
export class WebhookSenderService {
  private readonly logger = new Logger(WebhookSenderService.name);
  private readonly userAgent: string;

  constructor(
    private readonly httpService: HttpService,
    @Inject(WEBHOOK_DELIVERY_STORE) private readonly deliveries: WebhookDeliveryStore,
    configService: AppConfigService,
  ) {
    this.userAgent = configService.webhookConfig.userAgent;
  }

  async send(event: WebhookEventSource, endpoint: WebhookEndpointEntity): Promise<DeliveryOutcome> {
    const payload = buildWebhookPayload(event);
    const body = serializeWebhookPayload(payload);
    const headers = buildWebhookHeaders(body, endpoint.secret, this.userAgent);

    let outcome: AttemptResult;
    let responseHeaders: Record<string, string> | null = null;

    const startedAt = Date.now();
    try {
      const response = await this.httpService.axiosRef.post<string>(endpoint.url, body, {
        headers,
        // axios' timeout only fires on an idle socket; the signal caps the whole exchange
        timeout: endpoint.timeoutSeconds * 1000,
        signal: AbortSignal.timeout(endpoint.timeoutSeconds * 1000),
        responseType: 'text',
        maxContentLength: MAX_CONTENT_LENGTH,
        // the signed string goes out untouched, and non-2xx is an outcome, not an error
        transformRequest: [(data: string) => data],
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });

      const success = response.status >= 200 && response.status < 300;
      responseHeaders = flattenHeaders(response.headers);
      outcome = {
        success,
        statusCode: response.status,
        responseBody: toText(response.data).substring(0, MAX_RESPONSE_BODY_LENGTH),
        durationMs: Date.now() - startedAt,
        errorMessage: success ? null : `HTTP ${response.status}`,
      };

      if (success) {
        this.logger.log(`Webhook delivered to ${endpoint.url} for event ${event.eventId}`);
      } else {
        this.logger.warn(
          `Webhook delivery failed with status ${response.status} to ${endpoint.url}`,
        );
      }
    } catch (error) {
      const timedOut = isTimeout(error);
      const errorMessage = timedOut
        ? `Webhook delivery timeout to ${endpoint.url}`
        : `Webhook delivery error to ${endpoint.url}: ${
            error instanceof Error ? error.message : String(error)
          }`;

      if (timedOut) {
        this.logger.warn(errorMessage);
      } else {
        this.logger.error(errorMessage);
      }

      outcome = {
        success: false,
        statusCode: null,
        responseBody: null,
        durationMs: null,
        errorMessage,
      };
    }

    const logged = await this.record({
      ...outcome,
      endpointId: endpoint.id,
      eventId: event.eventId,
      url: endpoint.url,
      httpMethod: 'POST',
      headers,
      payload: { ...payload },
      responseHeaders,
    });

    return { ...outcome, logged };
  }

  private async record(data: CreateWebhookDeliveryData): Promise<boolean> {
    try {
      await this.deliveries.create(data);
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to log delivery of ${data.eventId} to endpoint ${data.endpointId}`,
        error instanceof Error ? error.stack : String(error),
      );
      return false;
    }
  }
}

const toText = (data: unknown): string => {
  if (data === undefined || data === null) {
    return '';
  }

  return typeof data === 'string' ? data : JSON.stringify(data);
};

const flattenHeaders = (headers: object): Record<string, string> => {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined && value !== null) {
      flat[name] = Array.isArray(value) ? value.join(', ') : String(value);
    }
  }

  return flat;
};
