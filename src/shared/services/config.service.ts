import { Injectable } from '@nestjs/common';
import * as dotenv from 'dotenv';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { IDatabaseConfig } from '@/shared/interfaces/database-config.interface';
import { IOutboxConfig, IWebhookConfig } from '@/shared/interfaces/relay-config.interface';

@Injectable()
export class AppConfigService {
  constructor() {
    dotenv.config({
      path: `.env`,
    });

    // Replace \\n with \n to support multiline strings in container secrets
    for (const envName of Object.keys(process.env)) {
      process.env[envName] = process.env[envName]?.replace(/\\n/g, '\n');
    }
  }

  public get(key: string): string {
    return process.env[key] || '';
  }

  public getNumber(key: string): number {
    return Number(this.get(key));
  }

  public getBoolean(key: string): boolean {
    return this.get(key).toLowerCase() === 'true';
  }

  get nodeEnv(): string {
    return this.get('NODE_ENV') || 'development';
  }

  get databaseConfig(): IDatabaseConfig {
    return {
      url: this.get('DATABASE_URL') || undefined,
      host: this.get('DATABASE_HOST') || 'localhost',
      port: this.getNumber('DATABASE_PORT') || 5432,
      name: this.get('DATABASE_NAME') || 'helpdesk',
      username: this.get('DATABASE_USERNAME') || 'postgres',
      password: this.get('DATABASE_PASSWORD'),
      synchronize: this.getBoolean('DATABASE_SYNCHRONIZE'),
      logging: this.getBoolean('DATABASE_LOGGING'),
      ssl: this.getBoolean('DATABASE_SSL'),
    };
  }

  get outboxConfig(): IOutboxConfig {
    return {
      batchSize: this.getNumber('OUTBOX_BATCH_SIZE') || 100,
      maxRetries: this.getNumber('OUTBOX_MAX_RETRIES') || 3,
      retryDelayMinutes: this.getNumber('OUTBOX_RETRY_DELAY_MINUTES') || 5,
      retentionDays: this.getNumber('OUTBOX_RETENTION_DAYS') || 30,
    };
  }

  get webhookConfig(): IWebhookConfig {
    const throttle = this.get('WEBHOOK_EVENT_THROTTLE_MS');

    return {
      batchSize: this.getNumber('WEBHOOK_BATCH_SIZE') || 50,
      maxConcurrentDeliveries: this.getNumber('WEBHOOK_MAX_CONCURRENT_DELIVERIES') || 10,
      // 0 is a valid throttle, so only fall back when unset
      eventThrottleMs: throttle === '' ? 100 : Number(throttle),
      retryDelaySeconds: this.getNumber('WEBHOOK_RETRY_DELAY_SECONDS') || 60,
      deliveryRetentionDays: this.getNumber('WEBHOOK_DELIVERY_RETENTION_DAYS') || 7,
      userAgent: this.get('WEBHOOK_USER_AGENT') || 'Helpdesk-Webhook/1.0',
    };
  }

  get winstonConfig(): winston.LoggerOptions {
    return {
      level: this.get('LOG_LEVEL') || 'debug',
      transports: [
        new DailyRotateFile({
          level: 'debug',
          filename: `./logs/${this.nodeEnv}/debug-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          zippedArchive: true,
          maxSize: '20m',
          maxFiles: '14d',
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        }),
        new DailyRotateFile({
          level: 'error',
          filename: `./logs/${this.nodeEnv}/error-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          zippedArchive: false,
          maxSize: '20m',
          maxFiles: '30d',
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        }),
        new winston.transports.Console({
          level: 'debug',
          handleExceptions: true,
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.timestamp({
              format: 'DD-MM-YYYY HH:mm:ss',
            }),
            winston.format.printf(({ level, message, timestamp, context, trace }) => {
              const ctx = context ? ` [${String(context)}]` : '';
              const msgStr = typeof message === 'string' ? message : JSON.stringify(message);
              const stackStr = trace ? `\n${String(trace)}` : '';
              return `${String(timestamp)} ${level}:${ctx} ${msgStr}${stackStr}`;
            }),
          ),
        }),
      ],
      exitOnError: false,
    };
  }

  get appConfig() {
    return {
      name: this.get('NAME') || 'helpdesk-event-relay',
      version: this.get('VERSION'),
      logLevel: this.get('LOG_LEVEL'),
    };
  }
}
