import { ConsoleLogger, Injectable } from '@nestjs/common';
import * as winston from 'winston';
import { AppConfigService } from './config.service';

@Injectable()
export class LoggerService extends ConsoleLogger {
  private readonly logger: winston.Logger;

  constructor(private readonly configService: AppConfigService) {
    super(LoggerService.name, { timestamp: true });
    this.logger = winston.createLogger(configService.winstonConfig);
    if (this.configService.nodeEnv !== 'production') {
      this.logger.debug('Logging initialized at debug level');
    }
  }

  error(message: unknown, trace?: string, context?: string): void {
    this.logger.error(this.stringify(message), { trace, context });
  }
  log(message: unknown, context?: string) {
    this.logger.info(this.stringify(message), { context });
  }
  info(message: unknown, context?: string) {
    this.logger.info(this.stringify(message), { context });
  }
  debug(message: unknown, context?: string) {
    this.logger.debug(this.stringify(message), { context });
  }
  verbose(message: unknown, context?: string) {
    this.logger.verbose(this.stringify(message), { context });
  }
  warn(message: unknown, context?: string) {
    this.logger.warn(this.stringify(message), { context });
  }

  private stringify(message: unknown): string {
    return typeof message === 'string' ? message : JSON.stringify(message);
  }
}
