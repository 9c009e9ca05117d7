import { Global, Module } from '@nestjs/common';
import { AppConfigService } from './shared/services/config.service';
import { LoggerService } from './shared/services/logger.service';

/**
 * Config and logging, visible to every module without importing this one.
 */
@Global()
@Module({
  providers: [AppConfigService, LoggerService],
  exports: [AppConfigService, LoggerService],
})
export class SharedModule {}
