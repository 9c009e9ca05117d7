import { OutboxEventEntity } from '@/modules/outbox/entities/outbox-event.entity';
import { WebhookDeliveryEntity } from '@/modules/webhook/entities/webhook-delivery.entity';
import { WebhookEndpointEntity } from '@/modules/webhook/entities/webhook-endpoint.entity';
import { AppConfigService } from '@/shared/services/config.service';
import { Module } from '@nestjs/common';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';

export const ENTITIES = [OutboxEventEntity, WebhookEndpointEntity, WebhookDeliveryEntity];

export const buildTypeOrmOptions = (configService: AppConfigService): TypeOrmModuleOptions => {
  const db = configService.databaseConfig;

  return {
    type: 'postgres',
    // url wins over the discrete settings when both are present
    url: db.url,
    host: db.host,
    port: db.port,
    database: db.name,
    username: db.username,
    password: db.password,
    entities: ENTITIES,
    synchronize: db.synchronize,
    logging: db.logging,
    ssl: db.ssl ? { rejectUnauthorized: false } : false,
  };
};

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [AppConfigService],
      useFactory: buildTypeOrmOptions,
    }),
  ],
})
export class DatabaseModule {}
