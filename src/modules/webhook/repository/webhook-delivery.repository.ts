import { Injectable } from '@nestjs/common';
import { DataSource, In, LessThan, MoreThanOrEqual, Repository } from 'typeorm';
import { WebhookDeliveryEntity } from '../entities/webhook-delivery.entity';

export type CreateWebhookDeliveryData = Omit<WebhookDeliveryEntity, 'id' | 'attemptedAt'>;

/**
 * Append-only delivery log.
 */
export interface WebhookDeliveryStore {
  create(data: CreateWebhookDeliveryData): Promise<WebhookDeliveryEntity>;
  findByEventIds(eventIds: string[]): Promise<WebhookDeliveryEntity[]>;
  findByEndpointSince(endpointId: number, since: Date): Promise<WebhookDeliveryEntity[]>;
  deleteBefore(cutoff: Date): Promise<number>;
}

@Injectable()
export class WebhookDeliveryRepository implements WebhookDeliveryStore {
  private readonly repo: Repository<WebhookDeliveryEntity>;

  constructor(dataSource: DataSource) {
    this.repo = dataSource.getRepository(WebhookDeliveryEntity);
  }

  async create(data: CreateWebhookDeliveryData): Promise<WebhookDeliveryEntity> {
    return this.repo.save(this.repo.create(data));
  }

  async findByEventIds(eventIds: string[]): Promise<WebhookDeliveryEntity[]> {
    if (eventIds.length === 0) {
      return [];
    }

    return this.repo.find({
      where: { eventId: In(eventIds) },
      order: { attemptedAt: 'ASC' },
    });
  }

  async findByEndpointSince(endpointId: number, since: Date): Promise<WebhookDeliveryEntity[]> {
    return this.repo.find({
      where: { endpointId, attemptedAt: MoreThanOrEqual(since) },
      order: { attemptedAt: 'ASC' },
    });
  }

  async deleteBefore(cutoff: Date): Promise<number> {
    const result = await this.repo.delete({ attemptedAt: LessThan(cutoff) });
    return result.affected ?? 0;
  }
}
