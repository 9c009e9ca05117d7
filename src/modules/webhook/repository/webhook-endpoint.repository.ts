import { Injectable } from '@nestjs/common';
import { DataSource, Repository } from 'typeorm';
import { WebhookEndpointEntity } from '../entities/webhook-endpoint.entity';

export interface CreateWebhookEndpointData {
  name: string;
  url: string;
  secret: string | null;
  eventTypes: string[];
  active: boolean;
  timeoutSeconds: number;
  maxRetries: number;
  tenantId: number | null;
}

export interface WebhookEndpointStore {
  create(data: CreateWebhookEndpointData): Promise<WebhookEndpointEntity>;
  findById(id: number): Promise<WebhookEndpointEntity | null>;
  findActive(): Promise<WebhookEndpointEntity[]>;
  /** `tenantId` undefined lists every endpoint, null only the global ones. */
  findAll(tenantId?: number | null): Promise<WebhookEndpointEntity[]>;
  setActive(id: number, active: boolean): Promise<boolean>;
}

@Injectable()
export class WebhookEndpointRepository implements WebhookEndpointStore {
  private readonly repo: Repository<WebhookEndpointEntity>;

  constructor(dataSource: DataSource) {
    this.repo = dataSource.getRepository(WebhookEndpointEntity);
  }

  async create(data: CreateWebhookEndpointData): Promise<WebhookEndpointEntity> {
    return this.repo.save(this.repo.create(data));
  }

  async findById(id: number): Promise<WebhookEndpointEntity | null> {
    return this.repo.findOneBy({ id });
  }

  async findActive(): Promise<WebhookEndpointEntity[]> {
    return this.repo.find({ where: { active: true }, order: { id: 'ASC' } });
  }

  async findAll(tenantId?: number | null): Promise<WebhookEndpointEntity[]> {
    if (tenantId === undefined) {
      return this.repo.find({ order: { id: 'ASC' } });
    }

    return this.repo
      .createQueryBuilder('endpoint')
      .where(tenantId === null ? 'endpoint.tenant_id IS NULL' : 'endpoint.tenant_id = :tenantId', {
        tenantId,
      })
      .orderBy('endpoint.id', 'ASC')
      .getMany();
  }

  async setActive(id: number, active: boolean): Promise<boolean> {
    const result = await this.repo.update({ id }, { active });
    return (result.affected ?? 0) > 0;
  }
}
