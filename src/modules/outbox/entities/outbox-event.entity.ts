import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { EventStatus } from '../enums/event-status.enum';

@Entity('outbox_events')
@Index(['status', 'nextRetryAt'])
@Index(['status', 'deliveredAt', 'nextDeliveryAt'])
export class OutboxEventEntity {
  @PrimaryGeneratedColumn({ type: 'bigint' })
  id!: string;

  @Index({ unique: true })
  @Column({ name: 'event_id', length: 255 })
  eventId!: string;

  @Index()
  @Column({ name: 'event_type', length: 100 })
  eventType!: string;

  @Column({ name: 'aggregate_type', length: 100 })
  aggregateType!: string;

  @Index()
  @Column({ name: 'aggregate_id', length: 255 })
  aggregateId!: string;

  @Column('jsonb')
  payload!: Record<string, unknown>;

  @Column({ type: 'jsonb', nullable: true })
  metadata!: Record<string, unknown> | null;

  @Index()
  @Column({ name: 'tenant_id', type: 'int', nullable: true })
  tenantId!: number | null;

  @Column({ type: 'varchar', length: 20, default: EventStatus.PENDING })
  status!: EventStatus;

  @Column({ name: 'retry_count', type: 'int', default: 0 })
  retryCount!: number;

  @Column({ name: 'max_retries', type: 'int', default: 3 })
  maxRetries!: number;

  @Column({ name: 'occurred_at', type: 'timestamptz' })
  occurredAt!: Date;

  @Index()
  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'processed_at', type: 'timestamptz', nullable: true })
  processedAt!: Date | null;

  @Column({ name: 'next_retry_at', type: 'timestamptz', nullable: true })
  nextRetryAt!: Date | null;

  @Column({ name: 'last_error', type: 'text', nullable: true })
  lastError!: string | null;

  // stamped once every matching webhook endpoint reached a terminal outcome
  @Column({ name: 'delivered_at', type: 'timestamptz', nullable: true })
  deliveredAt!: Date | null;

  // earliest backoff expiry among the event's outstanding webhook deliveries
  @Column({ name: 'next_delivery_at', type: 'timestamptz', nullable: true })
  nextDeliveryAt!: Date | null;
}
