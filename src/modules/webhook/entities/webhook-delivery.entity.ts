import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

/**
 * One row per delivery attempt. Rows are never updated after insert.
 */
@Entity('webhook_deliveries')
@Index(['endpointId', 'attemptedAt'])
export class WebhookDeliveryEntity {
  @PrimaryGeneratedColumn({ type: 'bigint' })
  id!: string;

  @Column({ name: 'endpoint_id', type: 'int' })
  endpointId!: number;

  @Index()
  @Column({ name: 'event_id', length: 255 })
  eventId!: string;

  @Column({ length: 500 })
  url!: string;

  @Column({ name: 'http_method', length: 10, default: 'POST' })
  httpMethod!: string;

  @Column('jsonb')
  headers!: Record<string, string>;

  @Column('jsonb')
  payload!: Record<string, unknown>;

  @Column({ name: 'status_code', type: 'int', nullable: true })
  statusCode!: number | null;

  @Column({ name: 'response_body', type: 'text', nullable: true })
  responseBody!: string | null;

  @Column({ name: 'response_headers', type: 'jsonb', nullable: true })
  responseHeaders!: Record<string, string> | null;

  @Column({ name: 'duration_ms', type: 'int', nullable: true })
  durationMs!: number | null;

  @Column({ default: false })
  success!: boolean;

  @Column({ name: 'error_message', type: 'text', nullable: true })
  errorMessage!: string | null;

  @Index()
  @CreateDateColumn({ name: 'attempted_at', type: 'timestamptz' })
  attemptedAt!: Date;
}
