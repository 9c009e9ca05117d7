import { Type } from 'class-transformer';
import {
  IsDate,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

export class PublishEventDto {
  @IsNotEmpty()
  @IsString()
  @MaxLength(255)
  eventId!: string;

  @IsNotEmpty({ message: 'eventType must not be empty' })
  @IsString()
  @MaxLength(100)
  eventType!: string;

  @IsNotEmpty({ message: 'aggregateType must not be empty' })
  @IsString()
  @MaxLength(100)
  aggregateType!: string;

  @IsNotEmpty({ message: 'aggregateId must not be empty' })
  @IsString()
  @MaxLength(255)
  aggregateId!: string;

  @IsObject()
  payload!: Record<string, unknown>;

  @IsOptional()
  @IsObject()
  metadata!: Record<string, unknown> | null;

  @IsOptional()
  @IsInt()
  tenantId!: number | null;

  @IsDate()
  @Type(() => Date)
  occurredAt!: Date;
}
