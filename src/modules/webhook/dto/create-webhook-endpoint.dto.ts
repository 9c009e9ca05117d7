import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  Min,
} from 'class-validator';

export class CreateWebhookEndpointDto {
  @IsNotEmpty()
  @IsString()
  @MaxLength(255)
  name!: string;

  @IsString()
  @Matches(/^https?:\/\//, { message: 'url must start with http:// or https://' })
  @MaxLength(500)
  url!: string;

  @IsArray()
  @ArrayNotEmpty({ message: 'eventTypes must contain at least one event type' })
  @IsString({ each: true })
  eventTypes!: string[];

  @IsOptional()
  @IsString()
  @MaxLength(255)
  secret?: string | null;

  @IsOptional()
  @IsBoolean()
  active?: boolean;

  @IsOptional()
  @IsInt()
  @Min(1)
  timeoutSeconds?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  maxRetries?: number;

  @IsOptional()
  @IsInt()
  tenantId?: number | null;
}
