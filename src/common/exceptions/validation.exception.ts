import { ErrorCodeEnum } from '@/shared/constants/error-code.constant';
import { BusinessException } from './business.exception';

export interface ValidationDetail {
  property: string;
  constraints: string[];
}

export class ValidationException extends BusinessException {
  constructor(
    code: ErrorCodeEnum,
    readonly details: ValidationDetail[] = [],
  ) {
    super(code, details.flatMap((d) => d.constraints).join('; ') || undefined);
    this.name = 'ValidationException';
  }
}
