import { ErrorCode, ErrorCodeEnum } from '@/shared/constants/error-code.constant';

export class BusinessException extends Error {
  readonly status: number;

  constructor(
    readonly code: ErrorCodeEnum,
    detail?: string,
  ) {
    const [message, status] = ErrorCode[code];
    super(detail ? `${code} - ${message}: ${detail}` : `${code} - ${message}`);
    this.name = 'BusinessException';
    this.status = status;
  }
}
