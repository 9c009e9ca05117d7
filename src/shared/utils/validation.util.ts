import { ValidationException } from '@/common/exceptions/validation.exception';
import { ErrorCodeEnum } from '@/shared/constants/error-code.constant';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';

const flatten = (errors: ValidationError[], parent = ''): { property: string; constraints: string[] }[] =>
  errors.flatMap((error) => {
    const property = parent ? `${parent}.${error.property}` : error.property;
    const own = error.constraints ? [{ property, constraints: Object.values(error.constraints) }] : [];
    return [...own, ...flatten(error.children ?? [], property)];
  });

/**
 * Transforms a plain object into `dto` and runs its class-validator rules,
 * throwing a ValidationException tagged with `code` when any rule fails.
 */
export function validateDto<T extends object>(
  dto: ClassConstructor<T>,
  plain: object,
  code: ErrorCodeEnum,
): T {
  const instance = plainToInstance(dto, plain);
  const errors = validateSync(instance, { forbidUnknownValues: false });

  if (errors.length > 0) {
    throw new ValidationException(code, flatten(errors));
  }

  return instance;
}
