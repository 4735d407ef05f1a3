import {
  ValidationPipe,
  type ValidationError as ClassValidatorError,
} from '@nestjs/common';
import { ValidationError } from '../errors/domain-errors';

/**
 * `items.0.qty: qty must not be less than 1` style messages, one per failed
 * constraint, walking nested DTOs.
 */
export function flattenValidationErrors(
  errors: ClassValidatorError[],
  parentPath = '',
): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    exceptionFactory: (errors) =>
      new ValidationError(
        'Request validation failed',
        flattenValidationErrors(errors),
      ),
  });
}
