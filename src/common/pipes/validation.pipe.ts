import { ValidationError, ValidationPipe } from '@nestjs/common';
import { MalformedRequestException } from '../exceptions';

/**
 * Flattens nested class-validator errors into `path: message` strings.
 */
export function flattenValidationErrors(errors: ValidationError[], parentPath = ''): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}

/**
 * Global pipe: payload shape problems are malformed requests, never business
 * validation failures. No implicit conversion, so a number sent where a
 * string belongs is rejected here.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    forbidUnknownValues: true,
    exceptionFactory: (errors) =>
      new MalformedRequestException('Request body is not a valid ticket payload', flattenValidationErrors(errors)),
  });
}
