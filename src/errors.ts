import { JSONParseError, TypeValidationError } from '@ai-sdk/provider';

export function createParseError(text: string, cause: unknown): JSONParseError {
  return new JSONParseError({ text, cause });
}

export function createShapeError(text: string): JSONParseError {
  return new JSONParseError({ text, cause: new Error('Expected a JSON array of objects') });
}

export function createRecordValidationError(value: unknown, errors: string[]): TypeValidationError {
  return new TypeValidationError({ value, cause: new Error(errors.join(', ')) });
}
