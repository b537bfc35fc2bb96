import { UnprocessableEntityException } from '@nestjs/common';
import { validate, ValidationError } from 'class-validator';

/** Field-keyed violation set, e.g. `{ email: ['is invalid'] }` */
export type ValidationErrors = Record<string, string[]>;

/**
 * Run the class-validator rules declared on an entity and flatten them into
 * a field-keyed violation set. An empty object means the entity is valid.
 */
export async function validateEntity(entity: object): Promise<ValidationErrors> {
  const violations = await validate(entity, { forbidUnknownValues: false });
  return toValidationErrors(violations);
}

export function toValidationErrors(
  violations: ValidationError[],
  prefix = '',
): ValidationErrors {
  const errors: ValidationErrors = {};
  for (const violation of violations) {
    const field = prefix ? `${prefix}.${violation.property}` : violation.property;
    if (violation.constraints) {
      for (const message of Object.values(violation.constraints)) {
        addError(errors, field, message);
      }
    }
    if (violation.children && violation.children.length > 0) {
      const nested = toValidationErrors(violation.children, field);
      for (const [key, messages] of Object.entries(nested)) {
        messages.forEach((message) => addError(errors, key, message));
      }
    }
  }
  return errors;
}

export function addError(errors: ValidationErrors, field: string, message: string): void {
  const messages = errors[field] ?? [];
  if (!messages.includes(message)) {
    messages.push(message);
  }
  errors[field] = messages;
}

export function hasErrors(errors: ValidationErrors): boolean {
  return Object.keys(errors).length > 0;
}

/**
 * Raised at the HTTP boundary when a write is refused. Services report
 * violations as values; controllers convert them with this exception.
 */
export class ValidationFailedException extends UnprocessableEntityException {
  constructor(readonly errors: ValidationErrors) {
    super({ message: 'Validation failed', error: 'VALIDATION_FAILED', errors });
  }
}
