import type { ErrorObject } from "ajv";
import { SchemaValidationCache } from "../schemas";
import { DetailedValidationError } from "../errors";
import type { ValidationErrorDetail } from "../errors";

export type ValidationResult = {
  isValid: boolean;
  errors: ValidationErrorDetail[];
};

function formatError(error: ErrorObject): ValidationErrorDetail {
  const missingProperty: unknown = error.params['missingProperty'];
  const field = error.instancePath.replace(/^\//, '')
    || (typeof missingProperty === 'string' ? missingProperty : '')
    || 'root';

  return {
    field,
    message: error.message || 'Unknown validation error',
    value: error.data
  };
}

/**
 * Validates data against a JSON schema and returns field-level errors.
 */
export function validateDetailed(schema: object, data: unknown): ValidationResult {
  const validateSchema = SchemaValidationCache.getValidatorFromSchema(schema);
  const isValid = validateSchema(data);

  return {
    isValid,
    errors: isValid ? [] : (validateSchema.errors ?? []).map(formatError)
  };
}

/**
 * @throws DetailedValidationError listing every schema violation
 */
export function assertValid(subject: string, schema: object, data: unknown): void {
  const validation = validateDetailed(schema, data);
  if (!validation.isValid) {
    throw new DetailedValidationError(subject, validation.errors);
  }
}
