/**
 * Runtime validation utilities
 *
 * Runs Zod schemas and turns their issues into ConfigurationErrors the CLI
 * can report as a single line.
 *
 * @license MIT
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { ConnectionTarget } from '../types/connector.js';
import type { CheckDocument } from '../types.js';
import { schemas } from './schemas.js';

// ==============================================
// Error Types
// ==============================================

/**
 * Structured validation error with path information
 */
export interface ValidationError {
  field: string;
  code: string;
  message: string;
}

/**
 * Result type for validation operations
 */
export type ValidationResult<T> = {
  success: true;
  data: T;
} | {
  success: false;
  errors: ValidationError[];
};

type AnySchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function formatZodErrors(zodError: z.ZodError): ValidationError[] {
  return zodError.issues.map((issue) => ({
    field: issue.path.join('.') || 'root',
    code: issue.code,
    message: issue.message,
  }));
}

/**
 * Join validation errors into `field: message, field: message`
 */
export function formatValidationErrors(errors: readonly ValidationError[]): string {
  return errors
    .map(error => error.field === 'root' ? error.message : `${error.field}: ${error.message}`)
    .join(', ');
}

// ==============================================
// Validation Functions
// ==============================================

export function validate<T>(schema: AnySchema<T>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatZodErrors(result.error) };
}

/**
 * Validate and throw a ConfigurationError on failure
 */
export function validateOrThrow<T>(schema: AnySchema<T>, data: unknown, context: string): T {
  const result = validate(schema, data);

  if (!result.success) {
    const first = result.errors[0];
    throw new ConfigurationError(
      `Invalid ${context}: ${formatValidationErrors(result.errors)}`,
      first && first.field !== 'root' ? first.field : undefined
    );
  }

  return result.data;
}

/**
 * Validate a parsed check document
 */
export function validateCheckDocument(document: unknown): CheckDocument {
  return validateOrThrow(schemas.CheckDocumentSchema, document, 'check document');
}

/**
 * Validate raw connection options and select the connection target
 */
export function validateConnectionOptions(options: unknown): ConnectionTarget {
  return validateOrThrow(schemas.ConnectionOptionsSchema, options, 'connection options');
}
