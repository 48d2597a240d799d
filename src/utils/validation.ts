import type { ZodTypeAny, output } from 'zod';
import { createValidationError } from './errors.js';

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Parse untrusted input against a schema
 * @returns The parsed value with coercions and transforms applied
 * @throws AppError 422 listing every failing field
 */
export const validate = <Schema extends ZodTypeAny>(schema: Schema, input: unknown): output<Schema> => {
  const result = schema.safeParse(input);

  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message
    }));
    throw createValidationError('Validation error', issues);
  }

  return result.data;
};
