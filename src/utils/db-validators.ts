import { z } from 'zod';
import { ValidationError } from './db-errors.js';
import { TaskIdSchema } from '../types.js';

/**
 * Parses a value with the given schema, converting zod issues into a ValidationError
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Rejects a missing or blank task_id
 */
export function validateTaskId(taskId: unknown): string {
  return validateInput(TaskIdSchema, taskId);
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
