import { z } from 'zod';
import { PipelineError, type PipelineErrorCode } from '../types/errors.js';

/**
 * One line per issue. Messages that already name their field (they start
 * with a quoted name) are used as they are; others get the issue path.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const where = issue.path.join('.');
      return where && !issue.message.startsWith('"') ? `${where}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Parse with a schema, raising a PipelineError with the given code on failure
 */
export function parseWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  code: PipelineErrorCode,
  prefix: string = ''
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new PipelineError(code, `${prefix}${describeIssues(result.error)}`, { issues: result.error.issues });
  }
  return result.data;
}
