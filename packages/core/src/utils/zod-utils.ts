import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';

/**
 * Validates an input against a Zod schema and returns a neverthrow Result.
 *
 * @returns An Ok(T) with the parsed data if successful, otherwise an Err(ZodError).
 */
export function fromZod<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): Result<T, ZodError> {
  const parsed = schema.safeParse(input);
  return parsed.success ? ok(parsed.data) : err(parsed.error);
}

/**
 * One line per issue, prefixed with the path into the input.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
