import { BadRequestException } from '@nestjs/common';
import { ZodType, ZodTypeDef, ZodError } from 'zod';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ParseOptions {
  message?: string;
  /** Prefix for issue paths, e.g. "params" for route parameters. */
  scope?: string;
}

/**
 * Parses input against a Zod schema, throwing BadRequestException on failure.
 * Returns the parsed (and transformed) value on success.
 */
export function parseOrThrow<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  options?: ParseOptions,
): T {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  throw new BadRequestException({
    message: options?.message ?? 'Invalid request',
    errors: formatZodErrors(result.error, options?.scope),
  });
}

/**
 * Formats Zod errors into a stable, deterministic array of field errors.
 */
function formatZodErrors(error: ZodError, scope?: string): ValidationError[] {
  const errors = error.issues.map((issue) => {
    const segments = scope ? [scope, ...issue.path] : issue.path;
    return {
      path: segments.length > 0 ? segments.join('.') : issue.code,
      message: issue.message,
    };
  });

  return errors.sort(
    (a, b) =>
      a.path.localeCompare(b.path) || a.message.localeCompare(b.message),
  );
}
