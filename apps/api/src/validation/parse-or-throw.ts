import { BadRequestException } from '@nestjs/common';
import type { ZodError, ZodTypeAny, z } from 'zod';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ParseOptions {
  message?: string;
}

/**
 * Parses input against a Zod schema, throwing BadRequestException on failure.
 * Returns the parsed (defaulted, transformed) value on success.
 */
export function parseOrThrow<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  options?: ParseOptions,
): z.output<S> {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  throw new BadRequestException({
    message: options?.message ?? 'Invalid request',
    errors: formatZodErrors(result.error),
  });
}

/**
 * One entry per issue, sorted by path then message. Issues without a path
 * (object-level refinements) are reported under their issue code.
 */
export function formatZodErrors(error: ZodError): ValidationError[] {
  return error.issues
    .map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join('.') : issue.code,
      message: issue.message,
    }))
    .sort(
      (a, b) =>
        a.path.localeCompare(b.path) || a.message.localeCompare(b.message),
    );
}
