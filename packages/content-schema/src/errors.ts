import type { z } from 'zod';

export class ContentSchemaError extends Error {
  constructor(
    message = 'Content schema validation failed',
    readonly issues: readonly z.ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'ContentSchemaError';
  }
}

export const formatIssues = (issues: readonly z.ZodIssue[]): string =>
  issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
