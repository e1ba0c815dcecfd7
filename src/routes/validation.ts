import type { z } from 'zod';

import { RequestInvalidError } from '../errors/index.js';
import { isContentCategory } from '../storage/types.js';
import type { ContentCategory } from '../storage/types.js';

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

/**
 * Parse a body or querystring, throwing REQUEST_INVALID with every issue.
 * A missing body is treated as `{}`.
 */
export function parseOrThrow<T>(schema: z.ZodType<T>, value: unknown): T {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new RequestInvalidError(describeIssues(parsed.error));
  }
  return parsed.data;
}

export function requireCategory(value: string): ContentCategory {
  if (!isContentCategory(value)) {
    throw new RequestInvalidError(`unknown category "${value}"`);
  }
  return value;
}
