import { z, ZodSchema } from 'zod';
import { InvalidArgumentError, ValidationError } from './errors';
import type { PagingConfig } from '../config';

/**
 * Validate request body against Zod schema
 * Throws ValidationError on failure
 */
export async function validateBody<T>(
  request: Request,
  schema: ZodSchema<T>
): Promise<T> {
  try {
    const body = await request.json();
    return schema.parse(body);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ValidationError('Invalid request body', {
        errors: error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      });
    }
    throw new ValidationError('Failed to parse request body');
  }
}

/**
 * Validate query parameters against Zod schema
 * Throws ValidationError on failure
 */
export function validateQuery<T>(url: URL, schema: ZodSchema<T>): T {
  try {
    const params = Object.fromEntries(url.searchParams.entries());
    return schema.parse(params);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ValidationError('Invalid query parameters', {
        errors: error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      });
    }
    throw new ValidationError('Failed to parse query parameters');
  }
}

/**
 * Validated page/limit pair (page is zero-based)
 */
export interface PaginationParams {
  page: number;
  limit: number;
}

/**
 * Check a page/limit pair before it reaches a query backend
 * Throws InvalidArgumentError on failure
 */
export function assertPagination(page: number, limit: number, maxPageSize?: number): void {
  if (!Number.isInteger(page) || page < 0) {
    throw new InvalidArgumentError('Invalid page: must be a non-negative integer', { page });
  }
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError('Invalid limit: must be a positive integer', { limit });
  }
  if (maxPageSize !== undefined && limit > maxPageSize) {
    throw new InvalidArgumentError(`Invalid limit: must be between 1 and ${maxPageSize}`, {
      limit,
    });
  }
}

/**
 * Parse raw page/limit query values, applying the configured default page size
 */
export function parsePagination(
  rawPage: string | undefined,
  rawLimit: string | undefined,
  paging: PagingConfig
): PaginationParams {
  const page = rawPage ? parseStrictInt(rawPage) : 0;
  const limit = rawLimit ? parseStrictInt(rawLimit) : paging.defaultPageSize;

  assertPagination(page, limit, paging.maxPageSize);

  return { page, limit };
}

// parseInt accepts "10abc"; page/limit must be digits only
function parseStrictInt(raw: string): number {
  return /^-?\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
}
