import { NotFoundException } from '@nestjs/common';
import { z } from 'zod';

export const POSTS_PER_PAGE = 10;

/** A 1-based page number, or `last` for whatever the final page currently is. */
export type PageNumber = number | 'last';

export type PageRequest = {
  number: PageNumber;
  size: number;
};

export type Page<T> = {
  items: T[];
  number: number;
  size: number;
  totalItems: number;
  totalPages: number;
  hasNext: boolean;
  hasPrevious: boolean;
};

export type PageRange = { offset: number; limit: number };

export type PageSource<T> = {
  count: () => Promise<number>;
  fetch: (range: PageRange) => Promise<T[]>;
};

const pageParamSchema = z.union([
  z.literal('last'),
  z
    .string()
    .trim()
    .regex(/^\d+$/)
    .transform((v) => Number(v)),
]);

/**
 * Parses the `page` query param. Missing means page 1; anything that is neither
 * `last` nor a whole number is a 404, same as an out-of-range page.
 */
export function parsePageNumber(raw: unknown): PageNumber {
  if (raw == null || raw === '') return 1;
  const parsed = pageParamSchema.safeParse(raw);
  if (!parsed.success) throw new NotFoundException('Invalid page.');
  return parsed.data;
}

export function pageRequest(number: PageNumber = 1, size = POSTS_PER_PAGE): PageRequest {
  return { number, size };
}

/**
 * Strict offset pagination: the first page always exists (possibly empty),
 * any page past the last one is a 404.
 */
export async function paginate<T>(request: PageRequest, source: PageSource<T>): Promise<Page<T>> {
  const size = request.size;
  const totalItems = await source.count();
  const totalPages = Math.max(1, Math.ceil(totalItems / size));
  const number = request.number === 'last' ? totalPages : request.number;

  if (!Number.isInteger(number) || number < 1) throw new NotFoundException('Invalid page.');
  if (number > totalPages) throw new NotFoundException('Invalid page.');

  const items = totalItems === 0 ? [] : await source.fetch({ offset: (number - 1) * size, limit: size });
  return {
    items,
    number,
    size,
    totalItems,
    totalPages,
    hasNext: number < totalPages,
    hasPrevious: number > 1,
  };
}

export type PaginationDto = {
  page: number;
  pageSize: number;
  totalItems: number;
  totalPages: number;
  hasNext: boolean;
  hasPrevious: boolean;
};

export function toPaginationDto(page: Page<unknown>): PaginationDto {
  return {
    page: page.number,
    pageSize: page.size,
    totalItems: page.totalItems,
    totalPages: page.totalPages,
    hasNext: page.hasNext,
    hasPrevious: page.hasPrevious,
  };
}
