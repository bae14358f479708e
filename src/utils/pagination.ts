/**
 * Filtering and page-number pagination over an in-memory collection
 */

export const DEFAULT_PAGE_SIZE = 10;

export interface PageRequest {
  page: number;
  pageSize: number;
}

export interface Page<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

/** Builds the opaque link handed out for a page number. */
export type PageLinkBuilder = (page: number) => string;

export const defaultPageLink: PageLinkBuilder = (page) => `?page=${page}`;

function toPositiveInt(value: unknown, fallback: number): number {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return fallback;
  }
  if (typeof value === 'string' && value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 1 ? parsed : fallback;
}

/**
 * Reads `page` and `page_size` from raw query values. Anything absent,
 * non-numeric or below 1 falls back to the default.
 */
export function parsePageRequest(
  raw: { page?: unknown; page_size?: unknown },
  defaultPageSize: number = DEFAULT_PAGE_SIZE
): PageRequest {
  return {
    page: toPositiveInt(raw.page, 1),
    pageSize: toPositiveInt(raw.page_size, defaultPageSize),
  };
}

export function lastPageNumber(count: number, pageSize: number): number {
  return Math.max(1, Math.ceil(count / pageSize));
}

/**
 * Slices an already filtered and ordered collection. A page past the end
 * yields no results but still reports the total count.
 */
export function paginate<T>(
  items: readonly T[],
  request: PageRequest,
  linkFor: PageLinkBuilder = defaultPageLink
): Page<T> {
  const { page, pageSize } = request;
  const count = items.length;
  const offset = (page - 1) * pageSize;
  const hasMore = offset + pageSize < count;

  return {
    count,
    next: hasMore ? linkFor(page + 1) : null,
    previous: page > 1 ? linkFor(Math.min(page - 1, lastPageNumber(count, pageSize))) : null,
    results: items.slice(offset, offset + pageSize),
  };
}
