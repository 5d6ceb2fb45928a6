import { Logger } from '@nestjs/common';
import { ConfigurationError } from '../errors/pipeline.errors';

export type FetchPage<T> = (offset: number, limit: number) => Promise<T[]>;

export interface PaginatedCollection<T> {
  records: T[];
  pagesFetched: number;
  /** The source returned a short page before totalCount was reached */
  exhausted: boolean;
}

const logger = new Logger('PaginatedCollector');

/**
 * Offset pagination over a record source whose size is known up front.
 *
 * Each step asks for `min(pageLimit, totalCount - offset)` records, so a
 * total that fits in one page is fetched with a single call of exactly
 * `totalCount`. A short page means the source ran dry: collection stops
 * there with a warning. Fetch failures propagate as-is.
 */
export async function collectPaginated<T>(
  totalCount: number,
  pageLimit: number,
  fetchPage: FetchPage<T>,
): Promise<PaginatedCollection<T>> {
  if (!Number.isInteger(pageLimit) || pageLimit <= 0) {
    throw new ConfigurationError(
      `Page limit must be a positive integer, got ${pageLimit}`,
    );
  }
  if (!Number.isInteger(totalCount) || totalCount < 0) {
    throw new ConfigurationError(
      `Total count must be a non-negative integer, got ${totalCount}`,
    );
  }

  const records: T[] = [];
  let pagesFetched = 0;
  let offset = 0;

  while (offset < totalCount) {
    const limit = Math.min(pageLimit, totalCount - offset);
    const page = await fetchPage(offset, limit);
    pagesFetched += 1;
    records.push(...page);

    if (page.length < limit) {
      logger.warn(
        `⚠️ Source returned ${page.length}/${limit} records at offset ${offset}; stopping after ${records.length} of ${totalCount}`,
      );
      return { records, pagesFetched, exhausted: true };
    }

    offset += limit;
  }

  return { records, pagesFetched, exhausted: false };
}
