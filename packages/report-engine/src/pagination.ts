import type { Page } from '@glreporter/gitlab-client';

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 100;

export type PageFetcher<T> = (page: number) => Promise<Page<T>>;

export interface PaginateOptions {
  signal?: AbortSignal;
}

/**
 * Yields each page of a listing starting at page 1. Stops when the cursor is
 * exhausted, fails to advance, or points at an empty page. Errors propagate
 * immediately.
 */
export async function* iteratePages<T>(
  fetchPage: PageFetcher<T>,
  options: PaginateOptions = {}
): AsyncGenerator<T[], void, undefined> {
  let page = 1;
  for (;;) {
    options.signal?.throwIfAborted();
    const result = await fetchPage(page);
    yield result.items;

    const next = result.nextPage;
    if (next === null || next <= page || result.items.length === 0) {
      return;
    }
    page = next;
  }
}

export async function collectPages<T>(fetchPage: PageFetcher<T>, options: PaginateOptions = {}): Promise<T[]> {
  const collected: T[] = [];
  for await (const items of iteratePages(fetchPage, options)) {
    for (const item of items) {
      collected.push(item);
    }
  }
  return collected;
}
