/**
 * Lazy sequence over the pages of a query or scan.
 */

import type { AttributeValue } from '../types/key.js';
import type { Item } from '../types/item.js';
import type { Page } from '../types/results.js';
import { UnsupportedOperationError } from '../error/index.js';

/**
 * Fetches the page that starts after `exclusiveStartKey`, or the first page.
 */
export type PageFetcher = (exclusiveStartKey?: Record<string, AttributeValue>) => Promise<Page>;

export interface PagedItemsOptions<T> {
  /** Converts a stored item into the entity type */
  convert: (item: Item) => T;
  /** Stops the sequence after this many items */
  limit?: number;
  /** Called for every page fetched */
  onPage?: (page: Page) => void;
}

/**
 * Items of a paged query, fetched one page at a time as the consumer
 * advances. The next page is requested only once every item of the current
 * page has been handed out; a consumer that stops early causes no further
 * requests. The sequence can be iterated once.
 *
 * @example
 * ```typescript
 * for await (const order of orders) {
 *   if (order.total > 100) break;
 * }
 * ```
 */
export class PagedItems<T> implements AsyncIterable<T> {
  private lastEvaluatedKey?: Record<string, AttributeValue>;
  private done = false;
  private iterated = false;
  private fetched = 0;

  constructor(
    private readonly fetchPage: PageFetcher,
    private readonly options: PagedItemsOptions<T>
  ) {}

  /**
   * Number of pages requested so far.
   */
  get pagesFetched(): number {
    return this.fetched;
  }

  private hasNext(): boolean {
    return !this.done;
  }

  private async nextPage(): Promise<T[]> {
    const page = await this.fetchPage(this.lastEvaluatedKey);
    this.fetched++;
    this.options.onPage?.(page);

    if (page.lastEvaluatedKey) {
      this.lastEvaluatedKey = page.lastEvaluatedKey;
    } else {
      this.done = true;
    }
    return page.items.map(this.options.convert);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    if (this.iterated) {
      throw new UnsupportedOperationError('Paged results can only be iterated once');
    }
    this.iterated = true;

    const { limit } = this.options;
    let returned = 0;
    while (this.hasNext() && (limit === undefined || returned < limit)) {
      const items = await this.nextPage();
      for (const item of items) {
        if (limit !== undefined && returned >= limit) {
          return;
        }
        yield item;
        returned++;
      }
    }
  }

  /**
   * Collects every remaining item, up to the limit.
   */
  async toArray(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }

  /**
   * First item of the first non-empty page, without fetching further pages.
   */
  async first(): Promise<T | undefined> {
    for await (const item of this) {
      return item;
    }
    return undefined;
  }
}
