import type { Page } from "../types.js";

/** Fetches one page; `cursor` is undefined for the first page, else a "next" href. */
export type PageFetcher<T> = (cursor: string | undefined) => Promise<Page<T>>;

/**
 * Walks a paginated listing one HTTP round trip per `next()` call.
 * Finished once a page arrives without a "next" link.
 */
export class PageIterator<T> implements AsyncIterator<Page<T>> {
  private cursor: string | undefined;
  private started = false;
  private done = false;

  constructor(private readonly fetchPage: PageFetcher<T>) {}

  async next(): Promise<IteratorResult<Page<T>>> {
    if (this.done) {
      return { done: true, value: undefined };
    }

    if (this.started && this.cursor === undefined) {
      this.done = true;
      return { done: true, value: undefined };
    }

    this.started = true;
    try {
      const page = await this.fetchPage(this.cursor);
      this.cursor = page.next;
      return { done: false, value: page };
    } catch (error) {
      this.done = true;
      throw error;
    }
  }

  async return(): Promise<IteratorResult<Page<T>>> {
    this.done = true;
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): AsyncIterator<Page<T>> {
    return this;
  }
}

class ItemIterator<T> implements AsyncIterator<T> {
  private buffer: readonly T[] = [];
  private index = 0;

  constructor(private readonly pages: PageIterator<T>) {}

  async next(): Promise<IteratorResult<T>> {
    while (this.index >= this.buffer.length) {
      const page = await this.pages.next();
      if (page.done) {
        return { done: true, value: undefined };
      }
      this.buffer = page.value.items;
      this.index = 0;
    }

    const value = this.buffer[this.index];
    this.index += 1;
    return { done: false, value };
  }

  async return(): Promise<IteratorResult<T>> {
    await this.pages.return();
    return { done: true, value: undefined };
  }
}

/**
 * Lazily fetched, restartable listing. Nothing is requested until iteration
 * starts, and each iteration begins a fresh request chain from page one.
 */
export class ResourceCollection<T> implements AsyncIterable<T> {
  constructor(private readonly fetchPage: PageFetcher<T>) {}

  pages(): PageIterator<T> {
    return new PageIterator(this.fetchPage);
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return new ItemIterator(this.pages());
  }

  /**
   * Collects every item, or the first `limit` items. Rejects without a
   * partial result if any page fails.
   */
  async toArray(limit?: number): Promise<T[]> {
    const out: T[] = [];
    if (limit !== undefined && limit <= 0) {
      return out;
    }

    for await (const item of this) {
      out.push(item);
      if (limit !== undefined && out.length >= limit) {
        break;
      }
    }
    return out;
  }
}
