export interface Page<T> {
  items: T[];
  /** Absolute URL of the following page, `null` on the last page. */
  next: string | null;
  previous: string | null;
  url: string;
}

export type PageFetcher<T> = (url: string) => Promise<Page<T>>;

export interface CursorOptions {
  /** Stop after this many items without fetching further pages. */
  limit?: number;
  /** Pages fetched ahead of the consumer; 0 fetches strictly on demand. */
  prefetch?: number;
}

interface PageNode<T> {
  index: number;
  page: Promise<Page<T>>;
  resolved?: Page<T>;
  /** Items in this page and every page before it. */
  itemsThrough?: number;
  following?: PageNode<T>;
}

/**
 * Forward-only, single-use async sequence over a paginated collection.
 * Once an iteration finishes or is abandoned, the cursor yields nothing more.
 */
export class ResourceCursor<T> implements AsyncIterable<T> {
  private readonly iterator: AsyncGenerator<T, void, undefined>;

  constructor(iterator: AsyncGenerator<T, void, undefined>) {
    this.iterator = iterator;
  }

  static fromPages<T>(firstUrl: string, fetchPage: PageFetcher<T>, opts: CursorOptions = {}): ResourceCursor<T> {
    return new ResourceCursor(walk(firstUrl, fetchPage, opts));
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.iterator;
  }

  map<U>(fn: (item: T) => U): ResourceCursor<U> {
    const source = this.iterator;
    async function* mapped(): AsyncGenerator<U, void, undefined> {
      for await (const item of { [Symbol.asyncIterator]: () => source }) yield fn(item);
    }
    return new ResourceCursor(mapped());
  }

  async toArray(): Promise<T[]> {
    const out: T[] = [];
    for await (const item of this) out.push(item);
    return out;
  }
}

async function* walk<T>(
  firstUrl: string,
  fetchPage: PageFetcher<T>,
  opts: CursorOptions,
): AsyncGenerator<T, void, undefined> {
  const limit = opts.limit;
  const depth = Math.max(0, opts.prefetch ?? 0);
  if (limit !== undefined && limit <= 0) return;

  let consuming = 0;

  const start = (url: string, index: number, itemsBefore: number): PageNode<T> => {
    const node: PageNode<T> = { index, page: fetchPage(url) };
    node.page.then(
      (page) => {
        node.resolved = page;
        node.itemsThrough = itemsBefore + page.items.length;
        extend(node);
      },
      // The consumer sees the rejection when it awaits this page.
      () => undefined,
    );
    return node;
  };

  const follow = (node: PageNode<T>): PageNode<T> | null => {
    if (node.following) return node.following;
    const page = node.resolved;
    if (!page?.next) return null;
    node.following = start(page.next, node.index + 1, node.itemsThrough ?? 0);
    return node.following;
  };

  // Look-ahead: keep up to `depth` pages in flight past the one being consumed.
  const extend = (node: PageNode<T>) => {
    if (node.index - consuming >= depth) return;
    if (limit !== undefined && (node.itemsThrough ?? 0) >= limit) return;
    follow(node);
  };

  let node: PageNode<T> | null = start(firstUrl, 0, 0);
  let delivered = 0;

  while (node) {
    consuming = node.index;
    const page: Page<T> = await node.page;
    node.resolved = page;
    node.itemsThrough ??= delivered + page.items.length;

    // Pages already resolved ahead of us may have paused on the depth bound.
    let ahead: PageNode<T> | undefined = node;
    while (ahead.following) ahead = ahead.following;
    if (ahead.resolved) extend(ahead);

    for (const item of page.items) {
      yield item;
      delivered += 1;
      if (limit !== undefined && delivered >= limit) return;
    }
    node = follow(node);
  }
}
