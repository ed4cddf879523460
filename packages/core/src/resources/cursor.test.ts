import { describe, it, expect } from "vitest";
import { ResourceCursor, type Page } from "./cursor.js";

function fakePages(sizes: number[], failAt?: number) {
  const calls: string[] = [];
  let counter = 0;
  const pages = sizes.map((size, index): Page<number> => {
    const items = Array.from({ length: size }, () => ++counter);
    return {
      items,
      url: `page-${index}`,
      next: index + 1 < sizes.length ? `page-${index + 1}` : null,
      previous: index > 0 ? `page-${index - 1}` : null,
    };
  });
  const fetchPage = async (url: string): Promise<Page<number>> => {
    calls.push(url);
    const index = Number(url.slice("page-".length));
    if (index === failAt) throw new Error(`boom at ${url}`);
    return pages[index];
  };
  return { calls, fetchPage };
}

const settle = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("ResourceCursor", () => {
  it("yields every item across pages in order", async () => {
    const { calls, fetchPage } = fakePages([2, 2, 1]);
    const items = await ResourceCursor.fromPages("page-0", fetchPage).toArray();
    expect(items).toEqual([1, 2, 3, 4, 5]);
    expect(calls).toEqual(["page-0", "page-1", "page-2"]);
  });

  it("fetches the next page only when the current one is exhausted", async () => {
    const { calls, fetchPage } = fakePages([2, 2]);
    const iter = ResourceCursor.fromPages("page-0", fetchPage)[Symbol.asyncIterator]();
    await iter.next();
    await iter.next();
    await settle();
    expect(calls).toEqual(["page-0"]);
    expect(await iter.next()).toEqual({ value: 3, done: false });
    expect(calls).toEqual(["page-0", "page-1"]);
  });

  it("stops at the limit without fetching another page", async () => {
    const { calls, fetchPage } = fakePages([2, 2]);
    const items = await ResourceCursor.fromPages("page-0", fetchPage, { limit: 2 }).toArray();
    expect(items).toEqual([1, 2]);
    expect(calls).toEqual(["page-0"]);
  });

  it("yields nothing for a zero limit", async () => {
    const { calls, fetchPage } = fakePages([2]);
    expect(await ResourceCursor.fromPages("page-0", fetchPage, { limit: 0 }).toArray()).toEqual([]);
    expect(calls).toEqual([]);
  });

  it("prefetches at most the configured number of pages ahead", async () => {
    const { calls, fetchPage } = fakePages([1, 1, 1, 1, 1]);
    const cursor = ResourceCursor.fromPages("page-0", fetchPage, { prefetch: 2 });
    const iter = cursor[Symbol.asyncIterator]();
    expect(await iter.next()).toEqual({ value: 1, done: false });
    await settle();
    expect(calls).toEqual(["page-0", "page-1", "page-2"]);

    const rest: number[] = [];
    for await (const item of cursor) rest.push(item);
    expect(rest).toEqual([2, 3, 4, 5]);
    expect(calls).toEqual(["page-0", "page-1", "page-2", "page-3", "page-4"]);
  });

  it("does not prefetch past the limit", async () => {
    const { calls, fetchPage } = fakePages([2, 2, 2]);
    const items = await ResourceCursor.fromPages("page-0", fetchPage, { limit: 2, prefetch: 3 }).toArray();
    await settle();
    expect(items).toEqual([1, 2]);
    expect(calls).toEqual(["page-0"]);
  });

  it("surfaces a page failure after delivering earlier items", async () => {
    const { fetchPage } = fakePages([2, 2, 2], 1);
    const seen: number[] = [];
    const run = async () => {
      for await (const item of ResourceCursor.fromPages("page-0", fetchPage, { prefetch: 1 })) seen.push(item);
    };
    await expect(run()).rejects.toThrow("boom at page-1");
    expect(seen).toEqual([1, 2]);
  });

  it("cannot be restarted", async () => {
    const { calls, fetchPage } = fakePages([2]);
    const cursor = ResourceCursor.fromPages("page-0", fetchPage);
    expect(await cursor.toArray()).toEqual([1, 2]);
    expect(await cursor.toArray()).toEqual([]);
    expect(calls).toEqual(["page-0"]);
  });

  it("maps items lazily", async () => {
    const { fetchPage } = fakePages([2, 1]);
    const labels = await ResourceCursor.fromPages("page-0", fetchPage)
      .map((n) => `#${n}`)
      .toArray();
    expect(labels).toEqual(["#1", "#2", "#3"]);
  });
});
