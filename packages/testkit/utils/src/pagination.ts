export interface PaginateParams {
  page?: number;
  perPage?: number;
}

export const DEFAULT_PER_PAGE = 30;
export const MAX_PER_PAGE = 250;

export interface PageSlice<T> {
  items: T[];
  page: number;
  hasNext: boolean;
  hasPrevious: boolean;
}

export function paginateArray<T>(
  data: readonly T[],
  params: URLSearchParams | PaginateParams,
): PageSlice<T> {
  const pageStr =
    params instanceof URLSearchParams
      ? (params.get("page") ?? undefined)
      : params.page !== undefined
        ? String(params.page)
        : undefined;
  const perPageStr =
    params instanceof URLSearchParams
      ? (params.get("per_page") ?? undefined)
      : params.perPage !== undefined
        ? String(params.perPage)
        : undefined;
  const page = Math.max(1, Number(pageStr || 1));
  const perPage = Math.min(MAX_PER_PAGE, Math.max(1, Number(perPageStr || DEFAULT_PER_PAGE)));
  const start = (page - 1) * perPage;
  const items = data.slice(start, start + perPage);
  return { items, page, hasNext: start + perPage < data.length, hasPrevious: page > 1 };
}

/** RFC 8288 `Link` header with `next`/`prev` relations, as the real server sends it. */
export function linkHeader(url: URL, slice: PageSlice<unknown>): string | undefined {
  const links: string[] = [];
  const at = (page: number) => {
    const u = new URL(url.toString());
    u.searchParams.set("page", String(page));
    return u.toString();
  };
  if (slice.hasNext) links.push(`<${at(slice.page + 1)}>; rel="next"`);
  if (slice.hasPrevious) links.push(`<${at(slice.page - 1)}>; rel="prev"`);
  return links.length ? links.join(", ") : undefined;
}
