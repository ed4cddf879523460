import { errorEnvelope, linkHeader, paginateArray, type AuthGates } from "@patchpull/testkit-utils";
import type { HandlerFn } from "../types.js";

export const API_PREFIX = "/api/1.1";

type HandlerResult = ReturnType<HandlerFn>;
type Req = Parameters<HandlerFn>[0]["req"];

/** Returns an error response when the request lacks acceptable credentials. */
export function guard(auth: AuthGates, req: Req, write = false): HandlerResult | null {
  const verdict = auth.check(req.headers["authorization"], write);
  if (verdict === "unauthorized") {
    const key = req.headers["authorization"] ? "INVALID_TOKEN" : "UNAUTHORIZED";
    return { status: 401, json: errorEnvelope(key) };
  }
  if (verdict === "forbidden") return { status: 403, json: errorEnvelope("FORBIDDEN") };
  return null;
}

export function notFound(): HandlerResult {
  return { status: 404, json: errorEnvelope("NOT_FOUND") };
}

export function listResponse<T>(url: URL, items: readonly T[]): HandlerResult {
  const slice = paginateArray(items, url.searchParams);
  const link = linkHeader(url, slice);
  return { status: 200, json: slice.items, headers: link ? { link } : {} };
}

export function numericParam(params: Record<string, string>, name: string): number {
  return Number(params[name]);
}

type Sortable = { id: number; name?: string | null; date?: string };

export function sortBy<T extends Sortable>(items: T[], order: string | null): T[] {
  if (!order) return items;
  const desc = order.startsWith("-");
  const field = desc ? order.slice(1) : order;
  if (field !== "id" && field !== "name" && field !== "date") return items;
  const sorted = [...items].sort((a, b) => {
    const av = a[field] ?? "";
    const bv = b[field] ?? "";
    if (av < bv) return -1;
    if (av > bv) return 1;
    return 0;
  });
  return desc ? sorted.reverse() : sorted;
}

/** True when `values` is empty or contains `candidate` (repeated params are OR'd). */
export function anyOf(values: string[], ...candidates: (string | number | null | undefined)[]) {
  if (values.length === 0) return true;
  return candidates.some((c) => c != null && values.includes(String(c)));
}

export function inDateRange(date: string, params: URLSearchParams): boolean {
  const since = params.get("since");
  const before = params.get("before");
  if (since && Date.parse(date) < Date.parse(since)) return false;
  if (before && Date.parse(date) > Date.parse(before)) return false;
  return true;
}

export function matchesQuery(params: URLSearchParams, ...fields: (string | null | undefined)[]) {
  const q = params.get("q");
  if (!q) return true;
  const needle = q.toLowerCase();
  return fields.some((f) => f != null && f.toLowerCase().includes(needle));
}

export function matchesProject(params: URLSearchParams, project: { id: number; link_name: string }) {
  return anyOf(params.getAll("project"), project.id, project.link_name);
}

export function mboxResponse(body: string, filename: string): HandlerResult {
  return {
    status: 200,
    body,
    headers: {
      "content-type": "text/plain; charset=UTF-8",
      "content-disposition": `attachment; filename=${filename}`,
    },
  };
}
