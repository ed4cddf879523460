import type { AuthGates } from "@patchpull/testkit-utils";
import type { InMemoryStore } from "../store.js";
import type { RouteDescriptor } from "../types.js";
import {
  API_PREFIX,
  anyOf,
  guard,
  inDateRange,
  listResponse,
  matchesProject,
  matchesQuery,
  mboxResponse,
  notFound,
  numericParam,
  sortBy,
} from "./common.js";
import { renderPatchMbox, slugify } from "./mbox.js";

export function listSeries(auth: AuthGates, store: InMemoryStore): RouteDescriptor {
  return {
    method: "GET",
    path: `${API_PREFIX}/series/`,
    handler: ({ req }) => {
      const denied = guard(auth, req);
      if (denied) return denied;
      const q = req.url.searchParams;
      const items = Array.from(store.series.values()).filter(
        (s) =>
          matchesProject(q, s.project) &&
          anyOf(q.getAll("submitter"), s.submitter.id, s.submitter.email) &&
          inDateRange(s.date, q) &&
          matchesQuery(q, s.name),
      );
      return listResponse(req.url, sortBy(items, q.get("order")));
    },
  };
}

export function getSeries(auth: AuthGates, store: InMemoryStore): RouteDescriptor {
  return {
    method: "GET",
    path: `${API_PREFIX}/series/:seriesId/`,
    handler: ({ req, params }) => {
      const denied = guard(auth, req);
      if (denied) return denied;
      const series = store.series.get(numericParam(params, "seriesId"));
      if (!series) return notFound();
      return { status: 200, json: series };
    },
  };
}

export function seriesMbox(auth: AuthGates, store: InMemoryStore): RouteDescriptor {
  return {
    method: "GET",
    path: "/series/:seriesId/mbox/",
    handler: ({ req, params }) => {
      const denied = guard(auth, req);
      if (denied) return denied;
      const series = store.series.get(numericParam(params, "seriesId"));
      if (!series) return notFound();
      const parts = series.patches.map((ref) => {
        const patch = store.patches.get(ref.id);
        return patch ? renderPatchMbox(store, patch) : "";
      });
      return mboxResponse(parts.join("\n"), `${series.id}-${slugify(series.name ?? "series")}.patch`);
    },
  };
}
