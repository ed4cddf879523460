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

export function listPatches(auth: AuthGates, store: InMemoryStore): RouteDescriptor {
  return {
    method: "GET",
    path: `${API_PREFIX}/patches/`,
    handler: ({ req }) => {
      const denied = guard(auth, req);
      if (denied) return denied;
      const q = req.url.searchParams;
      const archived = q.get("archived");
      const items = Array.from(store.patches.values()).filter(
        (p) =>
          matchesProject(q, p.project) &&
          anyOf(q.getAll("state"), p.state) &&
          anyOf(q.getAll("submitter"), p.submitter.id, p.submitter.email) &&
          anyOf(q.getAll("delegate"), p.delegate?.id, p.delegate?.username) &&
          anyOf(q.getAll("series"), ...p.series.map((s) => s.id)) &&
          anyOf(q.getAll("hash"), p.hash) &&
          anyOf(q.getAll("msgid"), p.msgid) &&
          (archived === null || String(p.archived) === archived) &&
          inDateRange(p.date, q) &&
          matchesQuery(q, p.name),
      );
      // list views omit the diff body
      const summaries = sortBy(items, q.get("order")).map(({ diff: _diff, ...rest }) => rest);
      return listResponse(req.url, summaries);
    },
  };
}

export function getPatch(auth: AuthGates, store: InMemoryStore): RouteDescriptor {
  return {
    method: "GET",
    path: `${API_PREFIX}/patches/:patchId/`,
    handler: ({ req, params }) => {
      const denied = guard(auth, req);
      if (denied) return denied;
      const patch = store.patches.get(numericParam(params, "patchId"));
      if (!patch) return notFound();
      return { status: 200, json: patch };
    },
  };
}

export function updatePatch(auth: AuthGates, store: InMemoryStore): RouteDescriptor {
  return {
    method: "PATCH",
    path: `${API_PREFIX}/patches/:patchId/`,
    handler: ({ req, params }) => {
      const denied = guard(auth, req, true);
      if (denied) return denied;
      const patch = store.patches.get(numericParam(params, "patchId"));
      if (!patch) return notFound();
      const body: Record<string, unknown> =
        typeof req.body === "object" && req.body !== null ? { ...req.body } : {};
      const delegate =
        body.delegate === undefined
          ? patch.delegate
          : body.delegate === null
            ? null
            : (store.users.get(Number(body.delegate)) ?? null);
      const next = {
        ...patch,
        state: typeof body.state === "string" ? body.state : patch.state,
        archived: typeof body.archived === "boolean" ? body.archived : patch.archived,
        commit_ref: typeof body.commit_ref === "string" ? body.commit_ref : patch.commit_ref,
        delegate,
      };
      store.patches.set(patch.id, next);
      return { status: 200, json: next };
    },
  };
}

export function listPatchChecks(auth: AuthGates, store: InMemoryStore): RouteDescriptor {
  return {
    method: "GET",
    path: `${API_PREFIX}/patches/:patchId/checks/`,
    handler: ({ req, params }) => {
      const denied = guard(auth, req);
      if (denied) return denied;
      if (!store.patches.has(numericParam(params, "patchId"))) return notFound();
      return listResponse(req.url, []);
    },
  };
}

export function patchMbox(auth: AuthGates, store: InMemoryStore): RouteDescriptor {
  return {
    method: "GET",
    path: "/project/:project/patch/:patchId/mbox/",
    handler: ({ req, params }) => {
      const denied = guard(auth, req);
      if (denied) return denied;
      const patch = store.patches.get(numericParam(params, "patchId"));
      if (!patch) return notFound();
      return mboxResponse(renderPatchMbox(store, patch), `${patch.id}-${slugify(patch.name)}.patch`);
    },
  };
}
