import type { AuthGates } from "@patchpull/testkit-utils";
import type { InMemoryStore } from "../store.js";
import type { RouteDescriptor } from "../types.js";
import {
  API_PREFIX,
  anyOf,
  guard,
  listResponse,
  matchesProject,
  matchesQuery,
  mboxResponse,
  notFound,
  numericParam,
  sortBy,
} from "./common.js";
import { renderPatchMbox, slugify } from "./mbox.js";

export function listBundles(auth: AuthGates, store: InMemoryStore): RouteDescriptor {
  return {
    method: "GET",
    path: `${API_PREFIX}/bundles/`,
    handler: ({ req }) => {
      const denied = guard(auth, req);
      if (denied) return denied;
      const q = req.url.searchParams;
      const pub = q.get("public");
      const items = Array.from(store.bundles.values()).filter(
        (b) =>
          matchesProject(q, b.project) &&
          anyOf(q.getAll("owner"), b.owner.id, b.owner.username) &&
          (pub === null || String(b.public) === pub) &&
          matchesQuery(q, b.name),
      );
      return listResponse(req.url, sortBy(items, q.get("order")));
    },
  };
}

export function getBundle(auth: AuthGates, store: InMemoryStore): RouteDescriptor {
  return {
    method: "GET",
    path: `${API_PREFIX}/bundles/:bundleId/`,
    handler: ({ req, params }) => {
      const denied = guard(auth, req);
      if (denied) return denied;
      const bundle = store.bundles.get(numericParam(params, "bundleId"));
      if (!bundle) return notFound();
      return { status: 200, json: bundle };
    },
  };
}

export function bundleMbox(auth: AuthGates, store: InMemoryStore): RouteDescriptor {
  return {
    method: "GET",
    path: "/bundle/:owner/:name/mbox/",
    handler: ({ req }) => {
      const denied = guard(auth, req);
      if (denied) return denied;
      const bundle = Array.from(store.bundles.values()).find(
        (b) => new URL(b.mbox).pathname === req.url.pathname,
      );
      if (!bundle) return notFound();
      const parts = bundle.patches.map((ref) => {
        const patch = store.patches.get(ref.id);
        return patch ? renderPatchMbox(store, patch) : "";
      });
      return mboxResponse(parts.join("\n"), `${slugify(bundle.name)}.patch`);
    },
  };
}
