import type { AuthGates } from "@patchpull/testkit-utils";
import type { InMemoryStore } from "../store.js";
import type { RouteDescriptor } from "../types.js";
import { API_PREFIX, guard, listResponse, matchesQuery } from "./common.js";

export function listPeople(auth: AuthGates, store: InMemoryStore): RouteDescriptor {
  return {
    method: "GET",
    path: `${API_PREFIX}/people/`,
    handler: ({ req }) => {
      const denied = guard(auth, req);
      if (denied) return denied;
      const q = req.url.searchParams;
      const items = Array.from(store.people.values()).filter((p) =>
        matchesQuery(q, p.name, p.email),
      );
      return listResponse(req.url, items);
    },
  };
}

export function listUsers(auth: AuthGates, store: InMemoryStore): RouteDescriptor {
  return {
    method: "GET",
    path: `${API_PREFIX}/users/`,
    handler: ({ req }) => {
      const denied = guard(auth, req);
      if (denied) return denied;
      const q = req.url.searchParams;
      const items = Array.from(store.users.values()).filter((u) =>
        matchesQuery(q, u.username, u.email, `${u.first_name} ${u.last_name}`),
      );
      return listResponse(req.url, items);
    },
  };
}
