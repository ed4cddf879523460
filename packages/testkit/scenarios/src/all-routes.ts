import type { AuthGates } from "@patchpull/testkit-utils";
import type { InMemoryStore } from "./store.js";
import type { RouteDescriptor } from "./types.js";
import {
  getPatch,
  listPatchChecks,
  listPatches,
  patchMbox,
  updatePatch,
} from "./routes/patches.js";
import { getSeries, listSeries, seriesMbox } from "./routes/series.js";
import { bundleMbox, getBundle, listBundles } from "./routes/bundles.js";
import { listPeople, listUsers } from "./routes/users.js";

export function assembleAllRoutes(auth: AuthGates, store: InMemoryStore): RouteDescriptor[] {
  return [
    listPatches(auth, store),
    getPatch(auth, store),
    updatePatch(auth, store),
    listPatchChecks(auth, store),
    patchMbox(auth, store),
    listSeries(auth, store),
    getSeries(auth, store),
    seriesMbox(auth, store),
    listBundles(auth, store),
    getBundle(auth, store),
    bundleMbox(auth, store),
    listPeople(auth, store),
    listUsers(auth, store),
  ];
}
