import { AuthGates } from "@patchpull/testkit-utils";
import { InMemoryStore, type DBSeed } from "../store.js";
import type { ScenarioOptions, ScenarioResult } from "../types.js";
import { assembleAllRoutes } from "../all-routes.js";

export function buildScenario(dbSeed: DBSeed, opts: ScenarioOptions = {}): ScenarioResult {
  const { hashDiff } = opts;
  if (hashDiff) {
    dbSeed.patches = dbSeed.patches.map((p) => (p.diff ? { ...p, hash: hashDiff(p.diff) } : p));
  }
  const store = new InMemoryStore(dbSeed);
  const auth = new AuthGates();
  const routes = assembleAllRoutes(auth, store);
  return {
    dbSeed,
    store,
    handlers: { routes },
    controls: { auth, reset: () => store.reset(dbSeed) },
  };
}
