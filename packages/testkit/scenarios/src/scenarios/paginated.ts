import { makeDiff, makePatch } from "@patchpull/testkit-fixtures";
import type { ScenarioOptions, ScenarioResult } from "../types.js";
import { buildScenario } from "./build.js";
import { ada, alan, maintainer } from "./series-of-three.js";

const STATES = ["new", "under-review", "accepted"] as const;

/** `count` standalone patches with ids 1..count, states cycling new/under-review/accepted. */
export function paginatedPatches(count: number, opts: ScenarioOptions = {}): ScenarioResult {
  const patches = Array.from({ length: count }, (_, i) => {
    const id = i + 1;
    return makePatch({
      id,
      name: `change ${id}`,
      state: STATES[i % STATES.length],
      submitter: id % 2 === 0 ? alan() : ada(),
      diff: makeDiff({ file: `src/file-${id}.c` }),
    });
  });
  return buildScenario(
    { patches, series: [], bundles: [], people: [ada(), alan()], users: [maintainer()] },
    opts,
  );
}
