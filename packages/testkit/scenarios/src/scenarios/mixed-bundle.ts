import { makeBundle, makeDiff, makePatch, makeSeries, toPatchRef } from "@patchpull/testkit-fixtures";
import type { ScenarioOptions, ScenarioResult } from "../types.js";
import { buildScenario } from "./build.js";
import { alan, linkSeries, maintainer, seriesOfThreeSeed } from "./series-of-three.js";

/**
 * Adds a second series (11: patches 5, 6) to the three-patch scenario and a bundle
 * `mixed` (21) holding patches 1, 4, 5 and 6 from different series.
 */
export function mixedBundle(opts: ScenarioOptions = {}): ScenarioResult {
  const seed = seriesOfThreeSeed();
  const submitter = alan();
  const cleanup = linkSeries(makeSeries({ id: 11, name: "Tidy build scripts", submitter }), [
    makePatch({ id: 5, name: "build: drop legacy flags", submitter, diff: makeDiff({ file: "Makefile" }) }),
    makePatch({ id: 6, name: "build: quieter output", submitter, diff: makeDiff({ file: "scripts/build.sh" }) }),
  ]);
  const byId = new Map([...seed.patches, ...cleanup.patches].map((p) => [p.id, p]));
  const members = [1, 4, 5, 6].flatMap((id) => {
    const p = byId.get(id);
    return p ? [toPatchRef(p)] : [];
  });
  const mixed = makeBundle({ id: 21, name: "mixed", owner: maintainer(), patches: members });
  return buildScenario(
    {
      ...seed,
      patches: [...seed.patches, ...cleanup.patches],
      series: [...seed.series, cleanup.series],
      bundles: [...seed.bundles, mixed],
    },
    opts,
  );
}
