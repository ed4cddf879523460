import { makeDiff, makePatch, makeSeries, toSeriesRef } from "@patchpull/testkit-fixtures";
import type { ScenarioOptions, ScenarioResult } from "../types.js";
import { buildScenario } from "./build.js";
import { ada, linkSeries, seriesOfThreeSeed } from "./series-of-three.js";

/**
 * Patch 3 is re-posted in a follow-up series (12: patches 7, 3), so it belongs
 * to series 10 and 12; 12 is the more recent one.
 */
export function sharedPatch(opts: ScenarioOptions = {}): ScenarioResult {
  const seed = seriesOfThreeSeed();
  const submitter = ada();
  const followUp = linkSeries(makeSeries({ id: 12, name: "Widget follow-ups", submitter }), [
    makePatch({ id: 7, name: "widget: add fuzz harness", submitter, diff: makeDiff({ file: "widget/fuzz.c" }) }),
    ...seed.patches.filter((p) => p.id === 3),
  ]);
  const earlier = seed.series.map(toSeriesRef);
  const patches = [
    ...seed.patches.filter((p) => p.id !== 3),
    ...followUp.patches.map((p) => (p.id === 3 ? { ...p, series: [...earlier, ...p.series] } : p)),
  ];
  return buildScenario({ ...seed, patches, series: [...seed.series, followUp.series] }, opts);
}
