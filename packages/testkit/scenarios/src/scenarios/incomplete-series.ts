import { makeDiff, makePatch, makeSeries } from "@patchpull/testkit-fixtures";
import type { ScenarioOptions, ScenarioResult } from "../types.js";
import { buildScenario } from "./build.js";
import { ada, linkSeries, maintainer } from "./series-of-three.js";

/** Series 30 announces three patches but only 31 and 32 arrived. */
export function incompleteSeries(opts: ScenarioOptions = {}): ScenarioResult {
  const submitter = ada();
  const partial = linkSeries(
    makeSeries({ id: 30, name: "Half-delivered series", submitter, total: 3, received_all: false }),
    [
      makePatch({ id: 31, name: "part one", submitter, diff: makeDiff({ file: "one.c" }) }),
      makePatch({ id: 32, name: "part two", submitter, diff: makeDiff({ file: "two.c" }) }),
    ],
  );
  return buildScenario(
    {
      patches: partial.patches,
      series: [partial.series],
      bundles: [],
      people: [submitter],
      users: [maintainer()],
    },
    opts,
  );
}
