import { makeDiff, makePatch, makeSeries } from "@patchpull/testkit-fixtures";
import type { ScenarioOptions, ScenarioResult } from "../types.js";
import { buildScenario } from "./build.js";
import { ada, alan, linkSeries, maintainer } from "./series-of-three.js";

/**
 * "Rework parser" posted three times by Ada (v1: 40, v2: 43, v3: 46) and once,
 * as v4, by Alan (49). Alan's posting is not a sibling of Ada's.
 */
export function versionedSeries(opts: ScenarioOptions = {}): ScenarioResult {
  const name = "Rework parser";
  const version = (id: number, v: number, submitter = ada()) =>
    linkSeries(makeSeries({ id, name, version: v, submitter }), [
      makePatch({ id: id + 1, name: `parser: step one (v${v})`, submitter, diff: makeDiff({ file: "parser.c", after: `v${v}` }) }),
      makePatch({ id: id + 2, name: `parser: step two (v${v})`, submitter, diff: makeDiff({ file: "lexer.c", after: `v${v}` }) }),
    ]);
  const all = [version(40, 1), version(43, 2), version(46, 3), version(49, 4, alan())];
  return buildScenario(
    {
      patches: all.flatMap((s) => s.patches),
      series: all.map((s) => s.series),
      bundles: [],
      people: [ada(), alan()],
      users: [maintainer()],
    },
    opts,
  );
}
