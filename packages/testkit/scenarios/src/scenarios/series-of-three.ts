import {
  makeBundle,
  makeDiff,
  makePatch,
  makePerson,
  makeSeries,
  makeUser,
  toPatchRef,
  toSeriesRef,
  type PatchItem,
  type SeriesItem,
} from "@patchpull/testkit-fixtures";
import type { DBSeed } from "../store.js";
import type { ScenarioOptions, ScenarioResult } from "../types.js";
import { buildScenario } from "./build.js";

export const ada = () => makePerson({ id: 100, name: "Ada Lovelace", email: "ada@example.com" });
export const alan = () => makePerson({ id: 101, name: "Alan Turing", email: "alan@example.com" });
export const maintainer = () => makeUser({ id: 200, username: "maintainer" });
export const reviewer = () =>
  makeUser({ id: 201, username: "reviewer", first_name: "Rita", last_name: "Reviewer", email: "rita@example.com" });

/** Creates `series` with `members` and points every member back at it. */
export function linkSeries(series: SeriesItem, members: PatchItem[]): {
  series: SeriesItem;
  patches: PatchItem[];
} {
  const linked: SeriesItem = {
    ...series,
    patches: members.map(toPatchRef),
    total: series.total || members.length,
    received_total: members.length,
  };
  return {
    series: linked,
    patches: members.map((p) => ({ ...p, series: [toSeriesRef(linked)] })),
  };
}

export function seriesOfThreeSeed(): DBSeed {
  const submitter = ada();
  const widget = linkSeries(makeSeries({ id: 10, name: "Add widget support", submitter }), [
    makePatch({ id: 1, name: "widget: add core type", submitter, diff: makeDiff({ file: "widget/core.c" }) }),
    makePatch({ id: 2, name: "widget: wire up parser", submitter, diff: makeDiff({ file: "widget/parse.c" }) }),
    makePatch({ id: 3, name: "widget: document usage", submitter, diff: makeDiff({ file: "docs/widget.rst" }) }),
  ]);
  const typo = makePatch({
    id: 4,
    name: "README: fix typo",
    submitter: alan(),
    state: "under-review",
    diff: makeDiff({ file: "README", before: "teh", after: "the" }),
  });
  const queue = makeBundle({
    id: 20,
    name: "stable-queue",
    owner: maintainer(),
    patches: [toPatchRef(typo), toPatchRef(widget.patches[0])],
  });
  return {
    patches: [...widget.patches, typo],
    series: [widget.series],
    bundles: [queue],
    people: [submitter, alan()],
    users: [maintainer(), reviewer()],
  };
}

/** One complete three-patch series, one standalone patch and a bundle. */
export function seriesOfThree(opts: ScenarioOptions = {}): ScenarioResult {
  return buildScenario(seriesOfThreeSeed(), opts);
}
