import { makeDiff, makeMbox } from "@patchpull/testkit-fixtures";
import type { ScenarioOptions, ScenarioResult } from "../types.js";
import { buildScenario } from "./build.js";
import { seriesOfThreeSeed } from "./series-of-three.js";

/**
 * The three-patch series where patch 2 was revised on the server after its hash
 * was recorded: the served content no longer matches `hash`.
 */
export function revisedPatch(opts: ScenarioOptions = {}): ScenarioResult {
  const seed = seriesOfThreeSeed();
  const second = seed.patches.find((p) => p.id === 2);
  const content: Record<string, string> = {};
  if (second) {
    content[new URL(second.mbox).pathname] = makeMbox({
      name: second.name,
      diff: makeDiff({ file: "widget/parse.c", after: "revised line" }),
      submitter: second.submitter,
    });
  }
  return buildScenario({ ...seed, content }, opts);
}

/** The three-patch scenario behind credentials: anonymous reads get 401. */
export function authRequired(opts: ScenarioOptions = {}): ScenarioResult {
  const scenario = buildScenario(seriesOfThreeSeed(), opts);
  scenario.controls.auth.set("requireForReads", true);
  return scenario;
}
