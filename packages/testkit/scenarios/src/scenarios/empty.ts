import { buildScenario } from "./build.js";
import type { ScenarioResult } from "../types.js";

export function emptyProject(): ScenarioResult {
  return buildScenario({ patches: [], series: [], bundles: [], people: [], users: [] });
}
