export * from "./types.js";
export { InMemoryStore, type DBSeed, type RecordedRequest } from "./store.js";
export { assembleAllRoutes } from "./all-routes.js";
export { buildScenario } from "./scenarios/build.js";
export { emptyProject } from "./scenarios/empty.js";
export { seriesOfThree, seriesOfThreeSeed, linkSeries } from "./scenarios/series-of-three.js";
export { mixedBundle } from "./scenarios/mixed-bundle.js";
export { sharedPatch } from "./scenarios/shared-patch.js";
export { incompleteSeries } from "./scenarios/incomplete-series.js";
export { versionedSeries } from "./scenarios/versioned-series.js";
export { paginatedPatches } from "./scenarios/paginated.js";
export { revisedPatch, authRequired } from "./scenarios/revised-patch.js";
