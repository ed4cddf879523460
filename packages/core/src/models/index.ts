export * from "./common.js";
export * from "./patch.js";
export * from "./series.js";
export * from "./bundle.js";
export * from "./people.js";
