export type FilterKind = "text" | "id" | "boolean" | "date";

export interface FilterSpec {
  kind: FilterKind;
  /** Accepts a set of values, sent as repeated query parameters (OR). */
  multi?: boolean;
}

export interface ResourceSpec {
  /** Collection path under the API root. */
  path: string;
  filters: Record<string, FilterSpec>;
  /** Whether the configured project is applied as a filter. */
  scopedToProject: boolean;
  /** Nested collections live under a record of this resource. */
  parent?: string;
}

const since: FilterSpec = { kind: "date" };
const before: FilterSpec = { kind: "date" };
const q: FilterSpec = { kind: "text" };

export const CATALOG = {
  patches: {
    path: "patches",
    scopedToProject: true,
    filters: {
      project: { kind: "text" },
      series: { kind: "id", multi: true },
      submitter: { kind: "id", multi: true },
      delegate: { kind: "id", multi: true },
      state: { kind: "text", multi: true },
      archived: { kind: "boolean" },
      hash: { kind: "text" },
      msgid: { kind: "text" },
      since,
      before,
      q,
    },
  },
  covers: {
    path: "covers",
    scopedToProject: true,
    filters: {
      project: { kind: "text" },
      series: { kind: "id", multi: true },
      submitter: { kind: "id", multi: true },
      msgid: { kind: "text" },
      since,
      before,
      q,
    },
  },
  series: {
    path: "series",
    scopedToProject: true,
    filters: {
      project: { kind: "text" },
      submitter: { kind: "id", multi: true },
      since,
      before,
      q,
    },
  },
  bundles: {
    path: "bundles",
    scopedToProject: true,
    filters: {
      project: { kind: "text" },
      owner: { kind: "id", multi: true },
      public: { kind: "boolean" },
      q,
    },
  },
  checks: {
    path: "checks",
    scopedToProject: false,
    parent: "patches",
    filters: {
      user: { kind: "id", multi: true },
      state: { kind: "text", multi: true },
      context: { kind: "text" },
      since,
      before,
    },
  },
  people: { path: "people", scopedToProject: false, filters: { q } },
  users: { path: "users", scopedToProject: false, filters: { q } },
  projects: { path: "projects", scopedToProject: false, filters: { q } },
} as const satisfies Record<string, ResourceSpec>;

export type ResourceType = keyof typeof CATALOG;

export function isResourceType(type: string): type is ResourceType {
  return Object.prototype.hasOwnProperty.call(CATALOG, type);
}

export function resourceSpec(type: ResourceType): ResourceSpec {
  return CATALOG[type];
}
