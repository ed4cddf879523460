import type { Logger } from "pino";
import { InvalidFilterError } from "../errors.js";
import type { QueryParams, QueryValue } from "../http/transport.js";
import { resourceSpec, type FilterSpec, type ResourceType } from "./catalog.js";

export type FilterScalar = string | number | boolean | Date;
export type FilterValue = FilterScalar | readonly (string | number)[];
export type Filters = Readonly<Record<string, FilterValue | undefined>>;

export interface FilterContext {
  /** `null` disables project scoping. */
  project: string | null;
  apiVersion: readonly [number, number];
  allowedStates: readonly string[] | null;
  logger: Logger;
}

function scalar(type: ResourceType, key: string, spec: FilterSpec, value: FilterScalar): QueryValue {
  const invalid = (expected: string) =>
    new InvalidFilterError(`Filter "${key}" on ${type} expects ${expected}, got ${describe(value)}`);

  switch (spec.kind) {
    case "boolean":
      if (typeof value === "boolean") return value ? "true" : "false";
      if (value === "true" || value === "false") return value;
      throw invalid("a boolean");
    case "date":
      if (value instanceof Date) {
        if (Number.isNaN(value.getTime())) throw invalid("a valid timestamp");
        return value.toISOString();
      }
      if (typeof value === "string" && !Number.isNaN(Date.parse(value))) return value;
      throw invalid("a timestamp");
    case "id":
    case "text":
      if (typeof value === "string" || typeof value === "number") return value;
      throw invalid(spec.kind === "id" ? "an id" : "a string");
  }
}

function describe(value: FilterScalar): string {
  if (value instanceof Date) return "a Date";
  return `${typeof value} ${JSON.stringify(value)}`;
}

/**
 * Validate `filters` against the resource's catalog entry and turn them into
 * query parameters. Runs before any request so bad filters never reach the wire.
 */
export function buildFilterQuery(type: ResourceType, filters: Filters, ctx: FilterContext): QueryParams {
  const spec = resourceSpec(type);
  const query: Record<string, QueryValue | QueryValue[]> = {};
  let multiValued = false;

  for (const [key, value] of Object.entries(filters)) {
    if (value === undefined) continue;
    const filterSpec = spec.filters[key];
    if (!filterSpec) {
      const known = Object.keys(spec.filters).sort().join(", ");
      throw new InvalidFilterError(`Unsupported filter "${key}" for ${type}; supported: ${known}`);
    }

    if (typeof value === "object" && !(value instanceof Date)) {
      if (!filterSpec.multi) {
        throw new InvalidFilterError(`Filter "${key}" on ${type} takes a single value`);
      }
      if (value.length === 0) {
        throw new InvalidFilterError(`Filter "${key}" on ${type} needs at least one value`);
      }
      query[key] = value.map((v) => scalar(type, key, filterSpec, v));
      if (value.length > 1) multiValued = true;
    } else {
      query[key] = scalar(type, key, filterSpec, value);
    }
  }

  // The configured vocabulary is the project's patch states; checks have their own.
  if (type === "patches" && ctx.allowedStates && query.state !== undefined) {
    const states = Array.isArray(query.state) ? query.state : [query.state];
    for (const state of states) {
      if (!ctx.allowedStates.includes(String(state))) {
        throw new InvalidFilterError(
          `Unknown state "${String(state)}"; expected one of: ${ctx.allowedStates.join(", ")}`,
        );
      }
    }
  }

  if (spec.scopedToProject && ctx.project !== null && query.project === undefined) {
    query.project = ctx.project;
  }

  if (multiValued && ctx.apiVersion[0] === 1 && ctx.apiVersion[1] === 0) {
    ctx.logger.warn(
      { resource: type },
      "Multiple filter values are not supported by API 1.0; the server uses only the last one",
    );
  }

  return query;
}
