import type { Logger } from "pino";
import { AmbiguousMatchError, IncompleteSeriesError, NotFoundError } from "../errors.js";
import { toBundle, type Bundle } from "../models/bundle.js";
import type { PatchRef } from "../models/common.js";
import { toPatch, type Patch } from "../models/patch.js";
import { toSeries, type Series } from "../models/series.js";
import { createSelectorLogger } from "../observability/logger.js";
import type { ResourceClient } from "../resources/client.js";
import type { Filters } from "../resources/filters.js";
import { resolveIds } from "./lookup.js";

export interface PatchFilter {
  state?: string | readonly string[];
  /** IDs, names or emails; names and emails are looked up in `people`. */
  submitter?: string | readonly string[];
  /** IDs, usernames or emails; looked up in `users`. */
  delegate?: string | readonly string[];
  since?: Date | string;
  before?: Date | string;
  archived?: boolean;
  q?: string;
  hash?: string;
  msgid?: string;
  order?: string;
  limit?: number;
}

export type SelectionCriteria =
  | {
      kind: "patches";
      ids: readonly string[];
      withDependencies?: boolean;
      /** Series to take dependencies from instead of each patch's latest one; implies `withDependencies`. */
      dependencySeries?: string;
    }
  | { kind: "series"; id: string; version?: number; allowPartial?: boolean }
  | { kind: "bundle"; id: string }
  | { kind: "filter"; filters: PatchFilter };

export type SelectionSource =
  | { kind: "patches"; ids: readonly string[] }
  | { kind: "series"; series: Series }
  | { kind: "bundle"; bundle: Bundle }
  | { kind: "filter"; filters: PatchFilter };

export interface Selection {
  /** Application order. */
  patches: Patch[];
  source: SelectionSource;
}

export interface SelectorOptions {
  client: ResourceClient;
  logger?: Logger;
}

const NUMERIC_ID = /^\d+$/;

const asList = (value: string | readonly string[]): readonly string[] =>
  typeof value === "string" ? [value] : value;

/** Turns selection criteria into an ordered list of patches. */
export class Selector {
  private readonly client: ResourceClient;
  private readonly log: Logger;

  constructor(opts: SelectorOptions) {
    this.client = opts.client;
    this.log = opts.logger ?? createSelectorLogger();
  }

  async resolve(criteria: SelectionCriteria): Promise<Selection> {
    switch (criteria.kind) {
      case "patches":
        return this.resolvePatches(criteria.ids, criteria.withDependencies ?? false, criteria.dependencySeries);
      case "series":
        return this.resolveSeries(criteria.id, criteria.version, criteria.allowPartial ?? false);
      case "bundle":
        return this.resolveBundle(criteria.id);
      case "filter":
        return this.resolveFilter(criteria.filters);
    }
  }

  async patch(id: string): Promise<Patch> {
    return toPatch(await this.client.get("patches", id));
  }

  async series(id: string): Promise<Series> {
    return toSeries(await this.client.get("series", id));
  }

  /** By numeric ID, or by exact name within the configured project. */
  async bundle(idOrName: string): Promise<Bundle> {
    if (NUMERIC_ID.test(idOrName)) return toBundle(await this.client.get("bundles", idOrName));

    const candidates = await this.client.list("bundles", { q: idOrName }).map(toBundle).toArray();
    const matches = candidates.filter((b) => b.name === idOrName);
    if (matches.length === 0) throw new NotFoundError(`No bundle named "${idOrName}"`);
    if (matches.length > 1) throw new AmbiguousMatchError("bundle", idOrName, matches.length);
    return matches[0];
  }

  private async resolvePatches(
    ids: readonly string[],
    withDependencies: boolean,
    dependencySeries: string | undefined,
  ): Promise<Selection> {
    const seen = new Set<string>();
    const patches: Patch[] = [];
    const add = (patch: Patch) => {
      if (seen.has(patch.id)) return;
      seen.add(patch.id);
      patches.push(patch);
    };

    for (const id of ids) {
      if (seen.has(id)) continue;
      const patch = await this.patch(id);
      const from = dependencySeries ?? (withDependencies ? patch.series?.id : undefined);
      if (from !== undefined) {
        if (!patch.allSeries.some((ref) => ref.id === from)) {
          throw new NotFoundError(`Patch ${patch.id} is not part of series ${from}`);
        }
        const series = await this.series(from);
        for (const ref of earlierMembers(series.patches, patch.id)) {
          if (!seen.has(ref.id)) add(await this.patch(ref.id));
        }
      }
      add(patch);
    }
    return { patches, source: { kind: "patches", ids } };
  }

  private async resolveSeries(id: string, version: number | undefined, allowPartial: boolean): Promise<Selection> {
    const requested = await this.series(id);
    const series = await this.pickVersion(requested, version);

    if (!series.complete && !allowPartial) {
      throw new IncompleteSeriesError(series.id, series.receivedTotal, series.total);
    }
    if (!series.complete) {
      this.log.warn(
        { series: series.id, received: series.receivedTotal, total: series.total },
        "applying an incomplete series",
      );
    }

    const patches: Patch[] = [];
    for (const ref of series.patches) patches.push(await this.patch(ref.id));
    return { patches, source: { kind: "series", series } };
  }

  /**
   * Re-submissions share a name and submitter and bump `version`. The latest
   * one is used unless the caller pins a version.
   */
  private async pickVersion(requested: Series, version: number | undefined): Promise<Series> {
    if (version === requested.version) return requested;
    if (requested.name === null) {
      if (version === undefined) return requested;
      throw new NotFoundError(`Series ${requested.id} has no version ${version}`);
    }

    const siblings = await this.client
      .list("series", { q: requested.name, submitter: requested.submitter.id })
      .map(toSeries)
      .toArray();
    const family = siblings.filter(
      (s) => s.name === requested.name && s.submitter.id === requested.submitter.id,
    );
    if (!family.some((s) => s.id === requested.id)) family.push(requested);

    if (version !== undefined) {
      const pinned = family.find((s) => s.version === version);
      if (!pinned) throw new NotFoundError(`Series ${requested.id} has no version ${version}`);
      return pinned;
    }

    const latest = family.reduce((best, s) => (s.version > best.version ? s : best), requested);
    if (latest.id !== requested.id) {
      this.log.info(
        { requested: requested.id, version: requested.version, latest: latest.id, latestVersion: latest.version },
        "newer revision of series found",
      );
    }
    return latest;
  }

  private async resolveBundle(idOrName: string): Promise<Selection> {
    const bundle = await this.bundle(idOrName);
    const patches: Patch[] = [];
    for (const ref of bundle.patches) patches.push(await this.patch(ref.id));
    return { patches, source: { kind: "bundle", bundle } };
  }

  private async resolveFilter(filter: PatchFilter): Promise<Selection> {
    const filters: Record<string, Filters[string]> = {
      state: filter.state,
      since: filter.since,
      before: filter.before,
      archived: filter.archived,
      q: filter.q,
      hash: filter.hash,
      msgid: filter.msgid,
    };
    if (filter.submitter !== undefined) {
      filters.submitter = await resolveIds(this.client, "people", asList(filter.submitter));
    }
    if (filter.delegate !== undefined) {
      filters.delegate = await resolveIds(this.client, "users", asList(filter.delegate));
    }

    const patches = await this.client
      .list("patches", filters, { order: filter.order, limit: filter.limit })
      .map(toPatch)
      .toArray();
    this.log.debug({ count: patches.length }, "filter resolved");
    return { patches, source: { kind: "filter", filters: filter } };
  }
}

function earlierMembers(members: readonly PatchRef[], patchId: string): PatchRef[] {
  const index = members.findIndex((ref) => ref.id === patchId);
  return index < 0 ? [] : members.slice(0, index);
}
