import type { Logger } from "pino";
import { errorMessage } from "../errors.js";
import type { Patch } from "../models/patch.js";
import { createApplyLogger } from "../observability/logger.js";
import { hashContent } from "./hash.js";
import { PatchLifecycle } from "./state.js";
import type {
  ApplyOptions,
  ApplyOutcome,
  ApplyReport,
  ApplyResult,
  ContentHasher,
  ContentSource,
  PatchApplier,
} from "./types.js";

export interface ApplyEngineOptions {
  content: ContentSource;
  applier: PatchApplier;
  hasher?: ContentHasher;
  logger?: Logger;
}

/**
 * Applies an ordered list of patches one at a time. Later members of a series
 * depend on earlier ones; patches sharing no series with a failed one are independent.
 */
export class ApplyEngine {
  private readonly content: ContentSource;
  private readonly applier: PatchApplier;
  private readonly hasher: ContentHasher;
  private readonly log: Logger;

  constructor(opts: ApplyEngineOptions) {
    this.content = opts.content;
    this.applier = opts.applier;
    this.hasher = opts.hasher ?? hashContent;
    this.log = opts.logger ?? createApplyLogger();
  }

  async apply(patches: readonly Patch[], options: ApplyOptions = {}): Promise<ApplyReport> {
    const results: ApplyResult[] = [];
    const blockedSeries = new Map<string, string>();
    let outcome: ApplyOutcome = "completed";
    let interrupted = false;

    const block = (patch: Patch) => {
      for (const ref of patch.allSeries) if (!blockedSeries.has(ref.id)) blockedSeries.set(ref.id, patch.id);
    };

    // Records a failed patch; true when the run has to stop there.
    const fail = (patch: Patch, lifecycle: PatchLifecycle, message: string): boolean => {
      lifecycle.to("failed");
      results.push({ patch, status: "failed", message });
      if (!options.continueOnError) {
        outcome = "halted";
        return true;
      }
      block(patch);
      return false;
    };

    for (const patch of patches) {
      if (options.signal?.aborted) {
        outcome = "cancelled";
        this.log.info({ done: results.length, total: patches.length }, "apply cancelled");
        break;
      }

      const lifecycle = new PatchLifecycle((from, to) => {
        this.log.debug({ patch: patch.id, from, to }, "patch transition");
        options.onTransition?.({ patch, from, to });
      });
      const blocker = patch.allSeries.map((ref) => blockedSeries.get(ref.id)).find((id) => id !== undefined);
      if (blocker !== undefined) {
        lifecycle.to("skipped");
        results.push({
          patch,
          status: "skipped",
          reason: "blocked-by-prior-failure",
          message: `depends on patch ${blocker}, which was not applied`,
        });
        continue;
      }

      let content: Buffer;
      try {
        content = await this.content.fetch(patch);
      } catch (err) {
        this.log.warn({ patch: patch.id, err }, "patch content could not be fetched");
        if (fail(patch, lifecycle, errorMessage(err))) break;
        continue;
      }
      lifecycle.to("fetched");

      if (options.verifyHash && patch.hash !== null) {
        const actual = this.hasher(content);
        if (actual !== patch.hash) {
          lifecycle.to("skip-hash-mismatch");
          this.log.warn({ patch: patch.id, expected: patch.hash, actual }, "content hash mismatch");
          results.push({
            patch,
            status: "skipped",
            reason: "hash-mismatch",
            message: `content hash ${actual} does not match recorded hash ${patch.hash}`,
          });
          block(patch);
          continue;
        }
      }
      lifecycle.to("verified");

      if (options.skipApplied && this.applier.isApplied && (await this.applier.isApplied(content, patch))) {
        lifecycle.to("skipped");
        results.push({ patch, status: "skipped", reason: "already-applied", message: "already present in the tree" });
        continue;
      }

      if (interrupted && this.applier.abort) {
        try {
          await this.applier.abort();
          interrupted = false;
        } catch (err) {
          // The tree is in an unknown state; nothing further is attempted.
          this.log.error({ patch: patch.id, err }, "could not clear interrupted session");
          lifecycle.to("failed");
          results.push({
            patch,
            status: "failed",
            message: `could not clear the interrupted session: ${errorMessage(err)}`,
          });
          outcome = "halted";
          break;
        }
      }

      try {
        await this.applier.apply(content, patch);
      } catch (err) {
        this.log.warn({ patch: patch.id, err }, "patch failed to apply");
        interrupted = true;
        if (fail(patch, lifecycle, errorMessage(err))) break;
        continue;
      }
      lifecycle.to("applied");
      this.log.info({ patch: patch.id, name: patch.name }, "patch applied");
      results.push({ patch, status: "applied" });
    }

    return { results, outcome, total: patches.length };
  }
}

/** One line for humans, e.g. "1 of 3 applied, failed at patch 2: <diagnostic>". */
export function summarizeReport(report: ApplyReport): string {
  const applied = report.results.filter((r) => r.status === "applied").length;
  const skipped = report.results.filter((r) => r.status === "skipped").length;
  const parts = [`${applied} of ${report.total} applied`];
  if (skipped > 0) parts.push(`${skipped} skipped`);
  const failed = report.results.find((r) => r.status === "failed");
  if (failed) parts.push(`failed at patch ${failed.patch.id}: ${failed.message ?? "unknown error"}`);
  if (report.outcome === "cancelled") parts.push("cancelled");
  return parts.join(", ");
}
