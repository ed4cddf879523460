import { describe, it, expect, vi } from "vitest";
import { makeDiff, makePatch, makeSeries, toSeriesRef } from "@patchpull/testkit-fixtures";
import { ApplyConflictError, TransportError } from "../errors.js";
import { toPatch, type Patch } from "../models/patch.js";
import { ApplyEngine, summarizeReport } from "./engine.js";
import { hashDiff } from "./hash.js";
import type { ContentSource, PatchApplier, TransitionEvent } from "./types.js";

function patch(id: number, opts: { series?: number | number[]; hash?: string | null } = {}): Patch {
  const diff = makeDiff({ file: `src/file-${id}.c` });
  const series = [opts.series ?? []].flat().map((sid) => toSeriesRef(makeSeries({ id: sid })));
  return toPatch(
    makePatch({ id, diff, series, hash: opts.hash === undefined ? hashDiff(diff) : opts.hash }),
  );
}

function fakeContent(overrides: Record<string, string> = {}) {
  const fetched: string[] = [];
  const source: ContentSource = {
    async fetch(p) {
      fetched.push(p.id);
      return Buffer.from(overrides[p.id] ?? p.diff ?? "", "utf8");
    },
  };
  return { source, fetched };
}

function fakeApplier(opts: { failing?: string[]; present?: string[] } = {}) {
  const applied: string[] = [];
  const abort = vi.fn(async () => undefined);
  const applier: PatchApplier = {
    async apply(_content, p) {
      if (opts.failing?.includes(p.id)) {
        throw new ApplyConflictError(`error: patch failed: src/file-${p.id}.c:1`);
      }
      applied.push(p.id);
    },
    async isApplied(_content, p) {
      return opts.present?.includes(p.id) ?? false;
    },
    abort,
  };
  return { applier, applied, abort };
}

const statuses = (results: { status: string; reason?: string }[]) =>
  results.map((r) => (r.reason ? `${r.status}:${r.reason}` : r.status));

describe("ApplyEngine", () => {
  it("applies every patch in input order", async () => {
    const { source } = fakeContent();
    const { applier, applied } = fakeApplier();
    const patches = [patch(3, { series: 9 }), patch(1, { series: 9 }), patch(2)];
    const report = await new ApplyEngine({ content: source, applier }).apply(patches);
    expect(applied).toEqual(["3", "1", "2"]);
    expect(report.outcome).toBe("completed");
    expect(report.total).toBe(3);
    expect(report.results.map((r) => r.patch.id)).toEqual(["3", "1", "2"]);
    expect(statuses(report.results)).toEqual(["applied", "applied", "applied"]);
  });

  it("reports each state transition", async () => {
    const events: TransitionEvent[] = [];
    const { source } = fakeContent();
    const { applier } = fakeApplier();
    await new ApplyEngine({ content: source, applier }).apply([patch(1)], {
      onTransition: (e) => events.push(e),
    });
    expect(events.map((e) => `${e.from}->${e.to}`)).toEqual([
      "pending->fetched",
      "fetched->verified",
      "verified->applied",
    ]);
  });

  it("halts at the first conflict by default", async () => {
    const { source, fetched } = fakeContent();
    const { applier, applied } = fakeApplier({ failing: ["2"] });
    const patches = [patch(1, { series: 9 }), patch(2, { series: 9 }), patch(3, { series: 9 })];
    const report = await new ApplyEngine({ content: source, applier }).apply(patches);
    expect(report.outcome).toBe("halted");
    expect(report.results).toHaveLength(2);
    expect(statuses(report.results)).toEqual(["applied", "failed"]);
    expect(report.results[1].message).toBe("error: patch failed: src/file-2.c:1");
    expect(applied).toEqual(["1"]);
    expect(fetched).toEqual(["1", "2"]);
  });

  it("blocks dependents and continues with independent patches when asked to", async () => {
    const { source } = fakeContent();
    const { applier, applied, abort } = fakeApplier({ failing: ["2"] });
    const patches = [
      patch(1, { series: 9 }),
      patch(2, { series: 9 }),
      patch(3, { series: 9 }),
      patch(4),
      patch(5, { series: 8 }),
    ];
    const report = await new ApplyEngine({ content: source, applier }).apply(patches, {
      continueOnError: true,
    });
    expect(statuses(report.results)).toEqual([
      "applied",
      "failed",
      "skipped:blocked-by-prior-failure",
      "applied",
      "applied",
    ]);
    expect(report.results[2].message).toBe("depends on patch 2, which was not applied");
    expect(report.outcome).toBe("completed");
    expect(applied).toEqual(["1", "4", "5"]);
    expect(abort).toHaveBeenCalledTimes(1);
  });

  it("skips a mismatched patch and its dependents, then carries on", async () => {
    const revised = makeDiff({ file: "src/file-2.c", after: "revised line" });
    const { source } = fakeContent({ "2": revised });
    const { applier, applied } = fakeApplier();
    const patches = [patch(1, { series: 9 }), patch(2, { series: 9 }), patch(3, { series: 9 }), patch(4)];
    const report = await new ApplyEngine({ content: source, applier }).apply(patches, { verifyHash: true });
    expect(statuses(report.results)).toEqual([
      "applied",
      "skipped:hash-mismatch",
      "skipped:blocked-by-prior-failure",
      "applied",
    ]);
    expect(report.results[1].message).toBe(
      `content hash ${hashDiff(revised)} does not match recorded hash ${patches[1].hash}`,
    );
    expect(report.outcome).toBe("completed");
    expect(applied).toEqual(["1", "4"]);
  });

  it("does not verify unless asked", async () => {
    const { source } = fakeContent({ "1": makeDiff({ after: "something else" }) });
    const { applier, applied } = fakeApplier();
    await new ApplyEngine({ content: source, applier }).apply([patch(1)]);
    expect(applied).toEqual(["1"]);
  });

  it("applies a patch without a recorded hash", async () => {
    const { source } = fakeContent();
    const { applier } = fakeApplier();
    const report = await new ApplyEngine({ content: source, applier }).apply([patch(1, { hash: null })], {
      verifyHash: true,
    });
    expect(statuses(report.results)).toEqual(["applied"]);
  });

  it("skips patches already in the tree without blocking their dependents", async () => {
    const { source } = fakeContent();
    const { applier, applied } = fakeApplier({ present: ["1"] });
    const patches = [patch(1, { series: 9 }), patch(2, { series: 9 })];
    const report = await new ApplyEngine({ content: source, applier }).apply(patches, { skipApplied: true });
    expect(statuses(report.results)).toEqual(["skipped:already-applied", "applied"]);
    expect(applied).toEqual(["2"]);
  });

  it("stops between patches when cancelled", async () => {
    const controller = new AbortController();
    const { source, fetched } = fakeContent();
    const { applier } = fakeApplier();
    const report = await new ApplyEngine({ content: source, applier }).apply([patch(1), patch(2), patch(3)], {
      signal: controller.signal,
      onTransition: (e) => {
        if (e.to === "applied") controller.abort();
      },
    });
    expect(report.outcome).toBe("cancelled");
    expect(statuses(report.results)).toEqual(["applied"]);
    expect(fetched).toEqual(["1"]);
  });

  it("records a fetch failure and keeps the results so far", async () => {
    const fetched: string[] = [];
    const source: ContentSource = {
      async fetch(p) {
        fetched.push(p.id);
        if (p.id === "2") throw new TransportError("Request to https://pw.test/x failed: socket hang up");
        return Buffer.from(p.diff ?? "", "utf8");
      },
    };
    const { applier, applied } = fakeApplier();
    const report = await new ApplyEngine({ content: source, applier }).apply([patch(1), patch(2), patch(3)]);
    expect(report.outcome).toBe("halted");
    expect(statuses(report.results)).toEqual(["applied", "failed"]);
    expect(report.results[1].message).toBe("Request to https://pw.test/x failed: socket hang up");
    expect(applied).toEqual(["1"]);
    expect(fetched).toEqual(["1", "2"]);
    expect(summarizeReport(report)).toBe(
      "1 of 3 applied, failed at patch 2: Request to https://pw.test/x failed: socket hang up",
    );
  });

  it("blocks the series of a patch that could not be fetched when continuing", async () => {
    const events: TransitionEvent[] = [];
    const source: ContentSource = {
      async fetch(p) {
        if (p.id === "1") throw new TransportError("Request to https://pw.test/x timed out after 10ms");
        return Buffer.from(p.diff ?? "", "utf8");
      },
    };
    const { applier, applied, abort } = fakeApplier();
    const patches = [patch(1, { series: 9 }), patch(2, { series: 9 }), patch(3)];
    const report = await new ApplyEngine({ content: source, applier }).apply(patches, {
      continueOnError: true,
      onTransition: (e) => events.push(e),
    });
    expect(statuses(report.results)).toEqual(["failed", "skipped:blocked-by-prior-failure", "applied"]);
    expect(events[0]).toMatchObject({ from: "pending", to: "failed" });
    expect(applied).toEqual(["3"]);
    expect(abort).not.toHaveBeenCalled();
  });

  it("halts when an interrupted session cannot be cleared", async () => {
    const { source } = fakeContent();
    const { applier, applied, abort } = fakeApplier({ failing: ["1"] });
    abort.mockRejectedValueOnce(new Error("fatal: Resolve operation not in progress, we are not resuming."));
    const report = await new ApplyEngine({ content: source, applier }).apply([patch(1), patch(2), patch(3)], {
      continueOnError: true,
    });
    expect(report.outcome).toBe("halted");
    expect(statuses(report.results)).toEqual(["failed", "failed"]);
    expect(report.results[1].message).toBe(
      "could not clear the interrupted session: fatal: Resolve operation not in progress, we are not resuming.",
    );
    expect(applied).toEqual([]);
  });

  it("blocks through any series a failed patch shares", async () => {
    const { source } = fakeContent();
    const { applier, applied } = fakeApplier({ failing: ["2"] });
    const patches = [patch(2, { series: [9, 12] }), patch(3, { series: 12 }), patch(4, { series: 9 }), patch(5)];
    const report = await new ApplyEngine({ content: source, applier }).apply(patches, { continueOnError: true });
    expect(statuses(report.results)).toEqual([
      "failed",
      "skipped:blocked-by-prior-failure",
      "skipped:blocked-by-prior-failure",
      "applied",
    ]);
    expect(applied).toEqual(["5"]);
  });
});

describe("summarizeReport", () => {
  it("describes a halted run", async () => {
    const { source } = fakeContent();
    const { applier } = fakeApplier({ failing: ["2"] });
    const report = await new ApplyEngine({ content: source, applier }).apply([patch(1), patch(2), patch(3)]);
    expect(summarizeReport(report)).toBe("1 of 3 applied, failed at patch 2: error: patch failed: src/file-2.c:1");
  });

  it("counts skips", async () => {
    const { source } = fakeContent();
    const { applier } = fakeApplier({ present: ["1"] });
    const report = await new ApplyEngine({ content: source, applier }).apply([patch(1), patch(2)], {
      skipApplied: true,
    });
    expect(summarizeReport(report)).toBe("1 of 2 applied, 1 skipped");
  });
});
