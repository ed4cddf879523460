import type { Command } from "commander";
import { serverContent } from "../apply/content.js";
import { ApplyEngine, summarizeReport } from "../apply/engine.js";
import type { Selection } from "../selector/selector.js";
import { collect } from "./args.js";
import type { CliContext } from "./context.js";
import { printJson, printRows, reportJson, reportRows } from "./output.js";

export interface ApplyFlags {
  verifyHash?: boolean;
  continueOnError?: boolean;
  skipApplied?: boolean;
  diff?: boolean;
  amArg?: string[];
  strict?: boolean;
  failOnEmpty?: boolean;
  json?: boolean;
}

export function addApplyOptions(cmd: Command): Command {
  return cmd
    .option("--verify-hash", "skip patches whose content no longer matches the recorded hash")
    .option("--continue-on-error", "keep going with independent patches after a failure")
    .option("--skip-applied", "skip patches already present in the tree")
    .option("--diff", "apply bare diffs with git apply and git commit instead of git am")
    .option("--am-arg <arg>", "extra argument for git am; repeatable", collect)
    .option("--strict", "exit non-zero when any patch was skipped")
    .option("--fail-on-empty", "exit non-zero when nothing was selected")
    .option("--json", "print the report as JSON");
}

/** Applies a resolved selection and turns the report into output and an exit status. */
export async function runApply(ctx: CliContext, cmd: Command, selection: Selection, flags: ApplyFlags): Promise<void> {
  const { client, log } = await ctx.components();
  if (selection.patches.length === 0) {
    if (flags.failOnEmpty) cmd.error("No patches selected", { exitCode: 1, code: "patchpull.empty" });
    ctx.io.stderr("No patches selected\n");
    return;
  }

  const format = flags.diff ? "diff" : "mbox";
  const engine = new ApplyEngine({
    content: serverContent(client, format),
    applier: ctx.deps.createApplier({ format, amArgs: flags.amArg ?? [] }),
  });

  const controller = new AbortController();
  const cancel = () => controller.abort();
  process.once("SIGINT", cancel);
  log.info({ count: selection.patches.length, source: selection.source.kind, format }, "applying patches");
  const report = await engine
    .apply(selection.patches, {
      verifyHash: flags.verifyHash,
      continueOnError: flags.continueOnError,
      skipApplied: flags.skipApplied,
      signal: controller.signal,
    })
    .finally(() => process.off("SIGINT", cancel));

  if (flags.json) printJson(ctx.io, reportJson(report));
  else printRows(ctx.io, reportRows(report));

  const summary = summarizeReport(report);
  const failed = report.results.some((r) => r.status === "failed");
  const skipped = report.results.some((r) => r.status === "skipped");
  if (failed) cmd.error(summary, { exitCode: 1, code: "patchpull.apply-failed" });
  if (report.outcome === "cancelled") cmd.error(summary, { exitCode: 1, code: "patchpull.cancelled" });
  if (skipped && flags.strict) cmd.error(summary, { exitCode: 1, code: "patchpull.apply-skipped" });
  ctx.io.stderr(`${summary}\n`);
}
