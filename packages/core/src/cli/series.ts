import path from "node:path";
import type { Command } from "commander";
import { toSeries } from "../models/series.js";
import { resolveIds } from "../selector/lookup.js";
import { addApplyOptions, runApply, type ApplyFlags } from "./apply.js";
import { collect, positiveInt } from "./args.js";
import type { CliContext } from "./context.js";
import { isDirectory, printJson, printRows, saveDownload, seriesDetails, seriesRow } from "./output.js";

interface ListFlags {
  submitter?: string[];
  limit?: number;
  sort: string;
  json?: boolean;
  failOnEmpty?: boolean;
}

export function registerSeriesCommands(series: Command, ctx: CliContext): void {
  series
    .command("list")
    .description("List series")
    .argument("[name]", "only series whose name contains this text")
    .option("--submitter <who>", "submitter ID, name or email; repeatable", collect)
    .option("--limit <n>", "maximum number of series to show", positiveInt)
    .option("--sort <field>", "server sort key", "-date")
    .option("--json", "print JSON records")
    .option("--fail-on-empty", "exit non-zero when nothing matches")
    .action(async (name: string | undefined, options: ListFlags, cmd: Command) => {
      const { client } = await ctx.components();
      const submitter = options.submitter && (await resolveIds(client, "people", options.submitter));
      const found = await client
        .list("series", { q: name, submitter }, { order: options.sort, limit: options.limit })
        .map(toSeries)
        .toArray();
      if (options.json) printJson(ctx.io, found.map((s) => s.raw));
      else printRows(ctx.io, found.map(seriesRow));
      if (found.length === 0 && options.failOnEmpty) {
        cmd.error("No series matched", { exitCode: 1, code: "patchpull.empty" });
      }
    });

  series
    .command("show")
    .description("Show a series and its patches")
    .argument("<id>", "series ID")
    .option("--json", "print the JSON record")
    .action(async (id: string, options: { json?: boolean }) => {
      const { selector } = await ctx.components();
      const record = await selector.series(id);
      if (options.json) printJson(ctx.io, record.raw);
      else printRows(ctx.io, seriesDetails(record));
    });

  series
    .command("download")
    .description("Download a whole series as one mbox, or each patch to its own file")
    .argument("<id>", "series ID")
    .argument("[output]", "file or directory to write, or - for stdout (default: server file name)")
    .option("--separate", "write one mbox per patch into the output directory")
    .action(async (id: string, output: string | undefined, options: { separate?: boolean }, cmd: Command) => {
      const { selector, client, log } = await ctx.components();
      const record = await selector.series(id);
      if (options.separate) {
        if (output !== undefined && !(await isDirectory(path.resolve(ctx.deps.cwd, output)))) {
          cmd.error("With --separate, OUTPUT must be a directory", { exitCode: 2, code: "patchpull.usage" });
        }
        for (const ref of record.patches) {
          const written = await saveDownload(
            ctx.io,
            await client.download(ref.mbox),
            `patch-${ref.id}.patch`,
            output,
            ctx.deps.cwd,
          );
          if (written) {
            log.info({ series: record.id, patch: ref.id, path: written }, "patch downloaded");
            ctx.io.stdout(`${written}\n`);
          }
        }
        return;
      }
      const written = await saveDownload(
        ctx.io,
        await client.download(record.mbox),
        `series-${record.id}.patch`,
        output,
        ctx.deps.cwd,
      );
      if (written) {
        log.info({ series: record.id, path: written }, "series downloaded");
        ctx.io.stdout(`${written}\n`);
      }
    });

  addApplyOptions(
    series
      .command("apply")
      .description("Apply every patch of a series, latest revision unless --version is given")
      .argument("<id>", "series ID")
      .option("--version <n>", "apply this revision of the series", positiveInt)
      .option("--allow-partial", "apply a series even when some patches have not arrived"),
  ).action(
    async (id: string, options: ApplyFlags & { version?: number; allowPartial?: boolean }, cmd: Command) => {
      const { selector } = await ctx.components();
      const selection = await selector.resolve({
        kind: "series",
        id,
        version: options.version,
        allowPartial: options.allowPartial,
      });
      await runApply(ctx, cmd, selection, options);
    },
  );
}
