import type { Command } from "commander";
import { toBundle } from "../models/bundle.js";
import { resolveIds } from "../selector/lookup.js";
import { addApplyOptions, runApply, type ApplyFlags } from "./apply.js";
import { collect, positiveInt } from "./args.js";
import type { CliContext } from "./context.js";
import { bundleDetails, bundleRow, printJson, printRows, saveDownload } from "./output.js";

interface ListFlags {
  owner?: string[];
  limit?: number;
  sort: string;
  json?: boolean;
  failOnEmpty?: boolean;
}

export function registerBundleCommands(bundle: Command, ctx: CliContext): void {
  bundle
    .command("list")
    .description("List bundles")
    .argument("[name]", "only bundles whose name contains this text")
    .option("--owner <who>", "owner ID, username or email; repeatable", collect)
    .option("--limit <n>", "maximum number of bundles to show", positiveInt)
    .option("--sort <field>", "server sort key", "name")
    .option("--json", "print JSON records")
    .option("--fail-on-empty", "exit non-zero when nothing matches")
    .action(async (name: string | undefined, options: ListFlags, cmd: Command) => {
      const { client } = await ctx.components();
      const owner = options.owner && (await resolveIds(client, "users", options.owner));
      const found = await client
        .list("bundles", { q: name, owner }, { order: options.sort, limit: options.limit })
        .map(toBundle)
        .toArray();
      if (options.json) printJson(ctx.io, found.map((b) => b.raw));
      else printRows(ctx.io, found.map(bundleRow));
      if (found.length === 0 && options.failOnEmpty) {
        cmd.error("No bundles matched", { exitCode: 1, code: "patchpull.empty" });
      }
    });

  bundle
    .command("show")
    .description("Show a bundle and its patches")
    .argument("<bundle>", "bundle ID or exact name")
    .option("--json", "print the JSON record")
    .action(async (idOrName: string, options: { json?: boolean }) => {
      const { selector } = await ctx.components();
      const record = await selector.bundle(idOrName);
      if (options.json) printJson(ctx.io, record.raw);
      else printRows(ctx.io, bundleDetails(record));
    });

  bundle
    .command("download")
    .description("Download a bundle as one mbox")
    .argument("<bundle>", "bundle ID or exact name")
    .argument("[output]", "file or directory to write, or - for stdout (default: server file name)")
    .action(async (idOrName: string, output: string | undefined) => {
      const { selector, client, log } = await ctx.components();
      const record = await selector.bundle(idOrName);
      const written = await saveDownload(
        ctx.io,
        await client.download(record.mbox),
        `bundle-${record.id}.patch`,
        output,
        ctx.deps.cwd,
      );
      if (written) {
        log.info({ bundle: record.id, path: written }, "bundle downloaded");
        ctx.io.stdout(`${written}\n`);
      }
    });

  addApplyOptions(
    bundle
      .command("apply")
      .description("Apply every patch of a bundle, in bundle order")
      .argument("<bundle>", "bundle ID or exact name"),
  ).action(async (idOrName: string, options: ApplyFlags, cmd: Command) => {
    const { selector } = await ctx.components();
    await runApply(ctx, cmd, await selector.resolve({ kind: "bundle", id: idOrName }), options);
  });
}
