import type { Command } from "commander";
import { toPatch, toPatchUpdateBody, type Patch, type PatchUpdate } from "../models/patch.js";
import { resolveIds } from "../selector/lookup.js";
import { addApplyOptions, runApply, type ApplyFlags } from "./apply.js";
import { booleanArg, collect, positiveInt } from "./args.js";
import type { CliContext } from "./context.js";
import { patchDetails, patchRow, printJson, printRows } from "./output.js";

const DEFAULT_STATES = ["under-review", "new"];

interface ListFlags {
  state?: string[];
  submitter?: string[];
  delegate?: string[];
  archived?: boolean;
  since?: string;
  before?: string;
  limit?: number;
  sort: string;
  json?: boolean;
  failOnEmpty?: boolean;
}

interface UpdateFlags {
  state?: string;
  delegate?: string;
  archived?: boolean;
  commitRef?: string;
}

function printPatch(ctx: CliContext, patch: Patch, json: boolean | undefined): void {
  if (json) printJson(ctx.io, patch.raw);
  else printRows(ctx.io, patchDetails(patch));
}

export function registerPatchCommands(patch: Command, ctx: CliContext): void {
  patch
    .command("list")
    .description("List patches")
    .argument("[name]", "only patches whose name contains this text")
    .option("--state <state>", "state to include; repeatable (default: under-review, new)", collect)
    .option("--submitter <who>", "submitter ID, name or email; repeatable", collect)
    .option("--delegate <who>", "delegate ID, username or email; repeatable", collect)
    .option("--archived", "include archived patches")
    .option("--since <when>", "only patches submitted after this ISO 8601 timestamp")
    .option("--before <when>", "only patches submitted before this ISO 8601 timestamp")
    .option("--limit <n>", "maximum number of patches to show", positiveInt)
    .option("--sort <field>", "server sort key", "-date")
    .option("--json", "print JSON records")
    .option("--fail-on-empty", "exit non-zero when nothing matches")
    .action(async (name: string | undefined, options: ListFlags, cmd: Command) => {
      const { selector } = await ctx.components();
      const { patches } = await selector.resolve({
        kind: "filter",
        filters: {
          state: options.state ?? DEFAULT_STATES,
          submitter: options.submitter,
          delegate: options.delegate,
          archived: options.archived ? undefined : false,
          since: options.since,
          before: options.before,
          q: name,
          order: options.sort,
          limit: options.limit,
        },
      });
      if (options.json) printJson(ctx.io, patches.map((p) => p.raw));
      else printRows(ctx.io, patches.map(patchRow));
      if (patches.length === 0 && options.failOnEmpty) {
        cmd.error("No patches matched", { exitCode: 1, code: "patchpull.empty" });
      }
    });

  patch
    .command("show")
    .description("Show a patch")
    .argument("<id>", "patch ID")
    .option("--json", "print the JSON record")
    .action(async (id: string, options: { json?: boolean }) => {
      const { selector } = await ctx.components();
      printPatch(ctx, await selector.patch(id), options.json);
    });

  patch
    .command("download")
    .description("Print a patch in mbox or diff form without applying it")
    .argument("<id>", "patch ID")
    .option("--diff", "print the bare diff instead of the mbox")
    .action(async (id: string, options: { diff?: boolean }, cmd: Command) => {
      const { selector, client } = await ctx.components();
      const record = await selector.patch(id);
      if (!options.diff) {
        ctx.io.stdout((await client.download(record.mbox)).content.toString("utf8"));
        return;
      }
      if (record.diff === undefined) cmd.error(`Patch ${id} has no diff`, { exitCode: 1, code: "patchpull.no-diff" });
      ctx.io.stdout(record.diff);
    });

  addApplyOptions(
    patch
      .command("apply")
      .description("Apply patches to the current tree, in the order given")
      .argument("<id...>", "patch IDs")
      .option("--deps", "also apply the earlier patches of each patch's latest series")
      .option("--series <id>", "take dependencies from this series instead; implies --deps"),
  ).action(async (ids: string[], options: ApplyFlags & { deps?: boolean; series?: string }, cmd: Command) => {
    const { selector } = await ctx.components();
    const selection = await selector.resolve({
      kind: "patches",
      ids,
      withDependencies: options.deps,
      dependencySeries: options.series,
    });
    await runApply(ctx, cmd, selection, options);
  });

  patch
    .command("update")
    .description("Update a patch; maintainer rights are usually needed")
    .argument("<id>", "patch ID")
    .option("--state <state>", "new state, e.g. accepted")
    .option("--delegate <who>", "delegate ID, username or email")
    .option("--archived <bool>", "archive (true) or unarchive (false)", booleanArg)
    .option("--commit-ref <sha>", "commit the patch landed as")
    .option("--json", "print the updated JSON record")
    .action(async (id: string, options: UpdateFlags & { json?: boolean }, cmd: Command) => {
      const update: PatchUpdate = {
        state: options.state,
        archived: options.archived,
        commitRef: options.commitRef,
      };
      const { client } = await ctx.components();
      if (options.delegate !== undefined) {
        const [delegate] = await resolveIds(client, "users", [options.delegate]);
        update.delegate = delegate;
      }
      const body = toPatchUpdateBody(update);
      if (Object.keys(body).length === 0) {
        cmd.error("Nothing to update; pass --state, --delegate, --archived or --commit-ref", {
          exitCode: 2,
          code: "patchpull.usage",
        });
      }
      printPatch(ctx, toPatch(await client.update("patches", id, body)), options.json);
    });
}
