import { Command, CommanderError } from "commander";
import { ConfigError, InvalidFilterError, PatchpullError } from "../errors.js";
import { VERSION } from "../version.js";
import { registerBundleCommands } from "./bundle.js";
import { CliContext, type CliDeps } from "./context.js";
import { registerPatchCommands } from "./patch.js";
import { registerSeriesCommands } from "./series.js";

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** Global flags go before the command: `patchpull --project linux patch list`. */
export function buildProgram(deps: CliDeps): Command {
  const program = new Command("patchpull")
    .description("Fetch patches, series and bundles from a patch-tracking server and apply them to the local git tree")
    .version(VERSION)
    .option("--server <url>", "API root, e.g. https://patches.example.org/api/1.2 (git config pw.server)")
    .option("--project <name>", "project link name, or * for all projects (git config pw.project)")
    .option("--token <token>", "API token (git config pw.token)")
    .option("--username <name>", "user name for basic auth (git config pw.username)")
    .option("--password <password>", "password for basic auth (git config pw.password)")
    .option("--debug", "log at debug level")
    .enablePositionalOptions()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.io.stdout(text),
      writeErr: (text) => deps.io.stderr(text),
    });

  const ctx = new CliContext(program, deps);
  registerPatchCommands(program.command("patch").description("Work with patches"), ctx);
  registerSeriesCommands(program.command("series").description("Work with series"), ctx);
  registerBundleCommands(program.command("bundle").description("Work with bundles"), ctx);
  return program;
}

/** Runs one invocation and returns its exit status; `argv` excludes the node and script paths. */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const program = buildProgram(deps);
  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander has already printed its message
      if (err.exitCode === 0) return 0;
      return err.code.startsWith("patchpull.") ? err.exitCode : EXIT_USAGE;
    }
    if (err instanceof PatchpullError) {
      deps.io.stderr(`error: ${err.message}\n`);
      return err instanceof ConfigError || err instanceof InvalidFilterError ? EXIT_USAGE : EXIT_FAILURE;
    }
    throw err;
  }
}
