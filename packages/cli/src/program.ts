/**
 * recipefind command definition
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { Command, CommanderError, Option } from "commander";
import {
  Logger,
  compilePattern,
  loadSnapshotEngine,
  search,
  searchLines,
  SEARCH_MODES,
  type SearchRequest,
} from "@recipefind/sdk";
import { resolveMode, resolveNamespace, type SearchFlags } from "./lib/arg.js";
import { isVerbose, resolveMetadataPath, resolveScope } from "./lib/env.js";
import { formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { processIo, type CliIo } from "./lib/io.js";
import { colorize, printJson, printLines } from "./lib/render.js";
import { withTiming } from "./lib/telemetry.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "../package.json"), "utf-8")
);

const MODE_FLAGS = [...SEARCH_MODES];
const NAMESPACE_FLAGS = ["recipes", "packages"];

/**
 * Boolean option that cannot be combined with the rest of its group
 */
function exclusive(flags: string, description: string, group: string[]): Option {
  const option = new Option(flags, description);
  return option.conflicts(group.filter((name) => name !== option.attributeName()));
}

/**
 * Build the command, writing through the given streams
 */
export function createProgram(io: CliIo = processIo): Command {
  const program = new Command();

  program
    .configureOutput({
      writeOut: (str) => io.writeStdout(str),
      writeErr: (str) => io.writeStderr(str),
      outputError: (str, write) => write(colorize(str, "red", io.stderrIsTTY)),
    })
    .exitOverride();

  program
    .name("recipefind")
    .description("Search recipe metadata for recipes, provides, and runtime packages")
    .version(packageJson.version)
    .argument("<pattern>", "Text to search for")
    .option("-i, --ignore-case", "Case-insensitive comparison")
    .option("-W, --word", "Match at word boundaries (with --regex or --wildcard)")
    .option("-S, --scope <scope>", "Restrict to the build requirements of these targets")
    .option("-a, --all", "Report every matching namespace instead of stopping at the first")
    .addOption(exclusive("-s, --substring", "Substring match (default)", MODE_FLAGS))
    .addOption(exclusive("-e, --exact", "Exact match", MODE_FLAGS))
    .addOption(exclusive("-r, --regex", "Regular expression match", MODE_FLAGS))
    .addOption(exclusive("-w, --wildcard", "Glob match", MODE_FLAGS))
    .addOption(exclusive("-R, --recipes", "Search recipe names and provides only", NAMESPACE_FLAGS))
    .addOption(exclusive("-P, --packages", "Search runtime packages only", NAMESPACE_FLAGS))
    .option("-m, --metadata <path>", "Metadata snapshot file")
    .option("--json", "Output matches as JSON")
    .option("--verbose", "Verbose diagnostics")
    .action(async (pattern: string, flags: SearchFlags) => {
      const verbose = flags.verbose === true || isVerbose();

      await withTiming("cli.search", { io, verbose }, async () => {
        const logger = new Logger((line) => io.writeStderr(line + "\n"), verbose ? "debug" : "warn");

        // Usage and pattern errors surface before any metadata is read
        const compiled = compilePattern(pattern, resolveMode(flags), {
          ignoreCase: flags.ignoreCase,
          wordBoundary: flags.word,
        });
        const scope = resolveScope(flags.scope);

        const engine = await loadSnapshotEngine(resolveMetadataPath(flags.metadata), logger);
        const request: SearchRequest = {
          pattern: compiled,
          namespace: resolveNamespace(flags),
          all: flags.all,
          scope,
        };

        if (flags.json) {
          printJson(io, search(engine, request, logger).outcomes);
        } else {
          printLines(io, searchLines(engine, request, logger));
        }
      });
    });

  return program;
}

/**
 * Run the command
 * @param args - User arguments (without the node and script paths)
 * @returns Process exit code
 */
export async function run(args: readonly string[], io: CliIo = processIo): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync([...args], { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already reported its own errors; help and version exit 0
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : 2;
    }

    const verbose = program.opts<SearchFlags>().verbose === true || isVerbose();
    const message = colorize(`Error: ${formatCliError(err, verbose)}`, "red", io.stderrIsTTY);
    io.writeStderr(message + "\n");

    return mapErrorToExitCode(err);
  }
}
