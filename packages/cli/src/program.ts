/**
 * Flat Pages CLI program definition
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import type { BackendKind, Store } from "@flatpages/sdk";
import { openCliStore } from "./lib/store.js";
import { resolveSettings } from "./lib/env.js";
import { parseBackend, collectFilter } from "./lib/arg.js";
import { readDocumentInput, type InputSource } from "./lib/input.js";
import { renderDocument, colorize } from "./lib/output.js";
import { CliError, EXIT_CODE, exitCodeFor, formatCliError } from "./lib/errors.js";
import { timeCommand } from "./lib/telemetry.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Options shared by every command
 */
type GlobalOptions = {
  root?: string;
  backend?: BackendKind;
  ext?: string;
  delimiter?: string;
  verbose?: boolean;
  quiet?: boolean;
};

interface GetOptions {
  raw?: boolean;
  filter?: string[];
}

/**
 * Mutable state of one CLI run
 */
export interface RunContext {
  exitCode: number;
}

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (manifest !== null && typeof manifest === "object" && "version" in manifest) {
    return String(manifest.version);
  }
  return "0.0.0";
}

/**
 * Build the command tree
 * @param context - Receives the exit code of commands that finish without an error
 */
export function createProgram(context: RunContext = { exitCode: EXIT_CODE.SUCCESS }): Command {
  const program = new Command();

  // Configure error output with color; commander errors are thrown, not exited
  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr.isTTY ?? false)),
    })
    .exitOverride();

  program
    .name("flatpages")
    .description("Flat Pages - YAML documents in plain files, addressed by URL-like keys")
    .version(readVersion())
    .option("--root <path>", "Store root directory (env: FLATPAGES_ROOT)")
    .option(
      "--backend <kind>",
      "Storage layout: single-folder or multi-folder (env: FLATPAGES_BACKEND)",
      parseBackend
    )
    .option("--ext <extension>", "File extension for documents (env: FLATPAGES_EXT)")
    .option(
      "--delimiter <delimiter>",
      "Key separator replacement, single-folder only (env: FLATPAGES_DELIMITER)"
    )
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  function storeFor(filters?: readonly string[]): Store {
    return openCliStore({ ...resolveSettings(program.opts<GlobalOptions>()), filters });
  }

  function target(store: Store, key: string) {
    return { key, backend: store.options.backend };
  }

  // Get command
  program
    .command("get <key>")
    .description("Print a document as JSON")
    .option("--raw", "Output compact JSON without formatting")
    .option("--filter <name>", "Apply a built-in filter: upper, lower or trim", collectFilter)
    .action(async (key: string, options: GetOptions) => {
      const store = storeFor(options.filter);

      await timeCommand("get", target(store, key), async () => {
        const doc = await store.get(key);

        if (doc === null) {
          throw new CliError(`Document not found: ${key}`, {
            exitCode: EXIT_CODE.NOT_FOUND,
          });
        }

        console.log(renderDocument(doc, { raw: options.raw }));
        return "ok";
      });
    });

  // Put command
  program
    .command("put <key>")
    .description("Store or replace a document")
    .option("--file <path>", "Read document from JSON file")
    .option("--data <json>", "Inline JSON document")
    .option("--ordered", "Keep the field order of the JSON object instead of sorting")
    .action(async (key: string, options: InputSource) => {
      const store = storeFor();

      await timeCommand("put", target(store, key), async () => {
        await store.put(key, await readDocumentInput(options));

        if (!program.opts<GlobalOptions>().quiet) {
          console.log(`Stored ${key} at ${store.keyToPath(key)}`);
        }
        return "ok";
      });
    });

  // Exists command
  program
    .command("exists <key>")
    .description("Check whether a document exists (exit 2 when absent)")
    .action(async (key: string) => {
      const store = storeFor();

      await timeCommand("exists", target(store, key), async () => {
        const found = await store.exists(key);

        if (!program.opts<GlobalOptions>().quiet) {
          console.log(String(found));
        }
        context.exitCode = found ? EXIT_CODE.SUCCESS : EXIT_CODE.NOT_FOUND;
        return found ? "ok" : "absent";
      });
    });

  // Path command
  program
    .command("path <key>")
    .description("Print the file path a key maps to")
    .action((key: string) => {
      console.log(storeFor().keyToPath(key));
    });

  return program;
}

/**
 * Run the CLI and resolve to its exit code
 * @param argv - Arguments, including node and script path unless `from` is "user"
 */
export async function run(argv: readonly string[], from: "node" | "user" = "node"): Promise<number> {
  const context: RunContext = { exitCode: EXIT_CODE.SUCCESS };
  const program = createProgram(context);

  try {
    await program.parseAsync(argv, { from });
    return context.exitCode;
  } catch (err) {
    // Commander has already written its own message (or help/version)
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const opts = program.opts<GlobalOptions>();
    console.error(`Error: ${formatCliError(err, opts.verbose)}`);
    return exitCodeFor(err);
  }
}
