#!/usr/bin/env tsx

import { parseArgs } from "node:util";
import chalk from "chalk";

import type { ArchiverKind, Context, EpubVersion, ListingStyle } from "./types";
import { NAME, VERSION } from "./version";
import { loadConfig, withOverrides } from "./lib/config";
import { createRuntime } from "./lib/runtime";
import { createTerminalPrompter } from "./lib/prompt";
import { PackagingFailure, UnpackFailure } from "./lib/errors";
import { newBook } from "./commands/new";
import { open } from "./commands/open";
import { repack } from "./commands/repack";
import { where } from "./commands/where";
import { list } from "./commands/list";
import { validate } from "./commands/validate";

const HELP = `
${chalk.bold(NAME)} — edit EPUB archives as directory trees

${chalk.dim("Usage:")}
  ${NAME} <command> [options]

${chalk.dim("Commands:")}
  ${chalk.cyan("new")} <book.epub>          Scaffold a new book in a fresh workspace
  ${chalk.cyan("open")} <book.epub>         Unpack an existing book into a workspace
  ${chalk.cyan("repack")} [path]            Pack the workspace containing path (default: .)
  ${chalk.cyan("where")} [path]             Show the workspace and target bound above path
  ${chalk.cyan("list")} <book.epub>         List archive entries
  ${chalk.cyan("validate")} <book.epub>     Check an archive and run the configured validator

${chalk.dim("Options:")}
  -h, --help                Show this help
  -v, --version             Show version
  --verbose                 Verbose output
  --config <file>           Config file (default: ~/.epubtree/config.yaml)
  --epub-version <2|3>      Version written into new manifests
  --scratch <dir>           Scratch root for workspaces
  --archiver <zip|builtin>  Use zip/unzip executables or the built-in packer
  --long                    Long listing (list)

${chalk.dim("Examples:")}
  ${NAME} new my-novel.epub
  ${NAME} open ~/books/novel.epub
  ${NAME} repack
`;

function parseEpubVersion(value: string | undefined): EpubVersion | undefined {
  if (value === undefined) return undefined;
  if (value === "2") return 2;
  if (value === "3") return 3;
  throw new Error(`--epub-version must be 2 or 3, got ${value}`);
}

function parseArchiver(value: string | undefined): ArchiverKind | undefined {
  if (value === undefined || value === "zip" || value === "builtin") return value;
  throw new Error(`--archiver must be zip or builtin, got ${value}`);
}

async function main() {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    options: {
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
      verbose: { type: "boolean" },
      config: { type: "string" },
      "epub-version": { type: "string" },
      scratch: { type: "string" },
      archiver: { type: "string" },
      long: { type: "boolean" },
    },
    allowPositionals: true,
  });

  if (values.version) {
    console.log(`${NAME} v${VERSION}`);
    process.exit(0);
  }

  const [command, ...rest] = positionals;

  if (values.help || !command) {
    console.log(HELP);
    process.exit(0);
  }

  const ctx: Context = {
    verbose: values.verbose ?? false,
    cwd: process.cwd(),
  };

  try {
    const config = withOverrides(await loadConfig(values.config), {
      epubVersion: parseEpubVersion(values["epub-version"]),
      scratchRoot: values.scratch,
      archiver: parseArchiver(values.archiver),
    });

    // list and where only read; the other commands share one runtime
    if (command === "list") {
      const style: ListingStyle = values.long ? "long" : config.listing;
      await list(rest[0], style, ctx);
      return;
    }
    if (command === "where") {
      await where(rest[0], ctx);
      return;
    }

    const runtime = await createRuntime(config, { verbose: ctx.verbose });

    switch (command) {
      case "new":
        await newBook(rest[0], runtime, ctx);
        break;

      case "open":
        await open(rest[0], runtime, ctx);
        break;

      case "repack":
        await repack(rest[0], runtime, createTerminalPrompter(), ctx);
        break;

      case "validate":
        if (!(await validate(rest[0], runtime, ctx))) {
          process.exit(1);
        }
        break;

      default:
        console.error(chalk.red(`Unknown command: ${command}`));
        console.log(`Run '${NAME} --help' for usage.`);
        process.exit(1);
    }
  } catch (err) {
    if (ctx.verbose && err instanceof Error) {
      console.error(chalk.red("Error:"), err.message);
      console.error(chalk.dim(err.stack));
    } else if (err instanceof Error) {
      console.error(chalk.red("Error:"), err.message);
    } else {
      console.error(chalk.red("Error:"), err);
    }
    if (err instanceof PackagingFailure || err instanceof UnpackFailure) {
      console.error(chalk.dim(err.logTail));
    }
    process.exit(1);
  }
}

void main();
