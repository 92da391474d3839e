import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import chalk from "chalk";
import type { ArchiveEntry, Context, ListingStyle } from "../types";
import { checkMarker, METHOD_DEFLATED, METHOD_STORED, readEntries } from "../lib/inspect";
import { MIMETYPE } from "../lib/paths";

export function formatEntries(entries: ArchiveEntry[], style: ListingStyle): string[] {
  if (style === "short") {
    return entries.map((e) => e.name);
  }

  return entries.map((e) => {
    const method =
      e.method === METHOD_STORED ? "stored" : e.method === METHOD_DEFLATED ? "deflate" : `m${e.method}`;
    return `${method.padEnd(8)}${String(e.compressedSize).padStart(10)}${String(e.size).padStart(10)}  ${e.name}`;
  });
}

export async function list(
  archive: string | undefined,
  style: ListingStyle,
  ctx: Context
): Promise<void> {
  if (!archive) {
    throw new Error("Archive required. Usage: epubtree list <book.epub>");
  }

  const buffer = await readFile(resolve(ctx.cwd, archive));
  const entries = await readEntries(buffer);

  if (style === "long") {
    console.log(chalk.dim(`${"method".padEnd(8)}${"packed".padStart(10)}${"size".padStart(10)}  name`));
  }
  for (const line of formatEntries(entries, style)) {
    console.log(line);
  }

  for (const problem of await checkMarker(buffer, entries, MIMETYPE)) {
    console.log(chalk.yellow(`  Warning: ${problem}`));
  }
}
