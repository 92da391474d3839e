import { dirname, join, posix, resolve } from "node:path";
import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import JSZip from "jszip";
import type { Config } from "./config";
import { errorMessage } from "./errors";
import type { LogSink } from "./log";
import { LAYOUT } from "./paths";
import { runProcess } from "./process";

/**
 * Compression facility. Both operations resolve with an exit status;
 * anything other than 0 is a failure whose details are in the log sink.
 *
 * `members` are the top-level entries packed after the marker file.
 */
export interface Archiver {
  unpack(archive: string, workspace: string): Promise<number>;
  pack(workspace: string, archive: string, members: readonly string[]): Promise<number>;
}

/**
 * Top-level workspace entries to pack after the marker: everything except
 * the marker itself and dotfiles, in name order.
 */
export async function listMembers(workspace: string): Promise<string[]> {
  const entries = await readdir(workspace, { withFileTypes: true });
  return entries
    .filter((e) => e.name !== LAYOUT.mimetype && !e.name.startsWith("."))
    .filter((e) => e.isDirectory() || e.isFile())
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b));
}

export function createArchiver(config: Config, log: LogSink): Archiver {
  switch (config.archiver) {
    case "builtin":
      return new BuiltinArchiver(log);
    case "zip":
      return new ZipCliArchiver(log, {
        zip: config.zipCommand,
        unzip: config.unzipCommand,
        timeoutMs: config.timeoutMs,
      });
  }
}

// ─────────────────────────────────────────────────────────────
// zip / unzip executables
// ─────────────────────────────────────────────────────────────

export interface ZipCliOptions {
  zip: string;
  unzip: string;
  timeoutMs?: number;
}

/**
 * Argument lists for packing, run in order from the workspace directory.
 * The marker goes in first and stored (-0); everything else is deflated
 * with dotfiles excluded at any depth.
 */
export function packCommands(archive: string, members: readonly string[]): string[][] {
  const commands = [["-X", "-0", "-q", archive, LAYOUT.mimetype]];
  if (members.length > 0) {
    commands.push(["-X", "-r", "-9", "-q", archive, ...members, "-x", ".*", "*/.*"]);
  }
  return commands;
}

export function unpackCommand(archive: string, workspace: string): string[] {
  return ["-o", "-qq", archive, "-d", workspace];
}

export class ZipCliArchiver implements Archiver {
  private readonly log: LogSink;
  private readonly options: ZipCliOptions;

  constructor(log: LogSink, options: ZipCliOptions) {
    this.log = log;
    this.options = options;
  }

  async unpack(archive: string, workspace: string): Promise<number> {
    return runProcess(this.options.unzip, unpackCommand(resolve(archive), workspace), {
      log: this.log,
      timeoutMs: this.options.timeoutMs,
    });
  }

  async pack(workspace: string, archive: string, members: readonly string[]): Promise<number> {
    for (const args of packCommands(resolve(archive), members)) {
      const code = await runProcess(this.options.zip, args, {
        cwd: workspace,
        log: this.log,
        timeoutMs: this.options.timeoutMs,
      });
      if (code !== 0) {
        return code;
      }
    }
    return 0;
  }
}

// ─────────────────────────────────────────────────────────────
// In-process (jszip)
// ─────────────────────────────────────────────────────────────

export class BuiltinArchiver implements Archiver {
  private readonly log: LogSink;

  constructor(log: LogSink) {
    this.log = log;
  }

  async unpack(archive: string, workspace: string): Promise<number> {
    const label = `builtin unpack ${archive}`;
    try {
      const zip = await JSZip.loadAsync(await readFile(archive));
      const written: string[] = [];

      for (const entry of Object.values(zip.files)) {
        const name = entry.name.replace(/\\/g, "/");
        if (isUnsafeEntry(name)) {
          await this.log.append(`${label} (exit 1)`, `refusing entry outside workspace: ${name}`);
          return 1;
        }

        const target = join(workspace, ...name.split("/"));
        if (entry.dir) {
          await mkdir(target, { recursive: true });
          continue;
        }
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, await entry.async("nodebuffer"));
        written.push(name);
      }

      await this.log.append(`${label} (exit 0)`, written.join("\n"));
      return 0;
    } catch (err) {
      await this.log.append(`${label} (exit 1)`, errorMessage(err));
      return 1;
    }
  }

  async pack(workspace: string, archive: string, members: readonly string[]): Promise<number> {
    const label = `builtin pack ${archive}`;
    try {
      const zip = new JSZip();
      zip.file(LAYOUT.mimetype, await readFile(join(workspace, LAYOUT.mimetype)), {
        compression: "STORE",
      });

      const added: string[] = [LAYOUT.mimetype];
      for (const member of members) {
        if ((await stat(join(workspace, member))).isDirectory()) {
          await addTree(zip, workspace, member, added);
        } else {
          zip.file(member, await readFile(join(workspace, member)));
          added.push(member);
        }
      }

      const buffer = await zip.generateAsync({
        type: "nodebuffer",
        compression: "DEFLATE",
        compressionOptions: { level: 9 },
      });
      await writeFile(archive, buffer);

      await this.log.append(`${label} (exit 0)`, added.join("\n"));
      return 0;
    } catch (err) {
      await this.log.append(`${label} (exit 1)`, errorMessage(err));
      return 1;
    }
  }
}

async function addTree(zip: JSZip, workspace: string, rel: string, added: string[]): Promise<void> {
  const entries = await readdir(join(workspace, rel), { withFileTypes: true });
  zip.folder(rel);

  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;

    const child = posix.join(rel, entry.name);
    if (entry.isDirectory()) {
      await addTree(zip, workspace, child, added);
    } else if (entry.isFile()) {
      zip.file(child, await readFile(join(workspace, child)));
      added.push(child);
    }
  }
}

function isUnsafeEntry(name: string): boolean {
  const normalized = posix.normalize(name);
  if (!normalized || normalized === "." || normalized === "..") return true;
  if (normalized.startsWith("../") || normalized.startsWith("/")) return true;
  return /^[A-Za-z]:\//.test(normalized);
}
