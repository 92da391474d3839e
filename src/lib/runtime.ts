import { join } from "node:path";
import { tmpdir } from "node:os";
import { access, appendFile, mkdir } from "node:fs/promises";
import { constants } from "node:fs";
import type { Config } from "./config";
import { AllocationError } from "./errors";
import { LogSink } from "./log";
import { LOG_FILE } from "./paths";
import { createArchiver, type Archiver } from "./archiver";

/**
 * Process-wide state, created once at start-up and passed explicitly
 * to every operation.
 */
export interface Runtime {
  config: Config;
  scratchRoot: string;
  log: LogSink;
  archiver: Archiver;
  verbose: boolean;
}

export interface RuntimeOptions {
  verbose?: boolean;
  /** Replaces the archiver selected by config. */
  archiver?: Archiver;
}

export async function createRuntime(config: Config, options: RuntimeOptions = {}): Promise<Runtime> {
  const scratchRoot = await prepareScratchRoot(config.scratchRoot);
  const log = new LogSink(join(scratchRoot, LOG_FILE));

  try {
    await appendFile(log.path, "", "utf8");
  } catch (err) {
    throw new AllocationError(scratchRoot, err);
  }

  return {
    config,
    scratchRoot,
    log,
    archiver: options.archiver ?? createArchiver(config, log),
    verbose: options.verbose ?? false,
  };
}

/** Scratch root shared by every process when none is configured. */
export function defaultScratchRoot(): string {
  return join(tmpdir(), "epubtree");
}

async function prepareScratchRoot(configured: string | undefined): Promise<string> {
  const root = configured ?? defaultScratchRoot();
  try {
    await mkdir(root, { recursive: true });
    await access(root, constants.W_OK);
  } catch (err) {
    throw new AllocationError(root, err);
  }
  return root;
}
