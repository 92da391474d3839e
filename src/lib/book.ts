import { resolve } from "node:path";
import type { Session } from "../types";
import { ArchiveNotFoundError } from "./errors";
import { normalizeArchivePath } from "./filename";
import type { IdentifierPolicy } from "./identifier";
import { pathExists } from "./paths";
import type { Runtime } from "./runtime";
import { scaffold } from "./scaffold";
import { bindSession } from "./session";
import { unpack } from "./unpack";
import { allocateWorkspace, discardWorkspace } from "./workspace";

export interface CreateOptions {
  identifier?: IdentifierPolicy;
}

/**
 * Start a session for a new book: scaffold a fresh workspace and bind it
 * to `target`. A foreign extension on `target` is replaced with .epub.
 */
export async function createBook(
  runtime: Runtime,
  target: string,
  options: CreateOptions = {}
): Promise<Session> {
  const destination = normalizeArchivePath(resolve(target), { coerce: true });
  const workspace = await allocateWorkspace(runtime.scratchRoot, destination);

  await scaffold(workspace, {
    epubVersion: runtime.config.epubVersion,
    contentDirs: runtime.config.contentDirs,
    identifier: options.identifier,
    verbose: runtime.verbose,
  });

  return bindOrDiscard(workspace, destination, "create");
}

/**
 * Start a session on an existing archive: unpack it into a fresh
 * workspace bound to the archive itself.
 */
export async function openBook(runtime: Runtime, archive: string): Promise<Session> {
  const source = normalizeArchivePath(resolve(archive));
  if (!(await pathExists(source))) {
    throw new ArchiveNotFoundError(source);
  }

  const workspace = await allocateWorkspace(runtime.scratchRoot, source);
  try {
    await unpack(runtime, source, workspace);
  } catch (err) {
    await discardWorkspace(workspace);
    throw err;
  }

  return bindOrDiscard(workspace, source, "open");
}

async function bindOrDiscard(
  workspace: string,
  target: string,
  mode: Session["mode"]
): Promise<Session> {
  try {
    return await bindSession(workspace, target, mode);
  } catch (err) {
    await discardWorkspace(workspace);
    throw err;
  }
}
