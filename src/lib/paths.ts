import { join, dirname, resolve } from "node:path";
import { homedir } from "node:os";
import { stat } from "node:fs/promises";

export const ARCHIVE_EXTENSION = ".epub";
export const MIMETYPE = "application/epub+zip";

/**
 * Fixed member paths of every archive, relative to the workspace root.
 */
export const LAYOUT = {
  mimetype: "mimetype",
  metaInf: "META-INF",
  container: "META-INF/container.xml",
  content: "OEBPS",
  manifest: "OEBPS/content.opf",
  navigation: "OEBPS/toc.ncx",
} as const;

export const SESSION_DIR = ".epubtree";
export const SESSION_FILE = "session.yaml";
export const LOG_FILE = "epubtree.log";

/**
 * Find the workspace root by walking up looking for .epubtree/session.yaml
 */
export async function findSessionRoot(from: string): Promise<string | null> {
  let dir = resolve(from);

  for (;;) {
    if (await isFile(getSessionPath(dir))) {
      return dir;
    }

    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

export function getSessionPath(workspace: string): string {
  return join(workspace, SESSION_DIR, SESSION_FILE);
}

/**
 * Get path to the user config file.
 * EPUBTREE_CONFIG overrides ~/.epubtree/config.yaml
 */
export function getUserConfigPath(): string {
  return process.env.EPUBTREE_CONFIG || join(homedir(), ".epubtree", "config.yaml");
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}
