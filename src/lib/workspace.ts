import { basename, extname, join } from "node:path";
import { mkdtemp, rm } from "node:fs/promises";
import { AllocationError } from "./errors";

/**
 * Create a uniquely named workspace directory under the scratch root.
 * The name is derived from `seed`; mkdtemp supplies the unique suffix.
 */
export async function allocateWorkspace(scratchRoot: string, seed: string): Promise<string> {
  const prefix = join(scratchRoot, `${workspaceStem(seed)}-`);
  try {
    return await mkdtemp(prefix);
  } catch (err) {
    throw new AllocationError(scratchRoot, err);
  }
}

/**
 * Remove a workspace and everything under it.
 */
export async function discardWorkspace(workspace: string): Promise<void> {
  await rm(workspace, { recursive: true, force: true });
}

/**
 * "~/books/My Novel.epub" -> "My-Novel"
 */
export function workspaceStem(seed: string): string {
  const base = basename(seed, extname(seed));
  const stem = base.replace(/[^A-Za-z0-9._-]+/g, "-").replace(/^[-.]+|-+$/g, "");
  return stem || "book";
}
