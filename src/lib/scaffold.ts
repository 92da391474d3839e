import { join } from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import type { EpubVersion } from "../types";
import { NAME, VERSION } from "../version";
import { uuidIdentifier, type IdentifierPolicy } from "./identifier";
import { LAYOUT, MIMETYPE } from "./paths";
import {
  CONTAINER_TEMPLATE,
  MANIFEST_TEMPLATE,
  NAVIGATION_TEMPLATE,
  renderTemplate,
} from "./templates";
import { discardWorkspace } from "./workspace";

export interface ScaffoldOptions {
  epubVersion: EpubVersion;
  contentDirs: readonly string[];
  identifier?: IdentifierPolicy;
  verbose?: boolean;
}

/**
 * Build the bootstrap file set inside an empty workspace.
 *
 * Runs as one unit: if any step fails the workspace directory is removed
 * and the original error is rethrown.
 */
export async function scaffold(workspace: string, options: ScaffoldOptions): Promise<void> {
  const version = `${options.epubVersion}.0`;
  const generator = `${NAME} ${VERSION}`;

  try {
    const identifier = (options.identifier ?? uuidIdentifier)();

    await writeMember(workspace, LAYOUT.mimetype, MIMETYPE, options);

    await mkdir(join(workspace, LAYOUT.metaInf), { recursive: true });
    await writeMember(workspace, LAYOUT.container, renderTemplate(CONTAINER_TEMPLATE, []), options);

    await mkdir(join(workspace, LAYOUT.content), { recursive: true });
    for (const dir of options.contentDirs) {
      await mkdir(join(workspace, LAYOUT.content, dir));
    }
    await writeMember(
      workspace,
      LAYOUT.manifest,
      renderTemplate(MANIFEST_TEMPLATE, [version, identifier, generator]),
      options
    );
    await writeMember(
      workspace,
      LAYOUT.navigation,
      renderTemplate(NAVIGATION_TEMPLATE, [identifier]),
      options
    );
  } catch (err) {
    await discardWorkspace(workspace);
    throw err;
  }
}

async function writeMember(
  workspace: string,
  member: string,
  content: string,
  options: ScaffoldOptions
): Promise<void> {
  await writeFile(join(workspace, member), content, "utf8");
  if (options.verbose) {
    console.log(`    Generated: ${member}`);
  }
}
