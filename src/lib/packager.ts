import { dirname, join, resolve } from "node:path";
import { copyFile, mkdir, rename, rm } from "node:fs/promises";
import { v4 as uuidv4 } from "uuid";
import type { Prompter } from "../types";
import { listMembers } from "./archiver";
import { InvalidExtensionError, PackagingFailure, SessionNotFoundError } from "./errors";
import { normalizeArchivePath } from "./filename";
import { ARCHIVE_EXTENSION, pathExists } from "./paths";
import type { Runtime } from "./runtime";
import { resolveSession } from "./session";
import { workspaceStem } from "./workspace";

/**
 * Pack the workspace containing `from` into its bound archive.
 *
 * The archive is built in the scratch root and only moved over the
 * destination once the archiver reports success, so a failed run leaves
 * the destination as it was. Resolves with the path written.
 */
export async function pack(runtime: Runtime, from: string, prompter: Prompter): Promise<string> {
  const session = await resolveSession(from);
  if (!session) {
    throw new SessionNotFoundError(from);
  }

  const destination = await chooseDestination(session.target, prompter);
  const temp = join(
    runtime.scratchRoot,
    `${workspaceStem(destination)}-${uuidv4()}${ARCHIVE_EXTENSION}`
  );

  if (runtime.verbose) {
    console.log(`  Packing ${session.workspace} -> ${temp}`);
  }

  const members = await listMembers(session.workspace);
  const exitCode = await runtime.archiver.pack(session.workspace, temp, members);
  if (exitCode !== 0) {
    await rm(temp, { force: true });
    throw new PackagingFailure(session.workspace, {
      exitCode,
      logPath: runtime.log.path,
      logTail: await runtime.log.tail(),
    });
  }

  await publish(temp, destination);
  return destination;
}

/**
 * Settle on the file to write. An existing file is only replaced after
 * confirmation; otherwise the prompter is asked for another path, and
 * asked again while the answer has the wrong extension.
 */
export async function chooseDestination(target: string, prompter: Prompter): Promise<string> {
  let candidate = target;

  for (;;) {
    let destination: string;
    try {
      destination = normalizeArchivePath(resolve(candidate));
    } catch (err) {
      if (!(err instanceof InvalidExtensionError)) throw err;
      prompter.warn?.(err.message);
      candidate = await prompter.askPath(candidate);
      continue;
    }

    if (!(await pathExists(destination)) || (await prompter.confirmOverwrite(destination))) {
      return destination;
    }
    candidate = await prompter.askPath(destination);
  }
}

/**
 * Move the finished archive into place. rename() is atomic on one
 * filesystem; across filesystems the copy lands beside the destination
 * first and is renamed from there. The temporary file is always removed.
 */
export async function publish(
  temp: string,
  destination: string,
  move: (from: string, to: string) => Promise<void> = rename
): Promise<void> {
  await mkdir(dirname(destination), { recursive: true });

  try {
    await move(temp, destination);
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "EXDEV")) throw err;

    const staging = `${destination}.${uuidv4()}.part`;
    try {
      await copyFile(temp, staging);
      await move(staging, destination);
    } catch (stagingErr) {
      await rm(staging, { force: true });
      throw stagingErr;
    }
  } finally {
    await rm(temp, { force: true });
  }
}
