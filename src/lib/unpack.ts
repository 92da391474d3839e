import { UnpackFailure } from "./errors";
import type { Runtime } from "./runtime";

/**
 * Expand an archive into a workspace. The archive is not checked here;
 * a malformed one shows up as a non-zero status from the archiver.
 */
export async function unpack(runtime: Runtime, archive: string, workspace: string): Promise<void> {
  if (runtime.verbose) {
    console.log(`  Unpacking ${archive} into ${workspace}`);
  }

  const exitCode = await runtime.archiver.unpack(archive, workspace);
  if (exitCode !== 0) {
    throw new UnpackFailure(archive, {
      exitCode,
      logPath: runtime.log.path,
      logTail: await runtime.log.tail(),
    });
  }
}
