import { resolve } from "node:path";
import type { Context } from "../types";
import { SessionNotFoundError } from "../lib/errors";
import { resolveSession } from "../lib/session";

/**
 * Print the session bound above a path, one "key<TAB>value" per line,
 * for editor integrations.
 */
export async function where(from: string | undefined, ctx: Context): Promise<void> {
  const start = resolve(ctx.cwd, from ?? ".");
  const session = await resolveSession(start);
  if (!session) {
    throw new SessionNotFoundError(start);
  }

  console.log(`workspace\t${session.workspace}`);
  console.log(`target\t${session.target}`);
  console.log(`mode\t${session.mode}`);
}
