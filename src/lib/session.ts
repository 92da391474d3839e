import { dirname, resolve } from "node:path";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import YAML from "yaml";
import { z } from "zod";
import type { Session } from "../types";
import { ConfigError, errorMessage } from "./errors";
import { findSessionRoot, getSessionPath } from "./paths";

const SessionSchema = z.object({
  workspace: z.string().min(1),
  target: z.string().min(1),
  mode: z.enum(["create", "open"]),
  created_at: z.string(),
});

/**
 * Record which archive a workspace packs into. Written before the
 * workspace is handed to the user, so every file under it resolves.
 */
export async function bindSession(
  workspace: string,
  target: string,
  mode: Session["mode"]
): Promise<Session> {
  const session: Session = {
    workspace: resolve(workspace),
    target: resolve(target),
    mode,
    created_at: new Date().toISOString(),
  };

  const path = getSessionPath(session.workspace);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, YAML.stringify(session, { indent: 2 }), "utf8");

  return session;
}

/**
 * Recover the session from any path inside its workspace.
 */
export async function resolveSession(from: string): Promise<Session | null> {
  const root = await findSessionRoot(from);
  if (!root) {
    return null;
  }

  const path = getSessionPath(root);
  const content = await readFile(path, "utf8");

  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new ConfigError(path, errorMessage(err), err);
  }

  const result = SessionSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(path, result.error.issues[0].message, result.error);
  }

  // A moved workspace resolves to where it was found.
  return { ...result.data, workspace: root };
}
