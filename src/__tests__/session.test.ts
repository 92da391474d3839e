import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { mkdir, mkdtemp, readFile, rename, rm, writeFile } from "node:fs/promises";
import YAML from "yaml";
import { bindSession, resolveSession } from "../lib/session";
import { ConfigError } from "../lib/errors";

describe("session binding", () => {
  let tempDir: string;
  let workspace: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "epubtree-session-"));
    workspace = join(tempDir, "ws");
    await mkdir(join(workspace, "OEBPS", "Text"), { recursive: true });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("writes the binding to .epubtree/session.yaml", async () => {
    const target = join(tempDir, "out", "book.epub");
    await bindSession(workspace, target, "create");

    const stored = YAML.parse(await readFile(join(workspace, ".epubtree", "session.yaml"), "utf8"));
    expect(stored.workspace).toBe(workspace);
    expect(stored.target).toBe(target);
    expect(stored.mode).toBe("create");
  });

  it("resolves from the workspace root, a nested directory and a file", async () => {
    const target = join(tempDir, "book.epub");
    await bindSession(workspace, target, "open");
    const chapter = join(workspace, "OEBPS", "Text", "ch1.xhtml");
    await writeFile(chapter, "<html/>");

    for (const from of [workspace, join(workspace, "OEBPS", "Text"), chapter]) {
      const session = await resolveSession(from);
      expect(session?.workspace).toBe(workspace);
      expect(session?.target).toBe(target);
      expect(session?.mode).toBe("open");
    }
  });

  it("returns null outside any workspace", async () => {
    expect(await resolveSession(tempDir)).toBeNull();
  });

  it("reports the workspace where it was found after a move", async () => {
    await bindSession(workspace, join(tempDir, "book.epub"), "create");
    const moved = join(tempDir, "moved");
    await rename(workspace, moved);

    const session = await resolveSession(join(moved, "OEBPS"));
    expect(session?.workspace).toBe(moved);
  });

  it("rejects a corrupt binding file", async () => {
    await mkdir(join(workspace, ".epubtree"), { recursive: true });
    await writeFile(join(workspace, ".epubtree", "session.yaml"), "workspace: 42\n");

    await expect(resolveSession(workspace)).rejects.toBeInstanceOf(ConfigError);
  });
});
