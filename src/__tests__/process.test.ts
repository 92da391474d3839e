import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { mkdtemp, rm } from "node:fs/promises";
import { EXIT_NOT_FOUND, EXIT_TIMEOUT, runProcess } from "../lib/process";
import { LogSink } from "../lib/log";

describe("runProcess", () => {
  let tempDir: string;
  let log: LogSink;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "epubtree-process-"));
    log = new LogSink(join(tempDir, "test.log"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("resolves with the exit code and logs stdout and stderr", async () => {
    const code = await runProcess("sh", ["-c", "echo to-out; echo to-err >&2; exit 3"], { log });

    expect(code).toBe(3);
    const content = await log.read();
    expect(content).toMatch(/^== \S+ sh -c echo to-out; echo to-err >&2; exit 3 \(exit 3\)\n/);
    expect(content).toContain("to-out\n");
    expect(content).toContain("to-err\n");
  });

  it("runs in the given directory", async () => {
    await runProcess("sh", ["-c", "pwd"], { cwd: tempDir, log });
    expect(await log.tail(1)).toBe(tempDir);
  });

  it("reports a missing executable as 127", async () => {
    const code = await runProcess(join(tempDir, "no-such-tool"), [], { log });

    expect(code).toBe(EXIT_NOT_FOUND);
    expect(await log.read()).toContain("ENOENT");
  });

  it("kills the process at the deadline and reports 124", async () => {
    const code = await runProcess("sh", ["-c", "exec sleep 5"], { log, timeoutMs: 100 });

    expect(code).toBe(EXIT_TIMEOUT);
    expect(await log.tail(1)).toBe("killed after 100ms");
  });
});

describe("LogSink", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "epubtree-log-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("appends entries without truncating", async () => {
    const log = new LogSink(join(tempDir, "a.log"));
    await log.append("first", "one");
    await log.append("second", "two\n");

    const lines = (await log.read()).split("\n");
    expect(lines).toHaveLength(5);
    expect(lines[0]).toMatch(/^== .+ first$/);
    expect(lines[1]).toBe("one");
    expect(lines[2]).toMatch(/^== .+ second$/);
    expect(lines[3]).toBe("two");
    expect(lines[4]).toBe("");
  });

  it("tails the last lines and reads an absent log as empty", async () => {
    const log = new LogSink(join(tempDir, "b.log"));
    expect(await log.tail()).toBe("");

    await log.append("x", "1\n2\n3\n");
    expect(await log.tail(2)).toBe("2\n3");
  });
});
