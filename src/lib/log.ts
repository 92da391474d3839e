import { appendFile, readFile } from "node:fs/promises";

/**
 * Process-wide, append-only log for the output of external tools.
 * Never truncated by epubtree itself.
 */
export class LogSink {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async append(source: string, text: string): Promise<void> {
    const body = text.length === 0 || text.endsWith("\n") ? text : `${text}\n`;
    await appendFile(this.path, `== ${new Date().toISOString()} ${source}\n${body}`, "utf8");
  }

  async read(): Promise<string> {
    try {
      return await readFile(this.path, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return "";
      }
      throw err;
    }
  }

  /**
   * Last `lines` lines of the log, for surfacing alongside a failure.
   */
  async tail(lines = 20): Promise<string> {
    const content = await this.read();
    const all = content.split("\n");
    if (all[all.length - 1] === "") all.pop();
    return all.slice(-lines).join("\n");
  }
}
