import { spawn } from "node:child_process";
import type { LogSink } from "./log";

export interface RunOptions {
  cwd?: string;
  log: LogSink;
  timeoutMs?: number;
}

/** Exit code reported when the executable cannot be started. */
export const EXIT_NOT_FOUND = 127;
/** Exit code reported when the deadline expired. */
export const EXIT_TIMEOUT = 124;

/**
 * Run an external command without a shell and resolve with its exit code.
 * stdout and stderr both end up in the log sink.
 */
export async function runProcess(
  command: string,
  args: string[],
  options: RunOptions
): Promise<number> {
  const label = [command, ...args].join(" ");
  let output = "";

  const code = await new Promise<number>((resolve) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    let timedOut = false;
    const timer =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, options.timeoutMs)
        : undefined;

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (d: string) => (output += d));
    child.stderr.on("data", (d: string) => (output += d));

    child.once("error", (err) => {
      if (timer) clearTimeout(timer);
      output += `${err.message}\n`;
      resolve(EXIT_NOT_FOUND);
    });
    child.once("close", (c, signal) => {
      if (timer) clearTimeout(timer);
      if (timedOut) {
        output += `killed after ${options.timeoutMs}ms\n`;
        resolve(EXIT_TIMEOUT);
      } else if (c === null) {
        output += `terminated by ${signal ?? "signal"}\n`;
        resolve(1);
      } else {
        resolve(c);
      }
    });
  });

  await options.log.append(`${label} (exit ${code})`, output);
  return code;
}
