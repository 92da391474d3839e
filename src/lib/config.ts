import { readFile } from "node:fs/promises";
import YAML from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors";
import { getUserConfigPath } from "./paths";

const segment = z
  .string()
  .min(1)
  .refine((s) => !/[\\/]/.test(s) && s !== "." && s !== ".." && !s.startsWith("."), {
    message: "must be a single, non-hidden path segment",
  });

export const ConfigSchema = z
  .object({
    epubVersion: z.union([z.literal(2), z.literal(3)]).default(2),
    validator: z.string().min(1).default("epubcheck"),
    scratchRoot: z.string().min(1).optional(),
    contentDirs: z.array(segment).default(["Text", "Styles", "Images", "Fonts"]),
    listing: z.enum(["short", "long"]).default("short"),
    archiver: z.enum(["zip", "builtin"]).default("zip"),
    zipCommand: z.string().min(1).default("zip"),
    unzipCommand: z.string().min(1).default("unzip"),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/**
 * Validate a config object, filling in defaults.
 */
export function parseConfig(input: unknown, source = "inline"): Config {
  const result = ConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ConfigError(source, `${field}: ${issue.message}`, result.error);
  }
  return result.data;
}

/**
 * Load config from a YAML file. A missing file yields the defaults.
 */
export async function loadConfig(path: string = getUserConfigPath()): Promise<Config> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (err) {
    if (isNotFound(err)) {
      return parseConfig({}, path);
    }
    throw new ConfigError(path, errorMessage(err), err);
  }

  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new ConfigError(path, errorMessage(err), err);
  }

  return parseConfig(raw, path);
}

/**
 * Apply command-line overrides on top of a loaded config.
 */
export function withOverrides(config: Config, overrides: ConfigInput): Config {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return parseConfig({ ...config, ...defined }, "command line");
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
