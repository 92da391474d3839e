// ─────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────

export interface Context {
  verbose: boolean;
  cwd: string;
}

export type EpubVersion = 2 | 3;

export type ListingStyle = "short" | "long";

export type ArchiverKind = "zip" | "builtin";

// ─────────────────────────────────────────────────────────────
// Session
// ─────────────────────────────────────────────────────────────

/**
 * A workspace bound to the archive it will be packed into.
 * - "create": scaffolded from templates
 * - "open": unpacked from an existing archive
 */
export interface Session {
  workspace: string;
  target: string;
  mode: "create" | "open";
  created_at: string;
}

/**
 * Interactive collaborator consulted while repacking. The core never
 * talks to a terminal directly.
 */
export interface Prompter {
  confirmOverwrite(path: string): Promise<boolean>;
  askPath(suggestion: string): Promise<string>;
  /** Shown when an answer was rejected and the question is asked again. */
  warn?(message: string): void;
}

// ─────────────────────────────────────────────────────────────
// Archive layout
// ─────────────────────────────────────────────────────────────

export interface ArchiveEntry {
  name: string;
  /** 0 = stored, 8 = deflate */
  method: number;
  compressedSize: number;
  size: number;
  offset: number;
}
