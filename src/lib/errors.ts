export type EpubTreeErrorCode =
  | "ALLOCATION_FAILED"
  | "TEMPLATE_ARITY"
  | "INVALID_EXTENSION"
  | "UNPACK_FAILED"
  | "PACKAGING_FAILED"
  | "SESSION_NOT_FOUND"
  | "ARCHIVE_NOT_FOUND"
  | "ARCHIVE_FORMAT"
  | "CONFIG_INVALID";

export class EpubTreeError extends Error {
  readonly code: EpubTreeErrorCode;

  constructor(code: EpubTreeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "EpubTreeError";
    this.code = code;
  }
}

/**
 * The scratch root (or a workspace under it) could not be created.
 */
export class AllocationError extends EpubTreeError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("ALLOCATION_FAILED", `Cannot allocate under ${path}: ${errorMessage(cause)}`, { cause });
    this.name = "AllocationError";
    this.path = path;
  }
}

export class TemplateArityError extends EpubTreeError {
  readonly template: string;
  readonly expected: number;
  readonly received: number;

  constructor(template: string, expected: number, received: number) {
    super(
      "TEMPLATE_ARITY",
      `Template '${template}' takes ${expected} value(s), got ${received}`
    );
    this.name = "TemplateArityError";
    this.template = template;
    this.expected = expected;
    this.received = received;
  }
}

export class InvalidExtensionError extends EpubTreeError {
  readonly path: string;
  readonly extension: string;

  constructor(path: string, extension: string, expected: string) {
    super(
      "INVALID_EXTENSION",
      `${path}: expected a ${expected} file, not ${extension}`
    );
    this.name = "InvalidExtensionError";
    this.path = path;
    this.extension = extension;
  }
}

interface ToolFailureDetails {
  exitCode: number;
  logPath: string;
  logTail: string;
}

/**
 * An external compression/decompression step exited non-zero.
 * Carries the log sink location and its last lines.
 */
abstract class ToolFailure extends EpubTreeError {
  readonly exitCode: number;
  readonly logPath: string;
  readonly logTail: string;

  protected constructor(code: EpubTreeErrorCode, message: string, details: ToolFailureDetails) {
    super(code, `${message} (exit ${details.exitCode}, see ${details.logPath})`);
    this.exitCode = details.exitCode;
    this.logPath = details.logPath;
    this.logTail = details.logTail;
  }
}

export class UnpackFailure extends ToolFailure {
  readonly archive: string;

  constructor(archive: string, details: ToolFailureDetails) {
    super("UNPACK_FAILED", `Failed to unpack ${archive}`, details);
    this.name = "UnpackFailure";
    this.archive = archive;
  }
}

export class PackagingFailure extends ToolFailure {
  readonly workspace: string;

  constructor(workspace: string, details: ToolFailureDetails) {
    super("PACKAGING_FAILED", `Failed to package ${workspace}`, details);
    this.name = "PackagingFailure";
    this.workspace = workspace;
  }
}

export class SessionNotFoundError extends EpubTreeError {
  constructor(from: string) {
    super("SESSION_NOT_FOUND", `No epubtree session found above ${from}`);
    this.name = "SessionNotFoundError";
  }
}

export class ArchiveNotFoundError extends EpubTreeError {
  constructor(path: string) {
    super("ARCHIVE_NOT_FOUND", `Archive not found: ${path}`);
    this.name = "ArchiveNotFoundError";
  }
}

export class ArchiveFormatError extends EpubTreeError {
  constructor(message: string) {
    super("ARCHIVE_FORMAT", message);
    this.name = "ArchiveFormatError";
  }
}

export class ConfigError extends EpubTreeError {
  readonly source: string;

  constructor(source: string, message: string, cause?: unknown) {
    super("CONFIG_INVALID", `Invalid config (${source}): ${message}`, { cause });
    this.name = "ConfigError";
    this.source = source;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
