import { extname } from "node:path";
import { InvalidExtensionError } from "./errors";
import { ARCHIVE_EXTENSION } from "./paths";

export interface NormalizeOptions {
  /**
   * Replace a foreign extension instead of rejecting it
   * ("book.txt" -> "book.epub").
   */
  coerce?: boolean;
}

/**
 * Give `path` the archive extension.
 *
 * - no extension: ".epub" is appended
 * - ".epub" (any case): returned unchanged
 * - anything else: InvalidExtensionError, or replaced when `coerce` is set
 *
 * normalize(normalize(p)) === normalize(p) for every p.
 */
export function normalizeArchivePath(path: string, options: NormalizeOptions = {}): string {
  const ext = extname(path);

  if (ext === "") {
    return path + ARCHIVE_EXTENSION;
  }
  if (ext === ".") {
    return path.slice(0, -1) + ARCHIVE_EXTENSION;
  }
  if (ext.toLowerCase() === ARCHIVE_EXTENSION) {
    return path;
  }
  if (options.coerce) {
    return path.slice(0, -ext.length) + ARCHIVE_EXTENSION;
  }

  throw new InvalidExtensionError(path, ext, ARCHIVE_EXTENSION);
}
