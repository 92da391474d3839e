import yauzl, { type Entry, type ZipFile } from "yauzl";
import { DOMParser } from "@xmldom/xmldom";
import type { ArchiveEntry } from "../types";
import { ArchiveFormatError, errorMessage } from "./errors";
import { LAYOUT } from "./paths";

export const METHOD_STORED = 0;
export const METHOD_DEFLATED = 8;

function openZip(buffer: Buffer): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.fromBuffer(buffer, { lazyEntries: true }, (err, zip) => {
      if (err || !zip) {
        reject(new ArchiveFormatError(`Not a zip archive: ${errorMessage(err)}`));
        return;
      }
      resolve(zip);
    });
  });
}

/**
 * Read the central directory of a zip archive. Entries come back in
 * physical (local header offset) order.
 */
export async function readEntries(buffer: Buffer): Promise<ArchiveEntry[]> {
  const zip = await openZip(buffer);
  const entries: ArchiveEntry[] = [];

  await new Promise<void>((resolve, reject) => {
    zip.on("entry", (entry: Entry) => {
      entries.push({
        name: entry.fileName,
        method: entry.compressionMethod,
        compressedSize: entry.compressedSize,
        size: entry.uncompressedSize,
        offset: entry.relativeOffsetOfLocalHeader,
      });
      zip.readEntry();
    });
    zip.on("end", () => resolve());
    zip.on("error", (err: Error) => reject(new ArchiveFormatError(err.message)));
    zip.readEntry();
  });

  return entries.sort((a, b) => a.offset - b.offset);
}

/**
 * Uncompressed contents of the named entry, or undefined when the
 * archive has no such entry.
 */
export async function readEntry(buffer: Buffer, name: string): Promise<Buffer | undefined> {
  const zip = await openZip(buffer);

  return new Promise((resolve, reject) => {
    const fail = (err: Error) => reject(new ArchiveFormatError(`${name}: ${err.message}`));

    zip.on("entry", (entry: Entry) => {
      if (entry.fileName !== name) {
        zip.readEntry();
        return;
      }
      zip.openReadStream(entry, (err, stream) => {
        if (err || !stream) {
          fail(err ?? new Error("no read stream"));
          return;
        }
        const chunks: Buffer[] = [];
        stream.on("data", (chunk: Buffer) => chunks.push(chunk));
        stream.on("end", () => resolve(Buffer.concat(chunks)));
        stream.on("error", fail);
      });
    });
    zip.on("end", () => resolve(undefined));
    zip.on("error", fail);
    zip.readEntry();
  });
}

/**
 * Package document path named by the first rootfile in the container,
 * if there is one.
 */
export async function readRootfile(buffer: Buffer): Promise<string | undefined> {
  const container = await readEntry(buffer, LAYOUT.container);
  if (!container) {
    return undefined;
  }

  const doc = new DOMParser().parseFromString(container.toString("utf8"), "text/xml");
  const rootfile = doc.getElementsByTagName("rootfile").item(0);
  return rootfile?.getAttribute("full-path") || undefined;
}

/**
 * Problems with the marker entry: it must come first, be stored, and
 * hold the media type.
 */
export async function checkMarker(
  buffer: Buffer,
  entries: ArchiveEntry[],
  mediaType: string
): Promise<string[]> {
  const first = entries[0];
  if (!first) {
    return ["archive is empty"];
  }
  if (first.name !== LAYOUT.mimetype) {
    return [`first entry is ${first.name}, not ${LAYOUT.mimetype}`];
  }
  if (first.method !== METHOD_STORED) {
    return [`${LAYOUT.mimetype} is compressed (method ${first.method})`];
  }

  const content = await readEntry(buffer, LAYOUT.mimetype);
  if (content?.toString("utf8") !== mediaType) {
    return [`${LAYOUT.mimetype} does not contain ${mediaType}`];
  }
  return [];
}
