/**
 * Image Validation
 * Detects truncated or corrupt imagery left behind by interrupted downloads
 */

import { open, type FileHandle } from "fs/promises";
import { extname } from "node:path";

const IMAGE_EXTENSIONS = new Set([".jpg", ".jpeg", ".tif", ".tiff"]);

// Enough to hold a BigTIFF header
const HEADER_SIZE = 16;
const CHUNK_SIZE = 4096;

/**
 * Check if a path names an image the archive serves
 *
 * @example
 * hasImageExtension("2016_07_19_00150.JPG") // true
 * hasImageExtension("DMS_20111012_145559_00156.tif.xml") // false
 */
export function hasImageExtension(filepath: string): boolean {
  return IMAGE_EXTENSIONS.has(extname(filepath).toLowerCase());
}

function isJpeg(header: Buffer): boolean {
  return header[0] === 0xff && header[1] === 0xd8 && header[2] === 0xff;
}

/**
 * A complete JPEG ends with the EOI marker, possibly followed by zero padding
 * of any length. Reads backwards one chunk at a time past the padding.
 */
async function hasJpegEnd(handle: FileHandle, size: number): Promise<boolean> {
  const chunk = Buffer.alloc(CHUNK_SIZE);
  let end = size;

  while (end > 0) {
    const start = Math.max(0, end - CHUNK_SIZE);
    const length = end - start;
    await handle.read(chunk, 0, length, start);

    let last = length;
    while (last > 0 && chunk[last - 1] === 0x00) last--;
    if (last === 0) {
      end = start;
      continue;
    }

    if (chunk[last - 1] !== 0xd9) return false;
    if (last >= 2) return chunk[last - 2] === 0xff;

    // Marker split across two chunks
    if (start === 0) return false;
    const previous = Buffer.alloc(1);
    await handle.read(previous, 0, 1, start - 1);
    return previous[0] === 0xff;
  }

  return false;
}

/**
 * Offset of the first IFD, or null when the header is not TIFF
 */
function tiffFirstIfdOffset(header: Buffer): number | null {
  const order = header.toString("latin1", 0, 2);
  if (order !== "II" && order !== "MM") return null;
  const little = order === "II";

  const version = little ? header.readUInt16LE(2) : header.readUInt16BE(2);
  if (version === 42) {
    return little ? header.readUInt32LE(4) : header.readUInt32BE(4);
  }
  if (version === 43) {
    const offset = little
      ? header.readBigUInt64LE(8)
      : header.readBigUInt64BE(8);
    return Number(offset);
  }
  return null;
}

/**
 * Check that a JPEG or TIFF file is structurally complete
 */
export async function isValidImage(filepath: string): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await open(filepath, "r");
  } catch {
    return false;
  }

  try {
    const { size } = await handle.stat();
    if (size < 8) return false;

    const header = Buffer.alloc(HEADER_SIZE);
    await handle.read(header, 0, Math.min(HEADER_SIZE, size), 0);

    if (isJpeg(header)) {
      return await hasJpegEnd(handle, size);
    }

    const ifdOffset = tiffFirstIfdOffset(header);
    return ifdOffset !== null && ifdOffset >= 8 && ifdOffset < size;
  } catch {
    return false;
  } finally {
    await handle.close();
  }
}
