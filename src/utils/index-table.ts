/**
 * Frame Table Persistence
 * Reads and writes the "<frame>, <filename>" table parsed from a folder index
 */

import { readFile, writeFile, mkdir } from "fs/promises";
import { dirname } from "node:path";
import { getFrameNumberFromFilename } from "./frame-number";
import type { FrameTable } from "../types";

/**
 * Build a frame table from listed filenames.
 * A later file with the same frame replaces the earlier one.
 */
export function buildFrameTable(filenames: string[]): FrameTable {
  const table: FrameTable = new Map();
  for (const filename of filenames) {
    table.set(getFrameNumberFromFilename(filename), filename);
  }
  return table;
}

export function serializeFrameTable(table: FrameTable): string {
  let text = "";
  for (const [frame, filename] of table) {
    text += `${frame}, ${filename}\n`;
  }
  return text;
}

/**
 * @throws Error on a line without a comma or with a non-numeric frame
 */
export function parseFrameTable(text: string): FrameTable {
  const table: FrameTable = new Map();

  text.split(/\r?\n/).forEach((line, index) => {
    if (!line.trim()) return;

    const comma = line.indexOf(",");
    const frameText = comma >= 0 ? line.slice(0, comma).trim() : "";
    const filename = comma >= 0 ? line.slice(comma + 1).trim() : "";

    if (!/^\d+$/.test(frameText) || !filename) {
      throw new Error(`Malformed frame table line ${index + 1}: "${line}"`);
    }

    table.set(parseInt(frameText, 10), filename);
  });

  return table;
}

export async function loadFrameTable(filepath: string): Promise<FrameTable> {
  const content = await readFile(filepath, "utf-8");
  return parseFrameTable(content);
}

/**
 * Save a frame table, creating the directory if needed
 */
export async function saveFrameTable(
  filepath: string,
  table: FrameTable,
): Promise<void> {
  await mkdir(dirname(filepath), { recursive: true });
  await writeFile(filepath, serializeFrameTable(table), "utf-8");
}
