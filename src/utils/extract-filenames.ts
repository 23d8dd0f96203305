/**
 * Extract data filenames from an archive folder listing
 */

import * as cheerio from "cheerio";
import type { ArchiveType } from "../types";

// A link's text must match the whole pattern
export const FILENAME_PATTERNS: Record<ArchiveType, RegExp> = {
  image: /^[0-9_]*\.JPG$/i,
  ortho: /^DMS\w*\.tif$/i,
  dem: /^IODMS\w*DEM\.tif$/i,
  lvis: /^ILVIS\w+\.TXT$/i,
  atm1: /^ILATM1B[0-9_]*\.ATM4\w+\.qi$/i,
  atm2: /^ILATM1B[0-9_]*\.ATM\w+\.h5$/i,
};

/**
 * Find the files of one archive type linked from an index page.
 * Each name is returned once, in listing order.
 */
export function extractFilenames(html: string, type: ArchiveType): string[] {
  const $ = cheerio.load(html);
  const pattern = FILENAME_PATTERNS[type];
  const seen = new Set<string>();
  const filenames: string[] = [];

  $("a").each((_, element) => {
    const name = $(element).text().trim();
    if (!pattern.test(name) || seen.has(name)) return;
    seen.add(name);
    filenames.push(name);
  });

  return filenames;
}
