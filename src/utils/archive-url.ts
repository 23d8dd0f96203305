/**
 * Archive URL Utilities
 * Builds the folder URLs under which each flight's files are listed
 */

import type {
  ArchiveConfig,
  ArchiveType,
  Site,
  SurveyDate,
} from "../types";

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Join URL segments with single slashes
 *
 * @example
 * joinUrl("https://host/base/", "2011.10.18") // "https://host/base/2011.10.18"
 */
export function joinUrl(base: string, ...segments: string[]): string {
  let url = base.replace(/\/+$/, "");
  for (const segment of segments) {
    url += "/" + segment.replace(/^\/+|\/+$/g, "");
  }
  return url;
}

/**
 * Year folder, only used for raw images
 *
 * @example
 * makeYearFolder(2016, "GR") // "2016_GR_NASA"
 */
export function makeYearFolder(year: number, site: Site): string {
  return `${year}_${site}_NASA`;
}

/**
 * Date folder for an archive type
 *
 * @example
 * makeDateFolder({ year: 2016, month: 7, day: 19 }, "image") // "07192016_raw"
 * makeDateFolder({ year: 2016, month: 7, day: 19 }, "dem") // "2016.07.19"
 */
export function makeDateFolder(date: SurveyDate, type: ArchiveType): string {
  const { year, month, day } = date;
  if (type === "image") {
    return `${pad(month, 2)}${pad(day, 2)}${pad(year, 4)}_raw`;
  }
  return `${pad(year, 4)}.${pad(month, 2)}.${pad(day, 2)}`;
}

/**
 * Full URL of the folder holding a flight's files
 */
export function getFolderUrl(
  date: SurveyDate,
  site: Site | undefined,
  type: ArchiveType,
  archive: ArchiveConfig,
): string {
  const dateFolder = makeDateFolder(date, type);

  if (type === "image") {
    if (!site) {
      throw new Error("A site is required to locate raw images");
    }
    return joinUrl(archive.image, makeYearFolder(date.year, site), dateFolder);
  }

  return joinUrl(archive[type], dateFolder);
}

export function getFileUrl(folderUrl: string, filename: string): string {
  return joinUrl(folderUrl, filename);
}
