/**
 * Archive-related type definitions
 */

/**
 * Data types a user can request
 */
export const DATA_TYPES = ["image", "ortho", "dem", "lidar"] as const;
export type DataType = (typeof DATA_TYPES)[number];

/**
 * Lidar collections, probed in this order
 */
export const LIDAR_TYPES = ["lvis", "atm1", "atm2"] as const;
export type LidarType = (typeof LIDAR_TYPES)[number];

export function isLidarType(type: string): type is LidarType {
  return LIDAR_TYPES.some((lidar) => lidar === type);
}

/**
 * What an archive folder actually holds. "lidar" resolves to one of the
 * lidar collections once the archive has been probed.
 */
export type ArchiveType = Exclude<DataType, "lidar"> | LidarType;

export const SITES = ["AN", "GR"] as const;
export type Site = (typeof SITES)[number];

export interface SurveyDate {
  year: number;
  month: number;
  day: number;
}

/**
 * Archive folder the run reads from
 */
export interface ResolvedFolder {
  type: ArchiveType;
  url: string;
}

/**
 * Frame number -> filename, as listed in the folder index
 */
export type FrameTable = Map<number, string>;

export interface PlannedFile {
  frame: number;
  filename: string;
  url: string;
  outputPath: string;
}
