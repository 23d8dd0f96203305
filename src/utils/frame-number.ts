import { FrameNumberError } from "./errors";

// Order matters: DEM names also contain "DMS"
const FRAME_PATTERNS: RegExp[] = [
  // IODMS3_20111018_14295436_00347_DEM.tif
  /^.*?IODMS[a-z0-9]*?_\d+_\d+_(\d+).*?\.tif$/i,
  // DMS_1000109_03939_20091016_18310055.tif
  /^.*?DMS_\d+_(\d+)_\d+_\d+\.tif$/i,
  // DMS_20111012_145559_00156.tif
  /^.*?DMS_\d+_\d+_(\d+)\..*$/i,
  // 2016_07_19_00150.JPG
  /^.*?\d+_\d+_\d+_(\d+)\.jpg$/i,
  // ILVIS2_AQ2015_0929_R1605_060226.TXT
  /^.*?ILVIS.*_(\d+)\.txt$/i,
  // ILATM1B_20091016_165112.atm4cT3.qi, ILATM1B_20160713_195419.ATM5BT5.h5
  /^.*?ILATM1B_\d+_(\d+)\.atm.*?\.(qi|h5)$/i,
];

/**
 * Derive the frame number from an archive filename. For lidar files the
 * "frame" is the time of day encoded in the name.
 *
 * @example
 * getFrameNumberFromFilename("2016_07_19_00150.JPG") // 150
 * getFrameNumberFromFilename("ILATM1B_20091016_165112.atm4cT3.qi") // 165112
 */
export function getFrameNumberFromFilename(filename: string): number {
  for (const pattern of FRAME_PATTERNS) {
    const match = filename.match(pattern);
    if (match) {
      return parseInt(match[1], 10);
    }
  }
  throw new FrameNumberError(filename);
}
