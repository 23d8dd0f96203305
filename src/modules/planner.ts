/**
 * Planner Module
 * Selects the requested frame range from the frame table and lists the
 * files to fetch for it
 *
 * Writes to context:
 * - plan: every file the run needs, in ascending frame order
 */

import { join } from "node:path";
import { getFileUrl } from "../utils/archive-url";
import type {
  ArchiveType,
  FetchContext,
  FetchRequest,
  FrameTable,
  PlannedFile,
  ResolvedFolder,
} from "../types";
import { isLidarType } from "../types";

export interface FrameRange {
  start: number;
  stop: number;
}

/**
 * Frame range to fetch, or null when nothing can be selected
 */
export function resolveFrameRange(
  table: FrameTable,
  request: Pick<FetchRequest, "allFrames" | "startFrame" | "stopFrame">,
): FrameRange | null {
  if (request.allFrames) {
    let range: FrameRange | null = null;
    for (const frame of table.keys()) {
      if (!range) {
        range = { start: frame, stop: frame };
      } else {
        range.start = Math.min(range.start, frame);
        range.stop = Math.max(range.stop, frame);
      }
    }
    return range;
  }

  if (request.startFrame === undefined) return null;
  return {
    start: request.startFrame,
    stop: request.stopFrame ?? request.startFrame,
  };
}

/**
 * Frames of the table inside the range, ascending
 */
export function selectFrames(table: FrameTable, range: FrameRange): number[] {
  return [...table.keys()]
    .filter((frame) => frame >= range.start && frame <= range.stop)
    .sort((a, b) => a - b);
}

/**
 * Files fetched for one listed file. Orthos and lidar come with metadata.
 *
 * @example
 * filesForFrame("DMS_20111012_145559_00156.tif", "ortho")
 * // ["DMS_20111012_145559_00156.tif", "DMS_20111012_145559_00156.tif.xml"]
 */
export function filesForFrame(filename: string, type: ArchiveType): string[] {
  const hasMetadata = type === "ortho" || isLidarType(type);
  return hasMetadata ? [filename, `${filename}.xml`] : [filename];
}

export function buildPlan(
  table: FrameTable,
  range: FrameRange,
  folder: ResolvedFolder,
  output: string,
): PlannedFile[] {
  const plan: PlannedFile[] = [];

  for (const frame of selectFrames(table, range)) {
    const listed = table.get(frame);
    if (!listed) continue;

    for (const filename of filesForFrame(listed, folder.type)) {
      plan.push({
        frame,
        filename,
        url: getFileUrl(folder.url, filename),
        outputPath: join(output, filename),
      });
    }
  }

  return plan;
}

export async function plan(ctx: FetchContext): Promise<void> {
  if (ctx.folder === undefined || !ctx.frames) {
    throw new Error("Indexer must run before planner");
  }

  const { request, logger, tracker, folder, frames } = ctx;

  if (folder === null) {
    ctx.plan = [];
    return;
  }

  const range = resolveFrameRange(frames, request);
  if (!range) {
    logger.warn("No frames to fetch for this flight.");
    ctx.plan = [];
    return;
  }

  // Not every requested frame has to exist; fetch what is there
  if (!frames.has(range.start)) {
    logger.warn(`Frame ${range.start} is not found in this flight.`);
  }
  if (range.stop !== range.start && !frames.has(range.stop)) {
    logger.warn(`Frame ${range.stop} is not found in this flight.`);
  }

  ctx.plan = buildPlan(frames, range, folder, request.output);
  tracker.setPlannedFiles(ctx.plan.length);
  logger.debug(
    `Planned ${ctx.plan.length} files for frames ${range.start}-${range.stop}`,
  );
}
