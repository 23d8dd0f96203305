/**
 * Indexer Module
 * Fetches the folder's HTML index and reduces it to a frame table
 *
 * The table is cached beside the index; a non-empty cached table is reused
 * without touching the network unless a refetch is requested.
 *
 * Writes to context:
 * - frames: frame number -> filename
 */

import { join } from "node:path";
import { rm, writeFile, mkdir } from "fs/promises";
import {
  nonEmptyFileExists,
  extractFilenames,
  buildFrameTable,
  loadFrameTable,
  saveFrameTable,
} from "../utils";
import { HttpError, IncompleteFetchError } from "../utils/errors";
import type {
  ArchiveType,
  FetchContext,
  FrameTable,
  ResolvedFolder,
} from "../types";

// Missing tables for these types are only reported, not fatal
const OPTIONAL_TYPES: ArchiveType[] = ["dem", "lvis", "atm1", "atm2"];

export function getIndexPaths(
  output: string,
  type: ArchiveType,
): { indexPath: string; tablePath: string } {
  const indexPath = join(output, `${type}_index.html`);
  return { indexPath, tablePath: `${indexPath}.csv` };
}

/**
 * Download the index page and write its frame table.
 * An HTTP error leaves no table behind and is tracked as a resource issue.
 */
async function fetchAndParseIndex(
  ctx: FetchContext,
  folder: ResolvedFolder,
  indexPath: string,
  tablePath: string,
): Promise<void> {
  const { request, client, logger, tracker } = ctx;

  logger.info(`Fetching index ${folder.url}`);
  let html: string;
  try {
    html = await client.getText(folder.url);
  } catch (error) {
    // A flight without data for this type answers with an error page
    if (!(error instanceof HttpError)) throw error;
    logger.warn(`Could not fetch index: ${error.message}`);
    tracker.trackError(folder.url, error, "resource");
    return;
  }

  await mkdir(request.output, { recursive: true });
  await writeFile(indexPath, html, "utf-8");

  logger.info("Extracting file name list from index.html file...");
  const filenames = extractFilenames(html, folder.type);
  await saveFrameTable(tablePath, buildFrameTable(filenames));
  logger.debug(`Found ${filenames.length} files in the index`);
}

export async function indexer(ctx: FetchContext): Promise<void> {
  if (ctx.folder === undefined) {
    throw new Error("Locator must run before indexer");
  }

  const { request, logger } = ctx;
  const folder = ctx.folder;

  if (folder === null) {
    ctx.frames = new Map();
    return;
  }

  const { indexPath, tablePath } = getIndexPaths(request.output, folder.type);

  if (request.refetchIndex) {
    await rm(indexPath, { force: true });
    await rm(tablePath, { force: true });
  }

  if (await nonEmptyFileExists(tablePath)) {
    logger.info(`Already have the index file ${indexPath}, keeping it.`);
  } else {
    await fetchAndParseIndex(ctx, folder, indexPath, tablePath);
  }

  const hasTable = await nonEmptyFileExists(tablePath);

  if (!hasTable && request.requireComplete) {
    if (!OPTIONAL_TYPES.includes(folder.type)) {
      throw new IncompleteFetchError(tablePath);
    }
    logger.warn(`Missing index file: ${tablePath}`);
  }

  let frames: FrameTable = new Map();
  if (hasTable) {
    logger.info(`Reading file list from ${tablePath}`);
    frames = await loadFrameTable(tablePath);
  }

  ctx.frames = frames;
}
