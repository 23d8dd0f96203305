/**
 * Locator Module
 * Works out which archive folder holds the requested flight
 *
 * Writes to context:
 * - folder: archive type and folder URL, or null when no lidar folder exists
 */

import { getFolderUrl } from "../utils/archive-url";
import { FolderNotFoundError } from "../utils/errors";
import { LIDAR_TYPES } from "../types";
import type { FetchContext, HttpClient } from "../types";

/**
 * Check if an archive folder URL is valid.
 * The archive answers existing folders with 403 or 301 and missing ones
 * with 404.
 */
export async function checkIfUrlExists(
  client: HttpClient,
  url: string,
): Promise<boolean> {
  const status = await client.head(url);
  return status === 403 || status === 301;
}

export async function locate(ctx: FetchContext): Promise<void> {
  const { config, request, client, logger } = ctx;

  if (request.type !== "lidar") {
    ctx.folder = {
      type: request.type,
      url: getFolderUrl(request.date, request.site, request.type, config.archive),
    };
    logger.debug(`Folder URL: ${ctx.folder.url}`);
    return;
  }

  // Lidar can come from one of several collections
  for (const lidar of LIDAR_TYPES) {
    const url = getFolderUrl(request.date, request.site, lidar, config.archive);
    logger.info(`Checking lidar URL: ${url}`);
    if (await checkIfUrlExists(client, url)) {
      logger.info(`Found match with lidar type: ${lidar}`);
      ctx.folder = { type: lidar, url };
      return;
    }
  }

  if (request.requireComplete) {
    logger.warn("Could not find any lidar data for the given date");
    ctx.folder = null;
    return;
  }

  throw new FolderNotFoundError(
    "Could not find any lidar data for the given date",
  );
}
