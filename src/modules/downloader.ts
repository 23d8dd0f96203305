/**
 * Downloader Module
 * Fetches the planned files that are not already on disk, in batches
 *
 * There is no retry: a failed file is recorded and the run can simply be
 * repeated, which only fetches what is still missing.
 */

import { rm } from "fs/promises";
import {
  hasImageExtension,
  isValidImage,
  nonEmptyFileExists,
} from "../utils";
import type { FetchContext, PlannedFile } from "../types";

/**
 * Split a list into consecutive chunks of at most `size` items
 */
export function toBatches<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export async function download(ctx: FetchContext): Promise<void> {
  if (!ctx.plan) {
    throw new Error("Planner must run before downloader");
  }

  const { config, request, client, logger, tracker, plan } = ctx;

  // ============================================================================
  // Find what is missing
  // ============================================================================

  const missing: PlannedFile[] = [];

  for (const file of plan) {
    // Something that killed a previous download may have left a broken image
    if (
      request.requireComplete &&
      hasImageExtension(file.outputPath) &&
      (await nonEmptyFileExists(file.outputPath)) &&
      !(await isValidImage(file.outputPath))
    ) {
      await rm(file.outputPath, { force: true });
      tracker.trackWiped(file.outputPath);
      logger.info(`Wiped invalid image: ${file.outputPath}`);
    }

    if (await nonEmptyFileExists(file.outputPath)) {
      tracker.incrementExisting();
      continue;
    }

    missing.push(file);
  }

  if (missing.length === 0) {
    logger.info("All requested files are already present.");
    return;
  }

  // ============================================================================
  // Fetch in batches
  // ============================================================================

  const batches = toBatches(missing, config.download.batchSize);

  for (const [index, batch] of batches.entries()) {
    logger.info(
      `Batch ${index + 1}/${batches.length}: ${batch.length} file(s)`,
    );

    if (request.dryRun) {
      for (const file of batch) {
        logger.info(`  ${file.url}`);
      }
      tracker.trackBatch({
        index: index + 1,
        files: batch.length,
        downloaded: 0,
        failed: 0,
      });
      continue;
    }

    logger.info(`Saving the data in ${request.output}`);
    let failed = 0;

    for (const file of batch) {
      try {
        const bytes = await client.download(file.url, file.outputPath);
        tracker.incrementDownloaded();
        logger.debug(`Fetched ${file.filename} (${bytes} bytes)`);
      } catch (error) {
        failed++;
        tracker.incrementFailed();
        tracker.trackError(file.outputPath, error, "download");
        logger.warn(
          `Failed to fetch ${file.url}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    const result = {
      index: index + 1,
      files: batch.length,
      downloaded: batch.length - failed,
      failed,
    };
    tracker.trackBatch(result);
    logger.debug(
      `Batch ${result.index} done: ${result.downloaded} fetched, ${result.failed} failed`,
    );
  }
}
