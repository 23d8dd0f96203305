/**
 * Verifier Module
 * Makes sure every planned file arrived intact before the output is used
 */

import { rm } from "fs/promises";
import {
  hasImageExtension,
  isValidImage,
  nonEmptyFileExists,
} from "../utils";
import { IncompleteFetchError, InvalidImageError } from "../utils/errors";
import type { FetchContext } from "../types";

/**
 * @throws IncompleteFetchError for the first missing or empty file
 * @throws InvalidImageError for the first corrupt image, after deleting it
 */
export async function verify(ctx: FetchContext): Promise<void> {
  if (!ctx.plan) {
    throw new Error("Planner must run before verifier");
  }

  const { request, logger, tracker, plan } = ctx;

  if (!request.requireComplete) return;

  if (request.dryRun) {
    logger.info("Dry run: skipping verification.");
    return;
  }

  for (const file of plan) {
    if (!(await nonEmptyFileExists(file.outputPath))) {
      tracker.trackValidation(file.outputPath, "missing-file");
      throw new IncompleteFetchError(file.outputPath);
    }

    if (!hasImageExtension(file.outputPath)) continue;

    if (!(await isValidImage(file.outputPath))) {
      await rm(file.outputPath, { force: true });
      tracker.trackValidation(file.outputPath, "invalid-image");
      throw new InvalidImageError(file.outputPath);
    }

    logger.debug(`Found valid image: ${file.outputPath}`);
  }

  logger.info(`Verified ${plan.length} file(s).`);
}
