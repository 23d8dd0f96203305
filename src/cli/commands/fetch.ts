/**
 * Fetch command - Validates the request, loads config and runs the pipeline
 */

import path from "node:path";
import { mkdir } from "fs/promises";
import ora from "ora";
import { z } from "zod";
import {
  loadConfig,
  assertCredentials,
  createArchiveClient,
  Logger,
  Tracker,
} from "../../utils";
import { FetchError, UsageError } from "../../utils/errors";
import * as modules from "../../modules";
import { DATA_TYPES, SITES } from "../../types";
import type {
  DataType,
  FetchContext,
  FetchRequest,
  Site,
  SurveyDate,
} from "../../types";

const FetchOptionsSchema = z.object({
  year: z.coerce.number().int().positive().optional(),
  month: z.coerce.number().int().min(1).max(12).optional(),
  day: z.coerce.number().int().min(1).max(31).optional(),
  yyyymmdd: z
    .string()
    .regex(/^\d{8}$/, "Expected a date as YYYYMMDD")
    .optional(),
  site: z.string().optional(),
  startFrame: z.coerce.number().int().nonnegative().optional(),
  stopFrame: z.coerce.number().int().nonnegative().optional(),
  allFrames: z.boolean().optional(),
  type: z.string().optional(),
  dryRun: z.boolean().optional(),
  requireComplete: z.boolean().optional(),
  refetchIndex: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type FetchOptions = z.infer<typeof FetchOptionsSchema>;

function isDataType(value: string): value is DataType {
  return DATA_TYPES.some((type) => type === value);
}

function isSite(value: string): value is Site {
  return SITES.some((site) => site === value);
}

function resolveDate(options: FetchOptions): SurveyDate {
  if (options.yyyymmdd) {
    const text = options.yyyymmdd;
    return {
      year: parseInt(text.slice(0, 4), 10),
      month: parseInt(text.slice(4, 6), 10),
      day: parseInt(text.slice(6, 8), 10),
    };
  }

  const { year, month, day } = options;
  if (year === undefined || month === undefined || day === undefined) {
    throw new UsageError("Year, month, and day must be provided.");
  }
  return { year, month, day };
}

/**
 * Turn raw CLI options into a fetch request
 * @throws UsageError describing the first problem found
 */
export function parseFetchRequest(
  output: string,
  opts: unknown,
): { request: FetchRequest; options: FetchOptions } {
  const parsed = FetchOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `--${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new UsageError(details);
  }
  const options = parsed.data;

  const date = resolveDate(options);
  if (
    date.year < 1 ||
    date.month < 1 ||
    date.month > 12 ||
    date.day < 1 ||
    date.day > 31
  ) {
    throw new UsageError(`Invalid date: ${date.year}-${date.month}-${date.day}`);
  }

  const type = (options.type ?? "image").toLowerCase();
  if (!isDataType(type)) {
    throw new UsageError(`Type must be one of: ${DATA_TYPES.join(", ")}.`);
  }

  // Only raw images are filed by site; other types ignore it
  const upper = options.site?.toUpperCase();
  const site: Site | undefined = upper && isSite(upper) ? upper : undefined;
  if (type === "image") {
    if (upper === undefined) {
      throw new UsageError("Site must be AN or GR for images.");
    }
    if (!site) {
      throw new UsageError(`Site must be one of: ${SITES.join(", ")}.`);
    }
  }

  // Lidar is always fetched whole
  const allFrames = type === "lidar" || (options.allFrames ?? false);

  if (!allFrames && options.startFrame === undefined) {
    throw new UsageError("Provide --start-frame or --all-frames.");
  }

  const startFrame = options.startFrame;
  const stopFrame = options.stopFrame ?? startFrame;
  if (
    !allFrames &&
    startFrame !== undefined &&
    stopFrame !== undefined &&
    stopFrame < startFrame
  ) {
    throw new UsageError(
      `Stop frame ${stopFrame} comes before start frame ${startFrame}.`,
    );
  }

  return {
    request: {
      date,
      site,
      type,
      output: path.resolve(output),
      startFrame,
      stopFrame,
      allFrames,
      dryRun: options.dryRun ?? false,
      requireComplete: options.requireComplete ?? false,
      refetchIndex: options.refetchIndex ?? false,
    },
    options,
  };
}

export async function fetchCommand(output: string, opts: unknown): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 });
  let logger = new Logger();

  try {
    const { request, options } = parseFetchRequest(output, opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);
    logger = new Logger(options.verbose ? "debug" : config.logging.level);

    const tracker = new Tracker();
    for (const err of errors) {
      logger.warn(`Ignoring invalid config file ${err.path}`);
      tracker.trackError(err.path, err.error, "resource");
    }

    await assertCredentials(config.auth);

    logger.info(`Creating output folder: ${request.output}`);
    await mkdir(request.output, { recursive: true });

    const client = await createArchiveClient(config.auth, config.download);

    const ctx: FetchContext = {
      config,
      request,
      client,
      logger,
      tracker,
    };

    spinner.start();
    logger.attach(spinner);

    try {
      spinner.text = "Locating archive folder...";
      await modules.locate(ctx);

      spinner.text = "Reading folder index...";
      await modules.indexer(ctx);

      spinner.text = "Planning frames...";
      await modules.plan(ctx);

      spinner.text = request.dryRun ? "Listing batches..." : "Downloading...";
      await modules.download(ctx);

      spinner.text = "Verifying files...";
      await modules.verify(ctx);
    } finally {
      // Failed runs keep their report too
      await client.flush();
      await tracker.exportStats(request.output);
    }

    spinner.stop();
    logger.attach(null);

    await modules.stats(ctx, options.verbose);

    if (tracker.getStats().failedFiles > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    logger.attach(null);
    if (error instanceof FetchError) {
      spinner.fail(error.message);
    } else {
      spinner.fail("Fetch failed");
      console.error(error);
    }
    process.exit(1);
  }
}
