/**
 * Shared fixtures for tests
 */

import { mkdtemp } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Logger, Tracker } from "../utils";
import { FakeHttpClient } from "./fake-http-client";
import type { ArchiveConfig, FetchConfig, FetchContext, FetchRequest } from "../types";

export const TEST_ARCHIVE: ArchiveConfig = {
  image: "https://archive.test/RAW",
  ortho: "https://archive.test/ORTHO",
  dem: "https://archive.test/DEM",
  lvis: "https://archive.test/LVIS/",
  atm1: "https://archive.test/ATM1/",
  atm2: "https://archive.test/ATM2/",
};

// Smallest files isValidImage accepts (and one it rejects)
export const VALID_JPEG = Buffer.from([
  0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0xff, 0xd9,
]);
export const TRUNCATED_JPEG = Buffer.from([
  0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46,
]);
export const VALID_TIFF = Buffer.from([
  0x49, 0x49, 0x2a, 0x00, 0x08, 0x00, 0x00, 0x00,
  0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
]);

export function createTestConfig(batchSize = 100): FetchConfig {
  return {
    archive: { ...TEST_ARCHIVE },
    auth: { netrcPath: "~/.netrc", cookiePath: "~/.urs_cookies" },
    download: { batchSize, timeout: 1000, userAgent: "test-agent" },
    logging: { level: "error" },
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "aerial-survey-fetch-"));
}

export function createTestContext(options: {
  output: string;
  request?: Partial<FetchRequest>;
  batchSize?: number;
}): { ctx: FetchContext; client: FakeHttpClient } {
  const client = new FakeHttpClient();
  const ctx: FetchContext = {
    config: createTestConfig(options.batchSize),
    request: {
      date: { year: 2016, month: 7, day: 19 },
      site: "GR",
      type: "image",
      output: options.output,
      allFrames: false,
      dryRun: false,
      requireComplete: false,
      refetchIndex: false,
      ...options.request,
    },
    client,
    logger: new Logger("error"),
    tracker: new Tracker(),
  };
  return { ctx, client };
}
