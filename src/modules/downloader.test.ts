import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { readFile, writeFile, rm } from "fs/promises";
import { join } from "node:path";
import { download, toBatches } from "./downloader";
import { fileExists } from "../utils";
import {
  createTestContext,
  makeTempDir,
  VALID_JPEG,
  TRUNCATED_JPEG,
} from "../testing/helpers";
import type { FetchRequest, PlannedFile } from "../types";

const FOLDER = "https://archive.test/RAW/2016_GR_NASA/07192016_raw";

describe("toBatches", () => {
  it("splits into chunks of the given size", () => {
    expect(toBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(toBatches([], 2)).toEqual([]);
  });
});

describe("download", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function plannedFile(frame: number): PlannedFile {
    const filename = `2016_07_19_00${frame}.JPG`;
    return {
      frame,
      filename,
      url: `${FOLDER}/${filename}`,
      outputPath: join(dir, filename),
    };
  }

  function setup(frames: number[], request: Partial<FetchRequest> = {}) {
    const result = createTestContext({ output: dir, request, batchSize: 1 });
    result.ctx.plan = frames.map(plannedFile);
    return result;
  }

  it("fetches only the missing files, one batch at a time", async () => {
    const { ctx, client } = setup([150, 151, 152]);
    const [first, second, third] = ctx.plan ?? [];
    await writeFile(second.outputPath, VALID_JPEG);
    client.files.set(first.url, VALID_JPEG);
    client.files.set(third.url, VALID_JPEG);

    await download(ctx);

    expect(client.requests).toEqual([`GET ${first.url}`, `GET ${third.url}`]);
    expect(await readFile(third.outputPath)).toEqual(VALID_JPEG);
    expect(ctx.tracker.getStats()).toMatchObject({
      downloadedFiles: 2,
      existingFiles: 1,
      failedFiles: 0,
      batches: 2,
    });
  });

  it("re-fetches empty files", async () => {
    const { ctx, client } = setup([150]);
    const [file] = ctx.plan ?? [];
    await writeFile(file.outputPath, "");
    client.files.set(file.url, VALID_JPEG);

    await download(ctx);

    expect(ctx.tracker.getStats().downloadedFiles).toBe(1);
  });

  it("records failures and carries on", async () => {
    const { ctx, client } = setup([150, 151]);
    const [first, second] = ctx.plan ?? [];
    client.files.set(second.url, VALID_JPEG);

    await download(ctx);

    expect(ctx.tracker.getStats()).toMatchObject({
      downloadedFiles: 1,
      failedFiles: 1,
      batchResults: [
        { index: 1, files: 1, downloaded: 0, failed: 1 },
        { index: 2, files: 1, downloaded: 1, failed: 0 },
      ],
    });
    expect(ctx.tracker.getIssues("download")).toEqual([
      {
        type: "download",
        path: first.outputPath,
        reason: "invalid-response",
        details: `HTTP 404: Not Found (${first.url})`,
      },
    ]);
  });

  it("only lists URLs on a dry run", async () => {
    const { ctx, client } = setup([150, 151], { dryRun: true });
    const info = vi.spyOn(ctx.logger, "info");

    await download(ctx);

    expect(client.requests).toEqual([]);
    expect(ctx.tracker.getStats().batchResults).toEqual([
      { index: 1, files: 1, downloaded: 0, failed: 0 },
      { index: 2, files: 1, downloaded: 0, failed: 0 },
    ]);
    expect(info).toHaveBeenCalledWith("Batch 1/2: 1 file(s)");
    expect(info).toHaveBeenCalledWith(`  ${FOLDER}/2016_07_19_00151.JPG`);
    expect(await fileExists(join(dir, "2016_07_19_00150.JPG"))).toBe(false);
  });

  it("wipes and re-fetches a broken image when completeness is required", async () => {
    const { ctx, client } = setup([150], { requireComplete: true });
    const [file] = ctx.plan ?? [];
    await writeFile(file.outputPath, TRUNCATED_JPEG);
    client.files.set(file.url, VALID_JPEG);

    await download(ctx);

    expect(await readFile(file.outputPath)).toEqual(VALID_JPEG);
    expect(ctx.tracker.getStats()).toMatchObject({
      wipedFiles: 1,
      downloadedFiles: 1,
    });
  });

  it("keeps a broken image when completeness is not required", async () => {
    const { ctx, client } = setup([150]);
    const [file] = ctx.plan ?? [];
    await writeFile(file.outputPath, TRUNCATED_JPEG);

    await download(ctx);

    expect(client.requests).toEqual([]);
    expect(ctx.tracker.getStats().existingFiles).toBe(1);
  });

  it("reports when everything is already present", async () => {
    const { ctx } = setup([]);
    const info = vi.spyOn(ctx.logger, "info");

    await download(ctx);

    expect(info).toHaveBeenCalledWith("All requested files are already present.");
    expect(ctx.tracker.getStats().batches).toBe(0);
  });
});
