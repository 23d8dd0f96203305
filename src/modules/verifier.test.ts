import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFile, rm } from "fs/promises";
import { join } from "node:path";
import { verify } from "./verifier";
import { fileExists } from "../utils";
import { IncompleteFetchError, InvalidImageError } from "../utils/errors";
import {
  createTestContext,
  makeTempDir,
  VALID_TIFF,
  TRUNCATED_JPEG,
} from "../testing/helpers";
import type { FetchRequest } from "../types";

describe("verify", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function setup(filenames: string[], request: Partial<FetchRequest> = {}) {
    const { ctx } = createTestContext({
      output: dir,
      request: { requireComplete: true, ...request },
    });
    ctx.plan = filenames.map((filename, frame) => ({
      frame,
      filename,
      url: `https://archive.test/ORTHO/2016.07.19/${filename}`,
      outputPath: join(dir, filename),
    }));
    return ctx;
  }

  it("accepts valid images and their metadata", async () => {
    const ctx = setup(["a.tif", "a.tif.xml"]);
    await writeFile(join(dir, "a.tif"), VALID_TIFF);
    await writeFile(join(dir, "a.tif.xml"), "<metadata/>");

    await expect(verify(ctx)).resolves.toBeUndefined();
    expect(ctx.tracker.getIssues()).toEqual([]);
  });

  it("fails on a missing file", async () => {
    const ctx = setup(["a.tif"]);
    const missing = join(dir, "a.tif");

    await expect(verify(ctx)).rejects.toThrow(new IncompleteFetchError(missing));
    expect(ctx.tracker.getIssues("validation")).toEqual([
      { type: "validation", path: missing, reason: "missing-file" },
    ]);
  });

  it("wipes a corrupt image and fails", async () => {
    const ctx = setup(["a.JPG"]);
    const broken = join(dir, "a.JPG");
    await writeFile(broken, TRUNCATED_JPEG);

    await expect(verify(ctx)).rejects.toBeInstanceOf(InvalidImageError);
    expect(await fileExists(broken)).toBe(false);
  });

  it("checks nothing unless completeness is required", async () => {
    const ctx = setup(["a.tif"], { requireComplete: false });
    await expect(verify(ctx)).resolves.toBeUndefined();
  });

  it("checks nothing on a dry run", async () => {
    const ctx = setup(["a.tif"], { dryRun: true });
    await expect(verify(ctx)).resolves.toBeUndefined();
  });
});
