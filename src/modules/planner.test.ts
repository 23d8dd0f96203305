import { describe, it, expect, vi } from "vitest";
import { join } from "node:path";
import {
  plan,
  resolveFrameRange,
  selectFrames,
  filesForFrame,
} from "./planner";
import { createTestContext } from "../testing/helpers";

const TABLE = new Map([
  [152, "2016_07_19_00152.JPG"],
  [150, "2016_07_19_00150.JPG"],
  [151, "2016_07_19_00151.JPG"],
]);

describe("resolveFrameRange", () => {
  it("spans the whole table for all frames", () => {
    expect(resolveFrameRange(TABLE, { allFrames: true })).toEqual({
      start: 150,
      stop: 152,
    });
  });

  it("handles tables larger than the argument limit", () => {
    const large = new Map<number, string>();
    for (let frame = 1; frame <= 200_000; frame++) {
      large.set(frame, `${frame}.JPG`);
    }
    expect(resolveFrameRange(large, { allFrames: true })).toEqual({
      start: 1,
      stop: 200_000,
    });
  });

  it("is null for all frames of an empty table", () => {
    expect(resolveFrameRange(new Map(), { allFrames: true })).toBeNull();
  });

  it("defaults the stop frame to the start frame", () => {
    expect(
      resolveFrameRange(TABLE, { allFrames: false, startFrame: 151 }),
    ).toEqual({ start: 151, stop: 151 });
  });
});

describe("selectFrames", () => {
  it("returns listed frames inside the range in ascending order", () => {
    expect(selectFrames(TABLE, { start: 140, stop: 151 })).toEqual([150, 151]);
  });
});

describe("filesForFrame", () => {
  it("adds metadata for orthos and lidar only", () => {
    expect(filesForFrame("a.JPG", "image")).toEqual(["a.JPG"]);
    expect(filesForFrame("a_DEM.tif", "dem")).toEqual(["a_DEM.tif"]);
    expect(filesForFrame("a.tif", "ortho")).toEqual(["a.tif", "a.tif.xml"]);
    expect(filesForFrame("a.h5", "atm2")).toEqual(["a.h5", "a.h5.xml"]);
  });
});

describe("plan", () => {
  const FOLDER = "https://archive.test/RAW/2016_GR_NASA/07192016_raw";

  it("lists the selected files with their URLs and output paths", async () => {
    const { ctx } = createTestContext({
      output: "/out",
      request: { startFrame: 151, stopFrame: 152 },
    });
    ctx.folder = { type: "image", url: FOLDER };
    ctx.frames = TABLE;

    await plan(ctx);

    expect(ctx.plan).toEqual([
      {
        frame: 151,
        filename: "2016_07_19_00151.JPG",
        url: `${FOLDER}/2016_07_19_00151.JPG`,
        outputPath: join("/out", "2016_07_19_00151.JPG"),
      },
      {
        frame: 152,
        filename: "2016_07_19_00152.JPG",
        url: `${FOLDER}/2016_07_19_00152.JPG`,
        outputPath: join("/out", "2016_07_19_00152.JPG"),
      },
    ]);
    expect(ctx.tracker.getStats().plannedFiles).toBe(2);
  });

  it("warns about range ends missing from the flight", async () => {
    const { ctx } = createTestContext({
      output: "/out",
      request: { startFrame: 100, stopFrame: 150 },
    });
    ctx.folder = { type: "image", url: FOLDER };
    ctx.frames = TABLE;
    const warn = vi.spyOn(ctx.logger, "warn");

    await plan(ctx);

    expect(warn).toHaveBeenCalledWith("Frame 100 is not found in this flight.");
    expect(warn).toHaveBeenCalledTimes(1);
    expect(ctx.plan?.map((f) => f.frame)).toEqual([150]);
  });

  it("plans nothing for an empty flight", async () => {
    const { ctx } = createTestContext({
      output: "/out",
      request: { allFrames: true },
    });
    ctx.folder = { type: "image", url: FOLDER };
    ctx.frames = new Map();
    const warn = vi.spyOn(ctx.logger, "warn");

    await plan(ctx);

    expect(ctx.plan).toEqual([]);
    expect(warn).toHaveBeenCalledWith("No frames to fetch for this flight.");
  });

  it("refuses to run before the indexer", async () => {
    const { ctx } = createTestContext({ output: "/out" });
    await expect(plan(ctx)).rejects.toThrow("Indexer must run before planner");
  });
});
