import { describe, it, expect, vi } from "vitest";
import { locate, checkIfUrlExists } from "./locator";
import { FolderNotFoundError } from "../utils/errors";
import { FakeHttpClient } from "../testing/fake-http-client";
import { createTestContext } from "../testing/helpers";

describe("checkIfUrlExists", () => {
  it.each([
    [403, true],
    [301, true],
    [404, false],
    [200, false],
  ])("treats status %i as exists=%s", async (status, exists) => {
    const client = new FakeHttpClient();
    client.heads.set("https://archive.test/x", status);
    expect(await checkIfUrlExists(client, "https://archive.test/x")).toBe(
      exists,
    );
  });
});

describe("locate", () => {
  it("builds image folders without asking the archive", async () => {
    const { ctx, client } = createTestContext({ output: "/out" });

    await locate(ctx);

    expect(ctx.folder).toEqual({
      type: "image",
      url: "https://archive.test/RAW/2016_GR_NASA/07192016_raw",
    });
    expect(client.requests).toEqual([]);
  });

  it("probes lidar collections in order until one exists", async () => {
    const { ctx, client } = createTestContext({
      output: "/out",
      request: { type: "lidar", site: undefined, allFrames: true },
    });
    client.heads.set("https://archive.test/ATM1/2016.07.19", 403);
    client.heads.set("https://archive.test/ATM2/2016.07.19", 403);

    await locate(ctx);

    expect(ctx.folder).toEqual({
      type: "atm1",
      url: "https://archive.test/ATM1/2016.07.19",
    });
    expect(client.requests).toEqual([
      "HEAD https://archive.test/LVIS/2016.07.19",
      "HEAD https://archive.test/ATM1/2016.07.19",
    ]);
  });

  it("fails when no lidar collection has the date", async () => {
    const { ctx } = createTestContext({
      output: "/out",
      request: { type: "lidar", allFrames: true },
    });

    await expect(locate(ctx)).rejects.toThrow(FolderNotFoundError);
  });

  it("settles for no folder when completeness is required", async () => {
    const { ctx } = createTestContext({
      output: "/out",
      request: { type: "lidar", allFrames: true, requireComplete: true },
    });
    const warn = vi.spyOn(ctx.logger, "warn");

    await locate(ctx);

    expect(ctx.folder).toBeNull();
    expect(warn).toHaveBeenCalledWith(
      "Could not find any lidar data for the given date",
    );
  });
});
