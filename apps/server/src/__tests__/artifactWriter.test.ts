import { afterEach, describe, expect, it } from "vitest";
import { existsSync } from "fs";
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { ArtifactWriter, serializeArtifact } from "../output/artifactWriter";
import { fakeResult } from "./fixtures";

describe("artifact writer", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("serializes with non-finite numbers as null", () => {
    const result = { ...fakeResult("SPY"), skew_dict: { "1M": { "100": NaN, "110": 11.2 } } };
    expect(JSON.parse(serializeArtifact(result)).skew_dict).toEqual({ "1M": { "100": null, "110": 11.2 } });
  });

  it("writes <symbol>.json, creating the directory", async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "artifacts-"));
    const writer = new ArtifactWriter(path.join(dir, "nested", "out"));

    const file = await writer.write("SPX", fakeResult("^SPX"));

    expect(file).toBe(path.join(dir, "nested", "out", "SPX.json"));
    const parsed = JSON.parse(await readFile(file, "utf-8"));
    expect(Object.keys(parsed)).toEqual(["ticker", "start_date", "data_dict", "skew_dict", "skew_data"]);
    expect(parsed.ticker).toBe("^SPX");
  });

  it("refuses file names that leave its directory", async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "artifacts-"));
    const writer = new ArtifactWriter(path.join(dir, "out"));

    await expect(writer.write("../escaped", fakeResult("X"))).rejects.toThrow(
      `refusing to write ../escaped.json outside ${path.join(dir, "out")}`
    );
    expect(existsSync(path.join(dir, "escaped.json"))).toBe(false);
  });
});
