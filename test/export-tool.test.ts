import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import {
  parseEventBound,
  parseMaxCount,
  runExportTool,
} from "../src/worldmap/exportTool.js";
import { fullMapBuilder, sampleMapBuilder } from "./support/maps.js";

async function existsPath(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

async function readJson(p: string): Promise<unknown> {
  return JSON.parse(await readFile(p, "utf8")) as unknown;
}

describe("runExportTool", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "worldmap-export-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
    await rm(`${dir}__json`, { recursive: true, force: true });
  });

  it("writes <name>.json next to a single input file", async () => {
    const input = path.join(dir, "WorldMap.dat");
    await writeFile(input, fullMapBuilder().toBuffer());

    const summary = await runExportTool(input, {});

    expect(summary).toEqual({ processed: 1, written: 1, skipped: 0 });
    expect(await readJson(path.join(dir, "WorldMap.json"))).toMatchObject({
      schema: "worldMapTools.worldmap.json.v1",
      trailingBytes: 0,
      map: { version: 1, tilesCount: 2, mapChipData: [5, 9] },
    });
  });

  it("skips an existing output unless overwrite is set", async () => {
    const input = path.join(dir, "a.dat");
    const out = path.join(dir, "custom.json");
    await writeFile(input, sampleMapBuilder().toBuffer());
    await writeFile(out, "keep", "utf8");

    expect(await runExportTool(input, { out })).toEqual({ processed: 1, written: 0, skipped: 1 });
    expect(await readFile(out, "utf8")).toBe("keep");

    expect(await runExportTool(input, { out, overwrite: true })).toEqual({
      processed: 1,
      written: 1,
      skipped: 0,
    });
    expect(await readJson(out)).toMatchObject({ endOffset: 68 });
  });

  it("converts every .dat file of a directory into a mirrored output tree", async () => {
    await mkdir(path.join(dir, "sub"));
    await writeFile(path.join(dir, "a.dat"), sampleMapBuilder().toBuffer());
    await writeFile(path.join(dir, "sub", "B.DAT"), fullMapBuilder().toBuffer());
    await writeFile(path.join(dir, "notes.txt"), "not a map", "utf8");

    const flat = await runExportTool(dir, {});
    expect(flat).toEqual({ processed: 1, written: 1, skipped: 0 });

    const deep = await runExportTool(dir, { recursive: true });
    expect(deep).toEqual({ processed: 2, written: 1, skipped: 1 });

    const outDir = `${dir}__json`;
    expect(await readJson(path.join(outDir, "a.json"))).toMatchObject({ endOffset: 68 });
    expect(await readJson(path.join(outDir, "sub", "B.json"))).toMatchObject({
      map: { eventsCount: 2, eventsPalCount: 2 },
    });
    expect(await existsPath(path.join(outDir, "notes.json"))).toBe(false);
  });

  it("writes nothing on a dry run", async () => {
    await writeFile(path.join(dir, "a.dat"), sampleMapBuilder().toBuffer());

    const summary = await runExportTool(dir, { dryRun: true });

    expect(summary).toEqual({ processed: 1, written: 0, skipped: 0 });
    expect(await existsPath(`${dir}__json`)).toBe(false);
  });

  it("prefixes decode failures with the input path", async () => {
    const input = path.join(dir, "empty.dat");
    await writeFile(input, new Uint8Array(0));

    await expect(runExportTool(input, {})).rejects.toThrow(
      `${input}: Insufficient data at offset 0: need 4 bytes, have 0`,
    );
    expect(await existsPath(path.join(dir, "empty.json"))).toBe(false);
  });

  it("forwards eventBound and maxCount to the decoder", async () => {
    const input = path.join(dir, "map.dat");
    await writeFile(input, fullMapBuilder().toBuffer());

    await expect(runExportTool(input, { maxCount: 1 })).rejects.toThrow(
      `${input}: worldChipData count 2 exceeds limit 1 at offset 71`,
    );

    await runExportTool(input, { eventBound: "declaredCount" });
    expect(await readJson(path.join(dir, "map.json"))).toMatchObject({ trailingBytes: 0 });
  });
});

describe("option parsers", () => {
  it("accepts the event bound spellings", () => {
    expect(parseEventBound("tiles")).toBe("tilesCount");
    expect(parseEventBound("Tiles_Count")).toBe("tilesCount");
    expect(parseEventBound("declared")).toBe("declaredCount");
    expect(() => parseEventBound("events")).toThrow(
      "Unknown event bound 'events'. Expected: tiles|declared",
    );
  });

  it("accepts non-negative integer counts only", () => {
    expect(parseMaxCount("0")).toBe(0);
    expect(parseMaxCount("4096")).toBe(4096);
    expect(() => parseMaxCount("-1")).toThrow("Invalid max count '-1'");
    expect(() => parseMaxCount("2.5")).toThrow("Invalid max count '2.5'");
    expect(() => parseMaxCount("many")).toThrow("Invalid max count 'many'");
  });
});
