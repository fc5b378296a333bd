// src/worldmap/dumpTool.ts
import { readFile } from "node:fs/promises";

import { formatWorldMapDebug, type DebugDumpOptions } from "./debugDump.js";
import { decodeOptionsFrom } from "./exportTool.js";
import { decodeWorldMap, type EventBound } from "./worldMap.js";

export type DumpToolOptions = Readonly<{
  maxItems?: number;
  eventBound?: EventBound;
  maxCount?: number;
}>;

export function parseMaxItems(raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid max items '${raw}': expected a non-negative integer`);
  }
  return n;
}

export async function runDumpTool(inputPath: string, opts: DumpToolOptions): Promise<void> {
  const bytes = await readFile(inputPath);

  // Warnings go out as they happen; a later read failure must not swallow them.
  const { map, offset } = decodeWorldMap(
    bytes,
    decodeOptionsFrom(opts, (m) => console.warn(m)),
  );

  const dumpOpts: DebugDumpOptions =
    opts.maxItems === undefined ? {} : { maxListItems: opts.maxItems };
  process.stdout.write(formatWorldMapDebug(map, dumpOpts) + "\n");
  process.stdout.write(`decoded ${offset} of ${bytes.length} bytes\n`);
}
