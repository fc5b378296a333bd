// src/worldmap/exportTool.ts
import path from "node:path";
import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";

import {
  decodeWorldMap,
  type DecodeOptions,
  type EventBound,
  type WarnFn,
} from "./worldMap.js";
import { stringifyWorldMapJsonV1, worldMapToJsonV1 } from "./worldMapJsonV1.js";

export type ExportToolOptions = Readonly<{
  out?: string;
  recursive?: boolean;
  overwrite?: boolean;
  dryRun?: boolean;
  eventBound?: EventBound;
  maxCount?: number;
}>;

export type ExportSummary = Readonly<{
  processed: number;
  written: number;
  skipped: number;
}>;

export function parseEventBound(raw: string): EventBound {
  const s = raw.trim().toLowerCase().replace(/_/g, "-");
  if (s === "tiles" || s === "tiles-count" || s === "tilescount") return "tilesCount";
  if (s === "declared" || s === "declared-count" || s === "declaredcount") return "declaredCount";
  throw new Error(`Unknown event bound '${raw}'. Expected: tiles|declared`);
}

export function parseMaxCount(raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid max count '${raw}': expected a non-negative integer`);
  }
  return n;
}

function isWorldMapPath(p: string): boolean {
  return p.toLowerCase().endsWith(".dat");
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    const st = await stat(p);
    return st.isDirectory();
  } catch {
    return false;
  }
}

async function existsPath(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

async function listFiles(dir: string, recursive: boolean): Promise<string[]> {
  const out: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) {
      if (recursive) out.push(...(await listFiles(full, true)));
    } else if (e.isFile()) {
      out.push(full);
    }
  }

  out.sort();
  return out;
}

function jsonPathFor(file: string): string {
  const ext = path.extname(file);
  return `${file.slice(0, file.length - ext.length)}.json`;
}

function defaultOutDirForDir(inputDir: string): string {
  return `${inputDir}__json`;
}

export function decodeOptionsFrom(
  opts: Readonly<{ eventBound?: EventBound; maxCount?: number }>,
  warn: WarnFn,
): DecodeOptions {
  const decode: { eventBound?: EventBound; maxCount?: number; warn: WarnFn } = { warn };
  if (opts.eventBound !== undefined) decode.eventBound = opts.eventBound;
  if (opts.maxCount !== undefined) decode.maxCount = opts.maxCount;
  return decode;
}

async function exportFile(
  inputPath: string,
  outputPath: string,
  opts: ExportToolOptions,
): Promise<void> {
  const bytes = await readFile(inputPath);

  let text: string;
  try {
    const decodeOpts = decodeOptionsFrom(opts, (m) => console.warn(`${inputPath}: ${m}`));
    const result = decodeWorldMap(bytes, decodeOpts);
    text = stringifyWorldMapJsonV1(worldMapToJsonV1(bytes, result));
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`${inputPath}: ${msg}`);
  }

  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, text, "utf8");
}

export async function runExportTool(
  inputPath: string,
  opts: ExportToolOptions,
): Promise<ExportSummary> {
  const recursive = opts.recursive === true;
  const overwrite = opts.overwrite === true;
  const dryRun = opts.dryRun === true;

  let processed = 0;
  let written = 0;
  let skipped = 0;

  if (!(await isDirectory(inputPath))) {
    let outPath: string;
    if (opts.out) {
      const outIsDir = !path.extname(opts.out);
      outPath = outIsDir
        ? path.join(opts.out, path.basename(jsonPathFor(inputPath)))
        : opts.out;
    } else {
      outPath = jsonPathFor(inputPath);
    }

    if (!overwrite && (await existsPath(outPath))) {
      console.warn(`Skip (exists): ${outPath}`);
      return { processed: 1, written: 0, skipped: 1 };
    }

    processed++;

    if (dryRun) {
      console.log(`[dry-run] ${inputPath} -> ${outPath}`);
      return { processed, written: 0, skipped: 0 };
    }

    await exportFile(inputPath, outPath, opts);
    written++;

    console.log(`${inputPath} -> ${outPath}`);
    return { processed, written, skipped };
  }

  // Directory mode
  const outDir = opts.out ?? defaultOutDirForDir(inputPath);
  const outDirAbs = path.resolve(outDir);
  const inDirAbs = path.resolve(inputPath);

  const allFiles = await listFiles(inputPath, recursive);

  for (const f of allFiles) {
    if (!isWorldMapPath(f)) continue;
    if (path.resolve(f).startsWith(outDirAbs + path.sep)) continue;

    processed++;

    const rel = path.relative(inDirAbs, path.resolve(f));
    const dest = jsonPathFor(path.join(outDir, rel));

    if (!overwrite && (await existsPath(dest))) {
      skipped++;
      continue;
    }

    if (dryRun) {
      console.log(`[dry-run] ${f} -> ${dest}`);
      continue;
    }

    await exportFile(f, dest, opts);
    written++;
  }

  console.log(
    `Done. processed=${processed} written=${written} skipped=${skipped} out=${outDir}`,
  );

  return { processed, written, skipped };
}
