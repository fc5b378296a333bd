#!/usr/bin/env node
// src/cli.ts
import { Command } from "commander";

import { parseMaxItems, runDumpTool } from "./worldmap/dumpTool.js";
import { parseEventBound, parseMaxCount, runExportTool } from "./worldmap/exportTool.js";
import type { EventBound } from "./worldmap/worldMap.js";

const program = new Command();

program
  .name("worldmap-tools")
  .description("Inspect world map .dat files (debug dump, JSON export)")
  .version("0.1.0");

program
  .command("dump")
  .description("Print the decoded world map as an indented debug tree")
  .argument("<input>", "Path to a world map .dat file")
  .option("--max-items <n>", "Print at most n items of each list", parseMaxItems)
  .option("--event-bound <bound>", "Repeat bound for event lists: tiles|declared", parseEventBound)
  .option("--max-count <n>", "Reject any declared count above n", parseMaxCount)
  .action(
    async (
      input: string,
      opts: { maxItems?: number; eventBound?: EventBound; maxCount?: number },
    ) => {
      await runDumpTool(input, opts);
    },
  );

program
  .command("to-json")
  .description("Convert a .dat file or a folder of .dat files to JSON")
  .argument("<input>", "Path to a .dat file OR a directory containing .dat files")
  .option("-o, --out <path>", "Output file (single input) or output dir (directory input)")
  .option("--recursive", "Recurse into subdirectories (directory input)", false)
  .option("--overwrite", "Overwrite existing JSON files", false)
  .option("--dry-run", "Print planned operations but do not write anything", false)
  .option("--event-bound <bound>", "Repeat bound for event lists: tiles|declared", parseEventBound)
  .option("--max-count <n>", "Reject any declared count above n", parseMaxCount)
  .action(
    async (
      input: string,
      opts: {
        out?: string;
        recursive: boolean;
        overwrite: boolean;
        dryRun: boolean;
        eventBound?: EventBound;
        maxCount?: number;
      },
    ) => {
      await runExportTool(input, opts);
    },
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});
