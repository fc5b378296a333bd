import {
  ByteBuilder,
  SAMPLE_HEADER,
  writeChip,
  writeEventRecord,
  writeHeader,
} from "./byteBuilder.js";

/** Header only; every count is zero. 68 bytes. */
export function sampleMapBuilder(): ByteBuilder {
  return writeHeader(new ByteBuilder(), SAMPLE_HEADER).u32(0).u32(0).u32(0).u32(0);
}

/**
 * Two chips, two tiles (5, 9), two events and two templates, with
 * eventsCount and eventsPalCount equal to tilesCount.
 */
export function fullMapBuilder(): ByteBuilder {
  const w = writeHeader(new ByteBuilder(), SAMPLE_HEADER, "intro", "bg/sky.png");

  w.u32(2);
  writeChip(w, { header: 1, tileIndex: 0, locked: 0, graphic: 10, name: "grass", unusedString: "" });
  writeChip(w, { header: 1, tileIndex: 1, locked: 1, graphic: 11, name: "rock", unusedString: "xy" });

  w.u32(2).u32(5).u32(9);

  w.u32(2);
  writeEventRecord(w, { header: 3, x: 1, y: 2, name: "door", pageSeeds: [1] });
  writeEventRecord(w, { header: 3, x: 6, y: 7, name: "sign", pageSeeds: [2, 3] });

  w.u32(2);
  writeEventRecord(w, { header: 4, x: 0, y: 0, name: "tplA", pageSeeds: [] });
  writeEventRecord(w, { header: 4, x: 0, y: 0, name: "tplB", pageSeeds: [4] });

  return w;
}
