import { Cursor } from "./binary.js";
import {
  decodeChip,
  decodeEventRecord,
  type Chip,
  type EventRecord,
} from "./records.js";
import { decodeRepeated, type RepeatLimits } from "./repeat.js";
import { decodeStringField, type StringField } from "./stringField.js";

export type WarnFn = (msg: string) => void;

/**
 * Which count bounds the event and event-template lists.
 *
 * "tilesCount" repeats both lists once per map tile, ignoring the count stored
 * in front of them. This matches the existing decoder byte for byte, but is
 * most likely a copy of the tile-list bound. "declaredCount" uses
 * eventsCount / eventsPalCount, the probable intended bound.
 */
export type EventBound = "tilesCount" | "declaredCount";

export type DecodeOptions = Readonly<{
  eventBound?: EventBound;
  maxCount?: number;
  warn?: WarnFn;
}>;

export type WorldMap = Readonly<{
  version: number;
  settingsCount: number;

  horizontalWidth: number;
  verticalWidth: number;

  chunkWidth: number;
  chunkPow: number;

  initialPositionX: number;
  initialPositionY: number;

  backgroundIndex: number;
  useBackground: number;

  stringsCount: number; // always 2 in editor output
  name: StringField;
  bgPath: StringField;

  tilesTypesCount: number;
  worldChipData: ReadonlyArray<Chip>;

  tilesCount: number;
  mapChipData: ReadonlyArray<number>;

  eventsCount: number;
  eventData: ReadonlyArray<EventRecord>;

  eventsPalCount: number;
  eventTemplateData: ReadonlyArray<EventRecord>;
}>;

export type DecodeResult = Readonly<{
  map: WorldMap;
  offset: number; // cursor position after the last field
}>;

function readU32(cur: Cursor): number {
  return cur.readU32LE();
}

export function decodeWorldMap(bytes: Uint8Array, options: DecodeOptions = {}): DecodeResult {
  const cur = new Cursor(bytes);
  const eventBound = options.eventBound ?? "tilesCount";
  const warn = options.warn ?? (() => {});
  const limits: RepeatLimits =
    options.maxCount === undefined ? {} : { maxCount: options.maxCount };
  const decodeEvent = (c: Cursor): EventRecord => decodeEventRecord(c, limits);

  const version = cur.readU32LE();
  const settingsCount = cur.readU32LE();
  const horizontalWidth = cur.readU32LE();
  const verticalWidth = cur.readU32LE();
  const chunkWidth = cur.readU32LE();
  const chunkPow = cur.readU32LE();
  const initialPositionX = cur.readU32LE();
  const initialPositionY = cur.readU32LE();
  const backgroundIndex = cur.readU32LE();
  const useBackground = cur.readU32LE();
  const stringsCount = cur.readU32LE();
  const name = decodeStringField(cur);
  const bgPath = decodeStringField(cur);

  const tilesTypesCount = cur.readU32LE();
  const worldChipData = decodeRepeated(cur, tilesTypesCount, decodeChip, "worldChipData", limits);

  const tilesCount = cur.readU32LE();
  const mapChipData = decodeRepeated(cur, tilesCount, readU32, "mapChipData", limits);

  const eventsCount = cur.readU32LE();
  if (eventBound === "tilesCount" && eventsCount !== tilesCount) {
    warn(
      `eventsCount=${eventsCount} differs from tilesCount=${tilesCount}; reading ${tilesCount} events`,
    );
  }
  const eventData = decodeRepeated(
    cur,
    eventBound === "tilesCount" ? tilesCount : eventsCount,
    decodeEvent,
    "eventData",
    limits,
  );

  const eventsPalCount = cur.readU32LE();
  if (eventBound === "tilesCount" && eventsPalCount !== tilesCount) {
    warn(
      `eventsPalCount=${eventsPalCount} differs from tilesCount=${tilesCount}; reading ${tilesCount} event templates`,
    );
  }
  const eventTemplateData = decodeRepeated(
    cur,
    eventBound === "tilesCount" ? tilesCount : eventsPalCount,
    decodeEvent,
    "eventTemplateData",
    limits,
  );

  if (cur.remaining() > 0) {
    warn(`${cur.remaining()} trailing bytes after offset ${cur.position}`);
  }

  const map: WorldMap = {
    version,
    settingsCount,
    horizontalWidth,
    verticalWidth,
    chunkWidth,
    chunkPow,
    initialPositionX,
    initialPositionY,
    backgroundIndex,
    useBackground,
    stringsCount,
    name,
    bgPath,
    tilesTypesCount,
    worldChipData,
    tilesCount,
    mapChipData,
    eventsCount,
    eventData,
    eventsPalCount,
    eventTemplateData,
  };

  return { map, offset: cur.position };
}
