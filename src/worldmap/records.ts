import type { Cursor } from "./binary.js";
import { decodeRepeated, type RepeatLimits } from "./repeat.js";
import { decodeStringField, type StringField } from "./stringField.js";

// Tile-type catalog entry.
export type Chip = Readonly<{
  header: number;
  tileIndex: number;
  locked: number;
  graphic: number;
  stringsCount: number; // always 2 in editor output

  name: StringField;
  unusedString: StringField;
}>;

// One conditional variant of a placed event.
export type EventPage = Readonly<{
  start: number;
  eventType: number;
  graphic: number;

  worldNumber: number;
  passWithoutClear: number;
  playAfterClear: number;
  onGameClear: number;

  appearanceConditionWorld: number;
  appearanceConditionVariable: number; // variable selector
  appearanceConditionConstant: number;
  appearanceConditionComparisonContent: number; // comparison operator selector
  appearanceConditionTotalScore: number;

  variationSettingPresent: number;
  variationVariable: number;
  variationConstant: number;

  stringsCount: number; // always 2 in editor output

  worldName: StringField;
  startStage: StringField;
}>;

export type EventRecord = Readonly<{
  header: number;
  placementX: number;
  placementY: number;

  stringsCount: number; // always 1 in editor output
  name: StringField;

  pagesCount: number;
  pages: ReadonlyArray<EventPage>;
}>;

export function decodeChip(cur: Cursor): Chip {
  const header = cur.readU32LE();
  const tileIndex = cur.readU32LE();
  const locked = cur.readU32LE();
  const graphic = cur.readU32LE();
  const stringsCount = cur.readU32LE();
  const name = decodeStringField(cur);
  const unusedString = decodeStringField(cur);

  return { header, tileIndex, locked, graphic, stringsCount, name, unusedString };
}

export function decodeEventPage(cur: Cursor): EventPage {
  const start = cur.readU32LE();
  const eventType = cur.readU32LE();
  const graphic = cur.readU32LE();

  const worldNumber = cur.readU32LE();
  const passWithoutClear = cur.readU32LE();
  const playAfterClear = cur.readU32LE();
  const onGameClear = cur.readU32LE();

  const appearanceConditionWorld = cur.readU32LE();
  const appearanceConditionVariable = cur.readU32LE();
  const appearanceConditionConstant = cur.readU32LE();
  const appearanceConditionComparisonContent = cur.readU32LE();
  const appearanceConditionTotalScore = cur.readU32LE();

  const variationSettingPresent = cur.readU32LE();
  const variationVariable = cur.readU32LE();
  const variationConstant = cur.readU32LE();

  const stringsCount = cur.readU32LE();

  const worldName = decodeStringField(cur);
  const startStage = decodeStringField(cur);

  return {
    start,
    eventType,
    graphic,
    worldNumber,
    passWithoutClear,
    playAfterClear,
    onGameClear,
    appearanceConditionWorld,
    appearanceConditionVariable,
    appearanceConditionConstant,
    appearanceConditionComparisonContent,
    appearanceConditionTotalScore,
    variationSettingPresent,
    variationVariable,
    variationConstant,
    stringsCount,
    worldName,
    startStage,
  };
}

export function decodeEventRecord(cur: Cursor, limits: RepeatLimits = {}): EventRecord {
  const header = cur.readU32LE();
  const placementX = cur.readU32LE();
  const placementY = cur.readU32LE();
  const stringsCount = cur.readU32LE();
  const name = decodeStringField(cur);
  const pagesCount = cur.readU32LE();
  const pages = decodeRepeated(cur, pagesCount, decodeEventPage, "pages", limits);

  return { header, placementX, placementY, stringsCount, name, pagesCount, pages };
}
