import { createHash } from "node:crypto";

import type { Chip, EventPage, EventRecord } from "./records.js";
import type { StringField } from "./stringField.js";
import type { DecodeResult, WorldMap } from "./worldMap.js";

export type StringFieldJson = Readonly<{
  length: number;
  encoding: "base64";
  dataBase64: string;
}>;

type WithJsonStrings<T> = {
  readonly [K in keyof T]: T[K] extends StringField ? StringFieldJson : T[K];
};

export type ChipJson = WithJsonStrings<Chip>;
export type EventPageJson = WithJsonStrings<EventPage>;

export type EventRecordJson = Readonly<
  Omit<WithJsonStrings<EventRecord>, "pages"> & { pages: ReadonlyArray<EventPageJson> }
>;

export type WorldMapJson = Readonly<
  Omit<WithJsonStrings<WorldMap>, "worldChipData" | "eventData" | "eventTemplateData"> & {
    worldChipData: ReadonlyArray<ChipJson>;
    eventData: ReadonlyArray<EventRecordJson>;
    eventTemplateData: ReadonlyArray<EventRecordJson>;
  }
>;

export type WorldMapJsonV1 = Readonly<{
  schema: "worldMapTools.worldmap.json.v1";
  source: Readonly<{ bytes: number; sha256: string }>;
  endOffset: number;
  trailingBytes: number;
  map: WorldMapJson;
}>;

function sha256Hex(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

function stringFieldToJson(f: StringField): StringFieldJson {
  return {
    length: f.length,
    encoding: "base64",
    dataBase64: Buffer.from(f.bytes).toString("base64"),
  };
}

function chipToJson(c: Chip): ChipJson {
  return {
    ...c,
    name: stringFieldToJson(c.name),
    unusedString: stringFieldToJson(c.unusedString),
  };
}

function eventPageToJson(p: EventPage): EventPageJson {
  return {
    ...p,
    worldName: stringFieldToJson(p.worldName),
    startStage: stringFieldToJson(p.startStage),
  };
}

function eventRecordToJson(e: EventRecord): EventRecordJson {
  return {
    ...e,
    name: stringFieldToJson(e.name),
    pages: e.pages.map(eventPageToJson),
  };
}

export function worldMapToJson(map: WorldMap): WorldMapJson {
  return {
    ...map,
    name: stringFieldToJson(map.name),
    bgPath: stringFieldToJson(map.bgPath),
    worldChipData: map.worldChipData.map(chipToJson),
    eventData: map.eventData.map(eventRecordToJson),
    eventTemplateData: map.eventTemplateData.map(eventRecordToJson),
  };
}

export function worldMapToJsonV1(bytes: Uint8Array, result: DecodeResult): WorldMapJsonV1 {
  return {
    schema: "worldMapTools.worldmap.json.v1",
    source: { bytes: bytes.length, sha256: sha256Hex(bytes) },
    endOffset: result.offset,
    trailingBytes: bytes.length - result.offset,
    map: worldMapToJson(result.map),
  };
}

export function stringifyWorldMapJsonV1(doc: WorldMapJsonV1): string {
  return JSON.stringify(doc, null, 2) + "\n";
}
