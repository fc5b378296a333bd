import type { Cursor } from "./binary.js";

export type StringField = Readonly<{
  length: number; // u32 as stored
  bytes: Uint8Array;
}>;

// A declared length of 0 or 1 is followed by no payload bytes at all.
export function decodeStringField(cur: Cursor): StringField {
  const length = cur.readU32LE();
  const bytes = length > 1 ? new Uint8Array(cur.readBytes(length)) : new Uint8Array(0);
  return { length, bytes };
}
