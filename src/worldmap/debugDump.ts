import type { Chip, EventPage, EventRecord } from "./records.js";
import type { StringField } from "./stringField.js";
import type { WorldMap } from "./worldMap.js";

type DebugNode =
  | Readonly<{ kind: "scalar"; text: string }>
  | Readonly<{ kind: "struct"; name: string; fields: ReadonlyArray<readonly [string, DebugNode]> }>
  | Readonly<{ kind: "list"; items: ReadonlyArray<DebugNode> }>;

export type DebugDumpOptions = Readonly<{
  maxListItems?: number;
  indent?: number;
}>;

const scalar = (text: string): DebugNode => ({ kind: "scalar", text });

function escapeByte(b: number): string {
  if (b === 0x22) return '\\"';
  if (b === 0x5c) return "\\\\";
  if (b === 0x09) return "\\t";
  if (b === 0x0a) return "\\n";
  if (b === 0x0d) return "\\r";
  if (b >= 0x20 && b <= 0x7e) return String.fromCharCode(b);
  return `\\x${b.toString(16).padStart(2, "0")}`;
}

export function escapeBytes(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) out += escapeByte(b);
  return out;
}

function stringFieldNode(f: StringField): DebugNode {
  return scalar(`StringField { length: ${f.length}, bytes: "${escapeBytes(f.bytes)}" }`);
}

function structNode(name: string, record: Readonly<Record<string, unknown>>): DebugNode {
  const fields: Array<readonly [string, DebugNode]> = [];
  for (const [key, value] of Object.entries(record)) {
    fields.push([key, valueNode(value)]);
  }
  return { kind: "struct", name, fields };
}

function valueNode(value: unknown): DebugNode {
  if (typeof value === "number") return scalar(String(value));
  if (Array.isArray(value)) return { kind: "list", items: value.map(valueNode) };
  if (isStringField(value)) return stringFieldNode(value);
  if (isRecord(value) && "pages" in value) return structNode("EventRecord", value);
  if (isRecord(value) && "eventType" in value) return structNode("EventPage", value);
  if (isRecord(value) && "tileIndex" in value) return structNode("Chip", value);
  throw new Error(`Unexpected value in decoded tree: ${String(value)}`);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isStringField(v: unknown): v is StringField {
  return isRecord(v) && typeof v.length === "number" && v.bytes instanceof Uint8Array;
}

function render(node: DebugNode, depth: number, opts: Required<DebugDumpOptions>): string {
  const pad = " ".repeat(opts.indent * (depth + 1));
  const closePad = " ".repeat(opts.indent * depth);

  switch (node.kind) {
    case "scalar":
      return node.text;

    case "struct": {
      if (node.fields.length === 0) return node.name;
      const lines = node.fields.map(
        ([key, child]) => `${pad}${key}: ${render(child, depth + 1, opts)},`,
      );
      return `${node.name} {\n${lines.join("\n")}\n${closePad}}`;
    }

    case "list": {
      if (node.items.length === 0) return "[]";
      const shown = node.items.slice(0, opts.maxListItems);
      const lines = shown.map((child) => `${pad}${render(child, depth + 1, opts)},`);
      const hidden = node.items.length - shown.length;
      if (hidden > 0) lines.push(`${pad}... (${hidden} more)`);
      return `[\n${lines.join("\n")}\n${closePad}]`;
    }
  }
}

export function formatChipDebug(chip: Chip, options: DebugDumpOptions = {}): string {
  return render(structNode("Chip", chip), 0, withDefaults(options));
}

export function formatEventPageDebug(page: EventPage, options: DebugDumpOptions = {}): string {
  return render(structNode("EventPage", page), 0, withDefaults(options));
}

export function formatEventRecordDebug(
  event: EventRecord,
  options: DebugDumpOptions = {},
): string {
  return render(structNode("EventRecord", event), 0, withDefaults(options));
}

export function formatWorldMapDebug(map: WorldMap, options: DebugDumpOptions = {}): string {
  return render(structNode("WorldMap", map), 0, withDefaults(options));
}

function withDefaults(options: DebugDumpOptions): Required<DebugDumpOptions> {
  return {
    maxListItems: options.maxListItems ?? Number.POSITIVE_INFINITY,
    indent: options.indent ?? 4,
  };
}
