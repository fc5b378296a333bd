import type { Cursor } from "./binary.js";
import { CountLimitError, type RepeatSite } from "./errors.js";

export type ElementDecoder<T> = (cur: Cursor) => T;

export type RepeatLimits = Readonly<{
  maxCount?: number;
}>;

/**
 * Decodes exactly `bound` consecutive elements. The bound is not checked
 * against the bytes left in the cursor; a short buffer surfaces as the
 * element decoder's own read failure.
 */
export function decodeRepeated<T>(
  cur: Cursor,
  bound: number,
  decodeOne: ElementDecoder<T>,
  site: RepeatSite,
  limits: RepeatLimits = {},
): T[] {
  if (limits.maxCount !== undefined && bound > limits.maxCount) {
    throw new CountLimitError(site, bound, limits.maxCount, cur.position);
  }

  const out: T[] = [];
  for (let i = 0; i < bound; i++) out.push(decodeOne(cur));
  return out;
}
