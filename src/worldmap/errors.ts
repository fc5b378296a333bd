export class WorldMapDecodeError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InsufficientDataError extends WorldMapDecodeError {
  public constructor(
    public readonly offset: number,
    public readonly needed: number,
    public readonly available: number,
  ) {
    super(`Insufficient data at offset ${offset}: need ${needed} bytes, have ${available}`);
  }
}

export type RepeatSite =
  | "worldChipData"
  | "mapChipData"
  | "eventData"
  | "eventTemplateData"
  | "pages";

export class CountLimitError extends WorldMapDecodeError {
  public constructor(
    public readonly site: RepeatSite,
    public readonly count: number,
    public readonly limit: number,
    public readonly offset: number,
  ) {
    super(`${site} count ${count} exceeds limit ${limit} at offset ${offset}`);
  }
}
