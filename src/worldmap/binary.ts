import { InsufficientDataError } from "./errors.js";

/** Forward-only reader over a private copy of the input bytes. */
export class Cursor {
  private offset = 0;
  private readonly buf: Buffer;

  public constructor(bytes: Uint8Array) {
    this.buf = Buffer.from(bytes);
  }

  public get position(): number {
    return this.offset;
  }

  public remaining(): number {
    return this.buf.length - this.offset;
  }

  public readU32LE(): number {
    this.ensure(4);
    const v = this.buf.readUInt32LE(this.offset);
    this.offset += 4;
    return v;
  }

  public readBytes(n: number): Buffer {
    if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid read length: ${n}`);
    this.ensure(n);
    const out = this.buf.subarray(this.offset, this.offset + n);
    this.offset += n;
    return out;
  }

  private ensure(n: number): void {
    if (n > this.remaining()) {
      throw new InsufficientDataError(this.offset, n, this.remaining());
    }
  }
}
