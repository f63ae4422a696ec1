import { TruncatedStreamError } from "./errors";

/**
 * Big-endian cursor over an in-memory byte source. Every read checks the
 * remaining length first and fails with `TruncatedStreamError`.
 */
export class ByteReader {
  private readonly view: DataView;
  private position: number = 0;

  constructor(buffer: ArrayBuffer | Uint8Array) {
    if (buffer instanceof Uint8Array) {
      this.view = new DataView(
        buffer.buffer,
        buffer.byteOffset,
        buffer.byteLength,
      );
    } else {
      this.view = new DataView(buffer);
    }
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.view.byteLength - this.position;
  }

  private ensureAvailable(n: number) {
    if (n > this.remaining) {
      throw new TruncatedStreamError(
        `Unexpected end of data: need ${n} bytes, ${this.remaining} left`,
        this.position,
      );
    }
  }

  readUint8(): number {
    this.ensureAvailable(1);
    const value = this.view.getUint8(this.position);
    this.position += 1;
    return value;
  }

  readUint16(): number {
    this.ensureAvailable(2);
    const value = this.view.getUint16(this.position, false);
    this.position += 2;
    return value;
  }

  readUint32(): number {
    this.ensureAvailable(4);
    const value = this.view.getUint32(this.position, false);
    this.position += 4;
    return value;
  }

  /** Returns a copy of the next `length` bytes. */
  readBytes(length: number): Uint8Array {
    this.ensureAvailable(length);
    const bytes = new Uint8Array(
      this.view.buffer,
      this.view.byteOffset + this.position,
      length,
    ).slice();
    this.position += length;
    return bytes;
  }

  /** Copy of the bytes consumed since `start`. */
  bytesSince(start: number): Uint8Array {
    return new Uint8Array(
      this.view.buffer,
      this.view.byteOffset + start,
      this.position - start,
    ).slice();
  }

  readFourCC(): string {
    const bytes = this.readBytes(4);
    let s = "";
    for (const byte of bytes) s += String.fromCharCode(byte);
    return s;
  }
}
