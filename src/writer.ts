/**
 * Append-only big-endian byte sink. Values are truncated to their field
 * width and written as given; nothing is range-checked or clamped.
 */
export class ByteWriter {
  private readonly bytes: number[] = [];

  get length(): number {
    return this.bytes.length;
  }

  writeUint8(value: number): this {
    this.bytes.push(value & 0xff);
    return this;
  }

  writeUint16(value: number): this {
    this.bytes.push((value >> 8) & 0xff, value & 0xff);
    return this;
  }

  writeUint32(value: number): this {
    this.bytes.push(
      (value >>> 24) & 0xff,
      (value >> 16) & 0xff,
      (value >> 8) & 0xff,
      value & 0xff,
    );
    return this;
  }

  writeBytes(data: ArrayLike<number>): this {
    for (let i = 0; i < data.length; i++) this.bytes.push(data[i] & 0xff);
    return this;
  }

  writeFourCC(id: string): this {
    for (let i = 0; i < 4; i++) this.bytes.push(id.charCodeAt(i) & 0xff);
    return this;
  }

  toUint8Array(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}
