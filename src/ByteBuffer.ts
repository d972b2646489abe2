import type { ReadonlyBytes } from './duid.js';

/**
 * Big-endian byte cursor used by the DUID codecs.
 *
 * A buffer is either a reader over existing bytes (`ByteBuffer.from`) or a
 * growable writer (`ByteBuffer.alloc`). Reads past the end throw a
 * RangeError; codecs check lengths first and report layout problems
 * themselves.
 */
export class ByteBuffer {
  private data: Uint8Array;
  private view: DataView;
  private readPos = 0;
  private writePos = 0;

  private constructor(data: Uint8Array, writePos: number) {
    this.data = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.writePos = writePos;
  }

  /** Create a reader over `bytes`. The bytes are not copied. */
  static from(bytes: Uint8Array): ByteBuffer {
    return new ByteBuffer(bytes, bytes.length);
  }

  /** Create an empty writer with an initial capacity hint. */
  static alloc(capacity = 32): ByteBuffer {
    return new ByteBuffer(new Uint8Array(Math.max(capacity, 1)), 0);
  }

  /** Current read offset. */
  get offset(): number {
    return this.readPos;
  }

  /** Bytes left to read. */
  get remaining(): number {
    return this.writePos - this.readPos;
  }

  /** Read a uint16 without advancing. */
  peekUint16(): number {
    this.ensureReadable(2);
    return this.view.getUint16(this.readPos);
  }

  readUint16(): number {
    this.ensureReadable(2);
    const value = this.view.getUint16(this.readPos);
    this.readPos += 2;
    return value;
  }

  readUint32(): number {
    this.ensureReadable(4);
    const value = this.view.getUint32(this.readPos);
    this.readPos += 4;
    return value;
  }

  /** Read `count` bytes into a fresh array. */
  readBytes(count: number): Uint8Array {
    this.ensureReadable(count);
    const out = this.data.slice(this.readPos, this.readPos + count);
    this.readPos += count;
    return out;
  }

  /** Read everything up to the end into a fresh array. */
  readRemaining(): Uint8Array {
    return this.readBytes(this.remaining);
  }

  writeUint16(value: number): void {
    this.ensureWritable(2);
    this.view.setUint16(this.writePos, value);
    this.writePos += 2;
  }

  writeUint32(value: number): void {
    this.ensureWritable(4);
    this.view.setUint32(this.writePos, value);
    this.writePos += 4;
  }

  writeBytes(bytes: ReadonlyBytes): void {
    this.ensureWritable(bytes.length);
    this.data.set(bytes, this.writePos);
    this.writePos += bytes.length;
  }

  /** Copy of the bytes written so far. */
  toUint8Array(): Uint8Array {
    return this.data.slice(0, this.writePos);
  }

  private ensureReadable(count: number): void {
    if (count < 0 || this.readPos + count > this.writePos) {
      throw new RangeError(
        `ByteBuffer: cannot read ${count} byte(s) at offset ${this.readPos}, ${this.remaining} remaining`,
      );
    }
  }

  private ensureWritable(count: number): void {
    const needed = this.writePos + count;
    if (needed <= this.data.length) return;
    let size = this.data.length * 2;
    while (size < needed) size *= 2;
    const grown = new Uint8Array(size);
    grown.set(this.data.subarray(0, this.writePos));
    this.data = grown;
    this.view = new DataView(grown.buffer);
  }
}
