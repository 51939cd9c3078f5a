import {ProtocolViolationError} from "../errors";

/**
 * Sequential little-endian reader over a received message.
 */
export class ReadBuffer {
  private offset = 0;

  constructor(private readonly data: Buffer) {
  }

  get hasRemaining(): boolean {
    return this.offset < this.data.length;
  }

  getUint8(): number {
    return this.data.readUInt8(this.advance(1));
  }

  getUint16(): number {
    return this.data.readUInt16LE(this.advance(2));
  }

  getUint32(): number {
    return this.data.readUInt32LE(this.advance(4));
  }

  getInt32(): number {
    return this.data.readInt32LE(this.advance(4));
  }

  getInt64(): bigint {
    return this.data.readBigInt64LE(this.advance(8));
  }

  getFloat64(): number {
    return this.data.readDoubleLE(this.advance(8));
  }

  getBytes(length: number): Buffer {
    const start = this.advance(length);
    return this.data.subarray(start, start + length);
  }

  // returns the offset to read from and moves past it
  private advance(size: number): number {
    if (this.offset + size > this.data.length) {
      throw new ProtocolViolationError('Message truncated', {
        offset: this.offset,
        size,
        length: this.data.length,
      });
    }

    const start = this.offset;
    this.offset += size;
    return start;
  }
}
