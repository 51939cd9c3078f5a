/**
 * Growable little-endian byte writer.
 */
export class WriteBuffer {
  private readonly chunks: Buffer[] = [];
  private length = 0;

  putUint8(value: number): void {
    const chunk = Buffer.alloc(1);
    chunk.writeUInt8(value);
    this.push(chunk);
  }

  putUint16(value: number): void {
    const chunk = Buffer.alloc(2);
    chunk.writeUInt16LE(value);
    this.push(chunk);
  }

  putUint32(value: number): void {
    const chunk = Buffer.alloc(4);
    chunk.writeUInt32LE(value);
    this.push(chunk);
  }

  putInt32(value: number): void {
    const chunk = Buffer.alloc(4);
    chunk.writeInt32LE(value);
    this.push(chunk);
  }

  putInt64(value: bigint): void {
    const chunk = Buffer.alloc(8);
    chunk.writeBigInt64LE(value);
    this.push(chunk);
  }

  putFloat64(value: number): void {
    const chunk = Buffer.alloc(8);
    chunk.writeDoubleLE(value);
    this.push(chunk);
  }

  putBytes(bytes: Buffer): void {
    this.push(bytes);
  }

  done(): Buffer {
    return Buffer.concat(this.chunks, this.length);
  }

  private push(chunk: Buffer) {
    this.chunks.push(chunk);
    this.length += chunk.length;
  }
}
