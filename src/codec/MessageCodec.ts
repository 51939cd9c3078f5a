import _ from "lodash";
import {ProtocolViolationError} from "../errors";
import {setEntry} from "../helpers/objects";
import {isRecord} from "../helpers/types";
import {ReadBuffer} from "./ReadBuffer";
import {WriteBuffer} from "./WriteBuffer";

export enum ValueTag {
  NULL = 0,
  TRUE = 1,
  FALSE = 2,
  INT32 = 3,
  INT64 = 4,
  FLOAT64 = 6,
  STRING = 7,
  LIST = 12,
  MAP = 13,
}

// tags below are reserved for the standard types
export const FIRST_CUSTOM_TAG = 128;

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;
const INT64_MIN = -(BigInt(1) << BigInt(63));
const INT64_MAX = (BigInt(1) << BigInt(63)) - BigInt(1);

/**
 * Describes how one custom value type crosses the wire. Fields are
 * written in a fixed order through the codec so optional fields
 * become null values.
 */
export interface CodecTypeDefinition<T> {
  readonly tag: number;
  readonly name: string;

  matches(value: unknown): value is T;
  write(codec: MessageCodec, buffer: WriteBuffer, value: T): void;
  read(codec: MessageCodec, buffer: ReadBuffer): T;
}

/**
 * Self describing binary codec: every value is a one byte tag followed
 * by its body. Supports null, booleans, numbers, strings, lists, string
 * keyed maps and any registered custom type. 64 bit integers outside the
 * safe number range decode as bigint.
 */
export class MessageCodec {
  private readonly typesByTag = new Map<number, CodecTypeDefinition<unknown>>();

  // first matching definition wins on encode
  constructor(private readonly types: ReadonlyArray<CodecTypeDefinition<unknown>> = []) {
    types.forEach(type => {
      if (type.tag < FIRST_CUSTOM_TAG || type.tag > 255) {
        throw new Error(`Invalid tag ${type.tag} for ${type.name}, custom tags are ${FIRST_CUSTOM_TAG}-255`);
      }

      const existing = this.typesByTag.get(type.tag);
      if (existing) {
        throw new Error(`Tag ${type.tag} of ${type.name} already used by ${existing.name}`);
      }

      this.typesByTag.set(type.tag, type);
    });
  }

  encode(value: unknown): Buffer {
    const buffer = new WriteBuffer();
    this.writeValue(buffer, value);
    return buffer.done();
  }

  decode(data: Buffer): unknown {
    const buffer = new ReadBuffer(data);
    const value = this.readValue(buffer);

    if (buffer.hasRemaining) {
      throw new ProtocolViolationError('Message corrupted, trailing bytes after value');
    }

    return value;
  }

  writeValue(buffer: WriteBuffer, value: unknown): void {
    if (value === null || value === undefined) {
      buffer.putUint8(ValueTag.NULL);
    } else if (typeof value === 'boolean') {
      buffer.putUint8(value ? ValueTag.TRUE : ValueTag.FALSE);
    } else if (typeof value === 'number') {
      this.writeNumber(buffer, value);
    } else if (typeof value === 'bigint') {
      if (value < INT64_MIN || value > INT64_MAX) {
        throw new ProtocolViolationError(`Integer ${value} does not fit in 64 bits`);
      }
      buffer.putUint8(ValueTag.INT64);
      buffer.putInt64(value);
    } else if (typeof value === 'string') {
      const bytes = Buffer.from(value, 'utf8');
      buffer.putUint8(ValueTag.STRING);
      this.writeSize(buffer, bytes.length);
      buffer.putBytes(bytes);
    } else if (Array.isArray(value)) {
      buffer.putUint8(ValueTag.LIST);
      this.writeSize(buffer, value.length);
      value.forEach(item => this.writeValue(buffer, item));
    } else {
      const type = this.types.find(t => t.matches(value));

      if (type) {
        buffer.putUint8(type.tag);
        type.write(this, buffer, value);
      } else if (_.isPlainObject(value) && isRecord(value)) {
        const entries = Object.entries(value);
        buffer.putUint8(ValueTag.MAP);
        this.writeSize(buffer, entries.length);
        entries.forEach(([key, item]) => {
          this.writeValue(buffer, key);
          this.writeValue(buffer, item);
        });
      } else {
        throw new ProtocolViolationError(`Value of type ${typeof value} can not be encoded`, {
          constructor: _.get(value, 'constructor.name'),
        });
      }
    }
  }

  readValue(buffer: ReadBuffer): unknown {
    return this.readValueOfType(buffer.getUint8(), buffer);
  }

  readValueOfType(tag: number, buffer: ReadBuffer): unknown {
    switch (tag) {
      case ValueTag.NULL:
        return null;
      case ValueTag.TRUE:
        return true;
      case ValueTag.FALSE:
        return false;
      case ValueTag.INT32:
        return buffer.getInt32();
      case ValueTag.INT64: {
        // numbers while exact, bigint beyond
        const value = buffer.getInt64();
        const number = Number(value);
        return Number.isSafeInteger(number) ? number : value;
      }
      case ValueTag.FLOAT64:
        return buffer.getFloat64();
      case ValueTag.STRING:
        return buffer.getBytes(this.readSize(buffer)).toString('utf8');
      case ValueTag.LIST: {
        const length = this.readSize(buffer);
        const list: unknown[] = [];
        for (let i = 0; i < length; i++) {
          list.push(this.readValue(buffer));
        }
        return list;
      }
      case ValueTag.MAP: {
        const length = this.readSize(buffer);
        const map: Record<string, unknown> = {};
        for (let i = 0; i < length; i++) {
          const key = this.readValue(buffer);
          if (typeof key !== 'string') {
            throw new ProtocolViolationError('Map keys must be strings', { key });
          }
          setEntry(map, key, this.readValue(buffer));
        }
        return map;
      }
    }

    const type = this.typesByTag.get(tag);
    if (!type) {
      throw new ProtocolViolationError(`Unknown value tag ${tag}`, { tag });
    }

    return type.read(this, buffer);
  }

  // sizes below 254 take one byte, 254 prefixes an uint16 and 255 an uint32
  private writeSize(buffer: WriteBuffer, size: number) {
    if (size < 254) {
      buffer.putUint8(size);
    } else if (size <= 0xffff) {
      buffer.putUint8(254);
      buffer.putUint16(size);
    } else {
      buffer.putUint8(255);
      buffer.putUint32(size);
    }
  }

  private readSize(buffer: ReadBuffer): number {
    const size = buffer.getUint8();

    if (size < 254) {
      return size;
    } else if (size === 254) {
      return buffer.getUint16();
    }

    return buffer.getUint32();
  }

  private writeNumber(buffer: WriteBuffer, value: number) {
    if (Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX) {
      buffer.putUint8(ValueTag.INT32);
      buffer.putInt32(value);
    } else if (Number.isSafeInteger(value)) {
      buffer.putUint8(ValueTag.INT64);
      buffer.putInt64(BigInt(value));
    } else {
      buffer.putUint8(ValueTag.FLOAT64);
      buffer.putFloat64(value);
    }
  }
}
