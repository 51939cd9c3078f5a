import {ProtocolViolationError} from "../errors";
import {setEntry} from "../helpers/objects";
import {isRecord, isStringArray} from "../helpers/types";
import {MessageCodec} from "./MessageCodec";
import {ReadBuffer} from "./ReadBuffer";

// Typed readers for the fields of custom values. A field holding an
// unexpected type means the peer speaks another protocol version.

function fieldError(field: string, expected: string, value: unknown): ProtocolViolationError {
  return new ProtocolViolationError(`Field ${field} should be ${expected}, got ${typeof value}`, { field });
}

export function readString(codec: MessageCodec, buffer: ReadBuffer, field: string): string {
  const value = codec.readValue(buffer);
  if (typeof value !== 'string') {
    throw fieldError(field, 'a string', value);
  }
  return value;
}

export function readOptionalString(codec: MessageCodec, buffer: ReadBuffer, field: string): string | undefined {
  const value = codec.readValue(buffer);
  if (value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw fieldError(field, 'a string', value);
  }
  return value;
}

export function readNumber(codec: MessageCodec, buffer: ReadBuffer, field: string): number {
  const value = codec.readValue(buffer);
  if (typeof value !== 'number') {
    throw fieldError(field, 'a number', value);
  }
  return value;
}

export function readOptionalBoolean(codec: MessageCodec, buffer: ReadBuffer, field: string): boolean | undefined {
  const value = codec.readValue(buffer);
  if (value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw fieldError(field, 'a boolean', value);
  }
  return value;
}

export function readOptionalStringList(codec: MessageCodec, buffer: ReadBuffer, field: string): string[] | undefined {
  const value = codec.readValue(buffer);
  if (value === null) {
    return undefined;
  }
  if (!isStringArray(value)) {
    throw fieldError(field, 'a list of strings', value);
  }
  return value;
}

export function readOptionalStringMap(codec: MessageCodec, buffer: ReadBuffer, field: string): Record<string, string> | undefined {
  const value = codec.readValue(buffer);
  if (value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw fieldError(field, 'a map', value);
  }

  const map: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== 'string') {
      throw fieldError(`${field}.${key}`, 'a string', item);
    }
    setEntry(map, key, item);
  }
  return map;
}

export function readOptionalStringListMap(codec: MessageCodec, buffer: ReadBuffer, field: string): Record<string, string[]> | undefined {
  const value = codec.readValue(buffer);
  if (value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw fieldError(field, 'a map', value);
  }

  const map: Record<string, string[]> = {};
  for (const [key, item] of Object.entries(value)) {
    if (!isStringArray(item)) {
      throw fieldError(`${field}.${key}`, 'a list of strings', item);
    }
    setEntry(map, key, item);
  }
  return map;
}

export function readOptionalInstance<T>(
  codec: MessageCodec,
  buffer: ReadBuffer,
  field: string,
  type: new (...args: never[]) => T,
): T | null {
  const value = codec.readValue(buffer);
  if (value === null) {
    return null;
  }
  if (!(value instanceof type)) {
    throw fieldError(field, `a ${type.name}`, value);
  }
  return value;
}
