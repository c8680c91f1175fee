"use strict";

import { corrupt, ok, type PdbResult } from "./errors.js";

const UTF8_DECODER = new TextDecoder("utf-8", { fatal: false });

export const decodeUtf8 = (bytes: Uint8Array): string => UTF8_DECODER.decode(bytes);

export const toDataView = (bytes: Uint8Array): DataView =>
  new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

// Sequential little-endian cursor over one byte range. Every read is bounds-checked
// against the range and leaves the offset untouched when it fails.
export class PdbStreamReader {
  readonly bytes: Uint8Array;
  readonly view: DataView;
  offset = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = toDataView(bytes);
  }

  get length(): number {
    return this.bytes.byteLength;
  }

  get bytesRemaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  setOffset(offset: number, label = "Offset"): PdbResult<number> {
    if (offset < 0 || offset > this.length) {
      return corrupt(`${label} ${offset} is outside a ${this.length}-byte stream.`);
    }
    this.offset = offset;
    return ok(offset);
  }

  private ensure(byteCount: number, label: string): PdbResult<number> {
    if (byteCount < 0 || this.offset + byteCount > this.length) {
      return corrupt(`${label} is truncated.`);
    }
    return ok(this.offset);
  }

  readUint16(label: string): PdbResult<number> {
    const start = this.ensure(2, label);
    if (!start.ok) return start;
    this.offset += 2;
    return ok(this.view.getUint16(start.value, true));
  }

  readUint32(label: string): PdbResult<number> {
    const start = this.ensure(4, label);
    if (!start.ok) return start;
    this.offset += 4;
    return ok(this.view.getUint32(start.value, true));
  }

  readInt32(label: string): PdbResult<number> {
    const start = this.ensure(4, label);
    if (!start.ok) return start;
    this.offset += 4;
    return ok(this.view.getInt32(start.value, true));
  }

  // Returns a view that shares memory with the underlying range.
  readBytes(byteCount: number, label: string): PdbResult<Uint8Array> {
    const start = this.ensure(byteCount, label);
    if (!start.ok) return start;
    this.offset += byteCount;
    return ok(this.bytes.subarray(start.value, start.value + byteCount));
  }

  readRest(): Uint8Array {
    const rest = this.bytes.subarray(this.offset);
    this.offset = this.length;
    return rest;
  }

  readZeroString(label: string): PdbResult<string> {
    const terminator = this.bytes.indexOf(0, this.offset);
    if (terminator === -1) return corrupt(`${label} is not NUL-terminated.`);
    const text = decodeUtf8(this.bytes.subarray(this.offset, terminator));
    this.offset = terminator + 1;
    return ok(text);
  }

  readFixedArray<T>(
    count: number,
    recordSize: number,
    decode: (view: DataView, offset: number) => T,
    label: string
  ): PdbResult<T[]> {
    const start = this.ensure(count * recordSize, label);
    if (!start.ok) return start;
    const records: T[] = [];
    for (let index = 0; index < count; index += 1) {
      records.push(decode(this.view, start.value + index * recordSize));
    }
    this.offset += count * recordSize;
    return ok(records);
  }
}
