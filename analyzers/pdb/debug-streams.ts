"use strict";

import { readAsciiString } from "../../binary-utils.js";
import {
  COFF_SECTION_HEADER_SIZE,
  COFF_SECTION_NAME_SIZE,
  DEBUG_STREAM_KINDS,
  FPO_DATA_SIZE,
  FPO_FRAME_TYPE_MASK,
  FPO_FRAME_TYPE_SHIFT,
  FPO_HAS_SEH_MASK,
  FPO_PROLOG_SIZE_MASK,
  FPO_SAVED_REGISTERS_MASK,
  FPO_SAVED_REGISTERS_SHIFT,
  FPO_USES_BASE_POINTER_MASK,
  INVALID_STREAM_INDEX
} from "./constants.js";
import { corrupt, noSuchStream, ok, type PdbResult } from "./errors.js";
import { PdbStreamReader } from "./stream-reader.js";
import type {
  DebugStreamKind,
  PdbCoffSectionHeader,
  PdbFpoRecord,
  PdbStreamDirectory
} from "./types.js";

export class DebugStreamIndexTable {
  readonly indices: readonly number[];

  constructor(indices: readonly number[]) {
    this.indices = indices;
  }

  // Slots missing from a short optional debug header read as absent.
  get(kind: DebugStreamKind): number {
    return this.indices[DEBUG_STREAM_KINDS.indexOf(kind)] ?? INVALID_STREAM_INDEX;
  }

  has(kind: DebugStreamKind): boolean {
    return this.get(kind) !== INVALID_STREAM_INDEX;
  }

  entries(): Array<[DebugStreamKind, number]> {
    return DEBUG_STREAM_KINDS.map((kind): [DebugStreamKind, number] => [kind, this.get(kind)]);
  }
}

export const readCoffSectionHeader = (view: DataView, offset: number): PdbCoffSectionHeader => {
  return {
    name: readAsciiString(view, offset, COFF_SECTION_NAME_SIZE),
    virtualSize: view.getUint32(offset + 8, true),
    virtualAddress: view.getUint32(offset + 12, true),
    sizeOfRawData: view.getUint32(offset + 16, true),
    pointerToRawData: view.getUint32(offset + 20, true),
    pointerToRelocations: view.getUint32(offset + 24, true),
    pointerToLinenumbers: view.getUint32(offset + 28, true),
    numberOfRelocations: view.getUint16(offset + 32, true),
    numberOfLinenumbers: view.getUint16(offset + 34, true),
    characteristics: view.getUint32(offset + 36, true)
  };
};

export const readFpoRecord = (view: DataView, offset: number): PdbFpoRecord => {
  const attributes = view.getUint16(offset + 14, true);
  return {
    startOffset: view.getUint32(offset, true),
    procedureSize: view.getUint32(offset + 4, true),
    localsDwords: view.getUint32(offset + 8, true),
    paramsDwords: view.getUint16(offset + 12, true),
    attributes,
    prologSize: attributes & FPO_PROLOG_SIZE_MASK,
    savedRegisters: (attributes & FPO_SAVED_REGISTERS_MASK) >>> FPO_SAVED_REGISTERS_SHIFT,
    hasSeh: (attributes & FPO_HAS_SEH_MASK) !== 0,
    usesBasePointer: (attributes & FPO_USES_BASE_POINTER_MASK) !== 0,
    frameType: (attributes & FPO_FRAME_TYPE_MASK) >>> FPO_FRAME_TYPE_SHIFT
  };
};

const loadIndexedRecords = <T>(
  directory: PdbStreamDirectory,
  streamIndex: number,
  recordSize: number,
  decode: (view: DataView, offset: number) => T,
  corruptMessage: string
): PdbResult<T[]> => {
  if (streamIndex >= directory.streamCount()) return noSuchStream(streamIndex);
  const bytes = directory.getStreamBytes(streamIndex);
  if (!bytes.ok) return bytes;
  if (bytes.value.byteLength % recordSize !== 0) return corrupt(corruptMessage);
  const reader = new PdbStreamReader(bytes.value);
  const records = reader.readFixedArray(
    bytes.value.byteLength / recordSize,
    recordSize,
    decode,
    corruptMessage
  );
  if (!records.ok) return corrupt(corruptMessage);
  return records;
};

// Section headers are required: an absent slot is reported the same way as a missing stream.
export const loadSectionHeaders = (
  table: DebugStreamIndexTable,
  directory: PdbStreamDirectory
): PdbResult<PdbCoffSectionHeader[]> => {
  const streamIndex = table.get("sectionHeaders");
  if (streamIndex === INVALID_STREAM_INDEX) return noSuchStream(streamIndex);
  return loadIndexedRecords(
    directory,
    streamIndex,
    COFF_SECTION_HEADER_SIZE,
    readCoffSectionHeader,
    "Corrupted section header stream."
  );
};

/**
 * Loads the new-style FPO records. An absent slot means the image has no FPO data.
 * A slot naming the wrong stream still loads when that stream's length divides evenly
 * into records; the format carries no record count to check it against.
 */
export const loadFpoRecords = (
  table: DebugStreamIndexTable,
  directory: PdbStreamDirectory
): PdbResult<PdbFpoRecord[]> => {
  const streamIndex = table.get("newFpo");
  if (streamIndex === INVALID_STREAM_INDEX) return ok([]);
  return loadIndexedRecords(
    directory,
    streamIndex,
    FPO_DATA_SIZE,
    readFpoRecord,
    "Corrupted New FPO stream."
  );
};
