"use strict";

import { SECTION_MAP_ENTRY_SIZE } from "./constants.js";
import { ok, type PdbResult } from "./errors.js";
import { PdbStreamReader } from "./stream-reader.js";
import type { PdbSectionMap, PdbSectionMapEntry } from "./types.js";

const readSectionMapEntry = (view: DataView, offset: number): PdbSectionMapEntry => ({
  flags: view.getUint16(offset, true),
  overlay: view.getUint16(offset + 2, true),
  group: view.getUint16(offset + 4, true),
  frame: view.getUint16(offset + 6, true),
  sectionName: view.getUint16(offset + 8, true),
  className: view.getUint16(offset + 10, true),
  offset: view.getUint32(offset + 12, true),
  sectionLength: view.getUint32(offset + 16, true)
});

export const decodeSectionMap = (
  substream: Uint8Array,
  issues: string[]
): PdbResult<PdbSectionMap> => {
  const reader = new PdbStreamReader(substream);
  const count = reader.readUint16("DBI section map header");
  if (!count.ok) return count;
  const logicalCount = reader.readUint16("DBI section map header");
  if (!logicalCount.ok) return logicalCount;
  const entries = reader.readFixedArray(
    count.value,
    SECTION_MAP_ENTRY_SIZE,
    readSectionMapEntry,
    `DBI section map (${count.value} entries)`
  );
  if (!entries.ok) return entries;
  if (reader.bytesRemaining > 0) {
    issues.push(`Section map has ${reader.bytesRemaining} bytes after its ${count.value} entries.`);
  }
  return ok({ count: count.value, logicalCount: logicalCount.value, entries: entries.value });
};
