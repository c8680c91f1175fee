"use strict";

import { alignUpTo } from "../../binary-utils.js";
import {
  MODULE_FLAG_HAS_EC_INFO,
  MODULE_FLAG_WRITTEN,
  MODULE_INFO_HEADER_SIZE,
  MODULE_INFO_OFF_C11_BYTES,
  MODULE_INFO_OFF_C13_BYTES,
  MODULE_INFO_OFF_FLAGS,
  MODULE_INFO_OFF_NUM_FILES,
  MODULE_INFO_OFF_PDB_FILE_PATH_NAME_INDEX,
  MODULE_INFO_OFF_SECTION_CONTRIBUTION,
  MODULE_INFO_OFF_SOURCE_FILE_NAME_INDEX,
  MODULE_INFO_OFF_SYMBOL_BYTES,
  MODULE_INFO_OFF_SYMBOL_STREAM,
  MODULE_INFO_RECORD_ALIGNMENT,
  MODULE_TYPE_SERVER_INDEX_MASK,
  MODULE_TYPE_SERVER_INDEX_SHIFT
} from "./constants.js";
import { ok, type PdbResult } from "./errors.js";
import { readSectionContribution } from "./section-contributions.js";
import { PdbStreamReader } from "./stream-reader.js";
import type { PdbModuleRecord } from "./types.js";

type ModuleRecordFields = Omit<PdbModuleRecord, "sourceFiles">;

// Holds one module while the DBI stream loads: created from the module info substream,
// then given its source files by the file info pass, then frozen.
export class ModuleRecordBuilder {
  readonly fields: Readonly<ModuleRecordFields>;
  private readonly sourceFiles: string[] = [];

  constructor(fields: ModuleRecordFields) {
    this.fields = fields;
  }

  get sourceFileCount(): number {
    return this.sourceFiles.length;
  }

  appendSourceFile(name: string): void {
    this.sourceFiles.push(name);
  }

  build(): PdbModuleRecord {
    return Object.freeze({
      ...this.fields,
      sectionContribution: Object.freeze({ ...this.fields.sectionContribution }),
      sourceFiles: Object.freeze(this.sourceFiles.slice())
    });
  }
}

const readModuleRecord = (
  reader: PdbStreamReader,
  index: number
): PdbResult<ModuleRecordBuilder> => {
  const recordOffset = reader.offset;
  const prefix = reader.readBytes(MODULE_INFO_HEADER_SIZE, `Module info record ${index}`);
  if (!prefix.ok) return prefix;
  const moduleName = reader.readZeroString(`Module info record ${index} module name`);
  if (!moduleName.ok) return moduleName;
  const objectFileName = reader.readZeroString(`Module info record ${index} object file name`);
  if (!objectFileName.ok) return objectFileName;

  const recordLength = alignUpTo(reader.offset - recordOffset, MODULE_INFO_RECORD_ALIGNMENT);
  const padding = reader.readBytes(
    recordOffset + recordLength - reader.offset,
    `Module info record ${index} padding`
  );
  if (!padding.ok) return padding;

  const view = new DataView(prefix.value.buffer, prefix.value.byteOffset, prefix.value.byteLength);
  const flags = view.getUint16(MODULE_INFO_OFF_FLAGS, true);
  return ok(
    new ModuleRecordBuilder({
      moduleName: moduleName.value,
      objectFileName: objectFileName.value,
      sectionContribution: readSectionContribution(view, MODULE_INFO_OFF_SECTION_CONTRIBUTION),
      flags,
      written: (flags & MODULE_FLAG_WRITTEN) !== 0,
      hasEcInfo: (flags & MODULE_FLAG_HAS_EC_INFO) !== 0,
      typeServerIndex: (flags & MODULE_TYPE_SERVER_INDEX_MASK) >>> MODULE_TYPE_SERVER_INDEX_SHIFT,
      symbolStreamIndex: view.getUint16(MODULE_INFO_OFF_SYMBOL_STREAM, true),
      symbolByteSize: view.getUint32(MODULE_INFO_OFF_SYMBOL_BYTES, true),
      c11ByteSize: view.getUint32(MODULE_INFO_OFF_C11_BYTES, true),
      c13ByteSize: view.getUint32(MODULE_INFO_OFF_C13_BYTES, true),
      declaredFileCount: view.getUint16(MODULE_INFO_OFF_NUM_FILES, true),
      sourceFileNameIndex: view.getUint32(MODULE_INFO_OFF_SOURCE_FILE_NAME_INDEX, true),
      pdbFilePathNameIndex: view.getUint32(MODULE_INFO_OFF_PDB_FILE_PATH_NAME_INDEX, true),
      recordOffset,
      recordLength
    })
  );
};

/**
 * Walks the variable-length module info records. The module count is however many
 * records fit in the substream; a failed record ends the sequence.
 */
export function* iterateModuleRecords(
  substream: Uint8Array
): Generator<PdbResult<ModuleRecordBuilder>, void, undefined> {
  const reader = new PdbStreamReader(substream);
  let index = 0;
  while (reader.bytesRemaining > 0) {
    const record = readModuleRecord(reader, index);
    yield record;
    if (!record.ok) return;
    index += 1;
  }
}

export const decodeModuleInfos = (substream: Uint8Array): PdbResult<ModuleRecordBuilder[]> => {
  const modules: ModuleRecordBuilder[] = [];
  for (const record of iterateModuleRecords(substream)) {
    if (!record.ok) return record;
    modules.push(record.value);
  }
  return ok(modules);
};
