"use strict";

import { corrupt, indexOutOfBounds, ok, type PdbResult } from "./errors.js";
import type { ModuleRecordBuilder } from "./module-info.js";
import { PdbStreamReader } from "./stream-reader.js";
import type { PdbFileInfo } from "./types.js";

const readUint16Entry = (view: DataView, offset: number): number => view.getUint16(offset, true);
const readUint32Entry = (view: DataView, offset: number): number => view.getUint32(offset, true);

// Offsets into a shared buffer of NUL-terminated names. Strings are only decoded when asked for.
export class FileNameTable {
  readonly offsets: readonly number[];
  readonly names: Uint8Array;

  constructor(offsets: readonly number[], names: Uint8Array) {
    this.offsets = offsets;
    this.names = names;
  }

  get count(): number {
    return this.offsets.length;
  }

  resolve(index: number): PdbResult<string> {
    const offset = this.offsets[index];
    if (offset === undefined) {
      return indexOutOfBounds(
        `File name index ${index} is outside the ${this.offsets.length} decoded file name offsets.`
      );
    }
    const reader = new PdbStreamReader(this.names);
    const seek = reader.setOffset(offset, "File name offset");
    if (!seek.ok) return seek;
    return reader.readZeroString(`File name at offset ${offset}`);
  }
}

export interface DecodedFileInfo {
  info: PdbFileInfo;
  fileNames: FileNameTable;
}

/**
 * Decodes the file info substream and appends each module's source file names to its builder.
 *
 * Layout:
 *   u16 NumModules; u16 NumSourceFiles;
 *   u16 ModIndices[NumModules]; u16 ModFileCounts[NumModules];
 *   u32 FileNameOffsets[sum(ModFileCounts)]; char Names[];
 *
 * NumSourceFiles wraps at 65536 in real PDBs, so the file count is the sum of ModFileCounts.
 */
export const decodeFileInfo = (
  substream: Uint8Array,
  modules: readonly ModuleRecordBuilder[],
  issues: string[]
): PdbResult<DecodedFileInfo> => {
  const reader = new PdbStreamReader(substream);
  const declaredModuleCount = reader.readUint16("DBI file info header");
  if (!declaredModuleCount.ok) return declaredModuleCount;
  const declaredSourceFileCount = reader.readUint16("DBI file info header");
  if (!declaredSourceFileCount.ok) return declaredSourceFileCount;

  if (declaredModuleCount.value !== modules.length) {
    return corrupt(
      `FileInfo substream module count (${declaredModuleCount.value}) doesn't match DBI (${modules.length}).`
    );
  }

  // Kept only to stay in step with the layout.
  const moduleIndices = reader.readFixedArray(modules.length, 2, readUint16Entry, "DBI file info module indices");
  if (!moduleIndices.ok) return moduleIndices;
  const moduleFileCounts = reader.readFixedArray(
    modules.length,
    2,
    readUint16Entry,
    "DBI file info module file counts"
  );
  if (!moduleFileCounts.ok) return moduleFileCounts;

  const sourceFileCount = moduleFileCounts.value.reduce((total, count) => total + count, 0);
  if (sourceFileCount % 0x10000 !== declaredSourceFileCount.value) {
    issues.push(
      `File info header declares ${declaredSourceFileCount.value} source files; module counts add up to ${sourceFileCount}.`
    );
  }

  const offsets = reader.readFixedArray(
    sourceFileCount,
    4,
    readUint32Entry,
    "DBI file info name offsets"
  );
  if (!offsets.ok) return offsets;
  const fileNames = new FileNameTable(offsets.value, reader.readRest());

  let nextFileIndex = 0;
  for (const [moduleIndex, module] of modules.entries()) {
    const fileCount = moduleFileCounts.value[moduleIndex] ?? 0;
    for (let fileIndex = 0; fileIndex < fileCount; fileIndex += 1, nextFileIndex += 1) {
      const name = fileNames.resolve(nextFileIndex);
      if (!name.ok) return name;
      module.appendSourceFile(name.value);
    }
    if (module.fields.declaredFileCount !== fileCount) {
      issues.push(
        `Module ${moduleIndex} (${module.fields.moduleName}) declares ${module.fields.declaredFileCount} files; file info lists ${fileCount}.`
      );
    }
  }

  return ok({
    info: {
      declaredModuleCount: declaredModuleCount.value,
      declaredSourceFileCount: declaredSourceFileCount.value,
      sourceFileCount,
      moduleIndices: moduleIndices.value,
      moduleFileCounts: moduleFileCounts.value
    },
    fileNames
  });
};
