"use strict";

import { toHex32 } from "../../binary-utils.js";
import {
  DBI_BUILD_MAJOR_MASK,
  DBI_BUILD_MAJOR_SHIFT,
  DBI_BUILD_MINOR_MASK,
  DBI_BUILD_MINOR_SHIFT,
  DBI_BUILD_NEW_FORMAT_MASK,
  DBI_FLAG_HAS_CTYPES,
  DBI_FLAG_INCREMENTAL,
  DBI_FLAG_STRIPPED,
  DBI_HEADER_OFF_AGE,
  DBI_HEADER_OFF_BUILD_NUMBER,
  DBI_HEADER_OFF_EC_SUBSTREAM_SIZE,
  DBI_HEADER_OFF_FILE_INFO_SIZE,
  DBI_HEADER_OFF_FLAGS,
  DBI_HEADER_OFF_GLOBAL_SYMBOL_STREAM,
  DBI_HEADER_OFF_MACHINE_TYPE,
  DBI_HEADER_OFF_MFC_TYPE_SERVER_INDEX,
  DBI_HEADER_OFF_MODULE_INFO_SIZE,
  DBI_HEADER_OFF_OPTIONAL_DEBUG_HEADER_SIZE,
  DBI_HEADER_OFF_PDB_DLL_REBUILD,
  DBI_HEADER_OFF_PDB_DLL_VERSION,
  DBI_HEADER_OFF_PUBLIC_SYMBOL_STREAM,
  DBI_HEADER_OFF_RESERVED,
  DBI_HEADER_OFF_SECTION_CONTRIBUTION_SIZE,
  DBI_HEADER_OFF_SECTION_MAP_SIZE,
  DBI_HEADER_OFF_SYM_RECORD_STREAM,
  DBI_HEADER_OFF_TYPE_SERVER_SIZE,
  DBI_HEADER_OFF_VERSION_HEADER,
  DBI_HEADER_OFF_VERSION_SIGNATURE,
  DBI_HEADER_SIZE,
  DBI_MIN_SUPPORTED_VERSION,
  DBI_VERSIONS,
  DBI_VERSION_SIGNATURE,
  PDB_MACHINE_TYPES
} from "./constants.js";
import { corrupt, ok, unsupported, type PdbResult } from "./errors.js";
import type { DbiBuildNumber, DbiFlags, DbiHeader } from "./types.js";

// Substreams whose sizes the format keeps 4-byte aligned, with the name used in errors.
const ALIGNED_SUBSTREAMS: Array<[keyof DbiHeader, string]> = [
  ["moduleInfoSize", "MODI"],
  ["sectionContributionSize", "section contribution"],
  ["sectionMapSize", "section map"],
  ["fileInfoSize", "file info"],
  ["typeServerSize", "type server"]
];

export const readDbiHeaderFields = (view: DataView): DbiHeader => ({
  versionSignature: view.getInt32(DBI_HEADER_OFF_VERSION_SIGNATURE, true),
  versionHeader: view.getUint32(DBI_HEADER_OFF_VERSION_HEADER, true),
  age: view.getUint32(DBI_HEADER_OFF_AGE, true),
  globalSymbolStreamIndex: view.getUint16(DBI_HEADER_OFF_GLOBAL_SYMBOL_STREAM, true),
  buildNumber: view.getUint16(DBI_HEADER_OFF_BUILD_NUMBER, true),
  publicSymbolStreamIndex: view.getUint16(DBI_HEADER_OFF_PUBLIC_SYMBOL_STREAM, true),
  pdbDllVersion: view.getUint16(DBI_HEADER_OFF_PDB_DLL_VERSION, true),
  symRecordStreamIndex: view.getUint16(DBI_HEADER_OFF_SYM_RECORD_STREAM, true),
  pdbDllRebuild: view.getUint16(DBI_HEADER_OFF_PDB_DLL_REBUILD, true),
  moduleInfoSize: view.getUint32(DBI_HEADER_OFF_MODULE_INFO_SIZE, true),
  sectionContributionSize: view.getUint32(DBI_HEADER_OFF_SECTION_CONTRIBUTION_SIZE, true),
  sectionMapSize: view.getUint32(DBI_HEADER_OFF_SECTION_MAP_SIZE, true),
  fileInfoSize: view.getUint32(DBI_HEADER_OFF_FILE_INFO_SIZE, true),
  typeServerSize: view.getUint32(DBI_HEADER_OFF_TYPE_SERVER_SIZE, true),
  mfcTypeServerIndex: view.getUint32(DBI_HEADER_OFF_MFC_TYPE_SERVER_INDEX, true),
  optionalDebugHeaderSize: view.getUint32(DBI_HEADER_OFF_OPTIONAL_DEBUG_HEADER_SIZE, true),
  ecSubstreamSize: view.getUint32(DBI_HEADER_OFF_EC_SUBSTREAM_SIZE, true),
  flags: view.getUint16(DBI_HEADER_OFF_FLAGS, true),
  machineType: view.getUint16(DBI_HEADER_OFF_MACHINE_TYPE, true),
  reserved: view.getUint32(DBI_HEADER_OFF_RESERVED, true)
});

export const sumSubstreamSizes = (header: DbiHeader): number =>
  header.moduleInfoSize +
  header.sectionContributionSize +
  header.sectionMapSize +
  header.fileInfoSize +
  header.typeServerSize +
  header.optionalDebugHeaderSize +
  header.ecSubstreamSize;

/**
 * Reads and validates the fixed DBI header. `expectedAge` comes from the PDB Info stream;
 * the two ages must agree for the DBI stream to belong to this PDB.
 */
export const decodeDbiHeader = (stream: Uint8Array, expectedAge: number): PdbResult<DbiHeader> => {
  if (stream.byteLength < DBI_HEADER_SIZE) {
    return corrupt("DBI Stream does not contain a header.");
  }
  const header = readDbiHeaderFields(
    new DataView(stream.buffer, stream.byteOffset, DBI_HEADER_SIZE)
  );

  if (header.versionSignature !== DBI_VERSION_SIGNATURE) {
    return corrupt("Invalid DBI version signature.");
  }
  if (header.versionHeader < DBI_MIN_SUPPORTED_VERSION) {
    return unsupported(`Unsupported DBI version ${header.versionHeader}.`);
  }
  if (header.age !== expectedAge >>> 0) {
    return corrupt(`DBI Age (${header.age}) does not match PDB Age (${expectedAge}).`);
  }

  const expectedLength = DBI_HEADER_SIZE + sumSubstreamSizes(header);
  if (stream.byteLength !== expectedLength) {
    return corrupt(
      `DBI Length (${stream.byteLength}) does not equal sum of substreams (${expectedLength}).`
    );
  }

  for (const [field, name] of ALIGNED_SUBSTREAMS) {
    if (header[field] % 4 !== 0) return corrupt(`DBI ${name} substream not aligned.`);
  }
  return ok(header);
};

export const readBuildNumber = (buildNumber: number): DbiBuildNumber => ({
  major: (buildNumber & DBI_BUILD_MAJOR_MASK) >>> DBI_BUILD_MAJOR_SHIFT,
  minor: (buildNumber & DBI_BUILD_MINOR_MASK) >>> DBI_BUILD_MINOR_SHIFT,
  isNewVersionFormat: (buildNumber & DBI_BUILD_NEW_FORMAT_MASK) !== 0
});

export const readDbiFlags = (flags: number): DbiFlags => ({
  incrementallyLinked: (flags & DBI_FLAG_INCREMENTAL) !== 0,
  stripped: (flags & DBI_FLAG_STRIPPED) !== 0,
  hasCTypes: (flags & DBI_FLAG_HAS_CTYPES) !== 0
});

export const describeDbiVersion = (version: number): string =>
  DBI_VERSIONS.find(([code]) => code === version)?.[1] ?? `unknown (${version})`;

export const mapPdbMachine = (machineType: number): string =>
  PDB_MACHINE_TYPES.find(([code]) => code === machineType)?.[1] ||
  `machine=${toHex32(machineType, 4)}`;
