"use strict";

import type { DEBUG_STREAM_KINDS } from "./constants.js";
import type { PdbResult } from "./errors.js";

export interface DbiHeader {
  versionSignature: number;
  versionHeader: number;
  age: number;
  globalSymbolStreamIndex: number;
  buildNumber: number;
  publicSymbolStreamIndex: number;
  pdbDllVersion: number;
  symRecordStreamIndex: number;
  pdbDllRebuild: number;
  moduleInfoSize: number;
  sectionContributionSize: number;
  sectionMapSize: number;
  fileInfoSize: number;
  typeServerSize: number;
  mfcTypeServerIndex: number;
  optionalDebugHeaderSize: number;
  ecSubstreamSize: number;
  flags: number;
  machineType: number;
  reserved: number;
}

export interface DbiBuildNumber {
  major: number;
  minor: number;
  isNewVersionFormat: boolean;
}

export interface DbiFlags {
  incrementallyLinked: boolean;
  stripped: boolean;
  hasCTypes: boolean;
}

export interface DbiSubstreams {
  moduleInfo: Uint8Array;
  sectionContributions: Uint8Array;
  sectionMap: Uint8Array;
  fileInfo: Uint8Array;
  typeServerMap: Uint8Array;
  ecNames: Uint8Array;
  debugStreamIndices: number[];
}

export interface PdbSectionContribution {
  sectionIndex: number;
  offset: number;
  size: number;
  characteristics: number;
  moduleIndex: number;
  dataCrc: number;
  relocationCrc: number;
}

export interface PdbSectionContribution2 extends PdbSectionContribution {
  coffSectionIndex: number;
}

export type PdbSectionContributionSet =
  | { version: "v60"; versionTag: number; entries: readonly PdbSectionContribution[] }
  | { version: "v2"; versionTag: number; entries: readonly PdbSectionContribution2[] };

export interface SectionContributionVisitor {
  visit(contribution: PdbSectionContribution): void;
  visitV2(contribution: PdbSectionContribution2): void;
}

export interface PdbModuleRecord {
  readonly moduleName: string;
  readonly objectFileName: string;
  readonly sectionContribution: Readonly<PdbSectionContribution>;
  readonly flags: number;
  readonly written: boolean;
  readonly hasEcInfo: boolean;
  readonly typeServerIndex: number;
  readonly symbolStreamIndex: number;
  readonly symbolByteSize: number;
  readonly c11ByteSize: number;
  readonly c13ByteSize: number;
  readonly declaredFileCount: number;
  readonly sourceFileNameIndex: number;
  readonly pdbFilePathNameIndex: number;
  readonly recordOffset: number;
  readonly recordLength: number;
  readonly sourceFiles: readonly string[];
}

export interface PdbSectionMapEntry {
  flags: number;
  overlay: number;
  group: number;
  frame: number;
  sectionName: number;
  className: number;
  offset: number;
  sectionLength: number;
}

export interface PdbSectionMap {
  count: number;
  logicalCount: number;
  entries: readonly PdbSectionMapEntry[];
}

export interface PdbCoffSectionHeader {
  name: string;
  virtualSize: number;
  virtualAddress: number;
  sizeOfRawData: number;
  pointerToRawData: number;
  pointerToRelocations: number;
  pointerToLinenumbers: number;
  numberOfRelocations: number;
  numberOfLinenumbers: number;
  characteristics: number;
}

export interface PdbFpoRecord {
  startOffset: number;
  procedureSize: number;
  localsDwords: number;
  paramsDwords: number;
  attributes: number;
  prologSize: number;
  savedRegisters: number;
  hasSeh: boolean;
  usesBasePointer: boolean;
  frameType: number;
}

export type DebugStreamKind = (typeof DEBUG_STREAM_KINDS)[number];

export interface PdbFileInfo {
  declaredModuleCount: number;
  declaredSourceFileCount: number;
  sourceFileCount: number;
  moduleIndices: readonly number[];
  moduleFileCounts: readonly number[];
}

export interface PdbNameTable {
  signature: number;
  hashVersion: number;
  nameCount: number;
  ids: readonly number[];
  getString(id: number): PdbResult<string>;
  names(): PdbResult<string[]>;
}

// Collaborators supplied by the surrounding container.
export interface PdbStreamDirectory {
  streamCount(): number;
  getStreamLength(streamIndex: number): number;
  getStreamBytes(streamIndex: number): PdbResult<Uint8Array>;
}

export interface PdbAgeSource {
  getAge(): number;
}

export type NameTableLoader = (bytes: Uint8Array) => PdbResult<PdbNameTable>;

export interface PdbInfoHeader {
  version: number;
  signature: number;
  age: number;
  guid: string;
}

export interface MsfSuperBlock {
  blockSize: number;
  freeBlockMapBlock: number;
  numBlocks: number;
  numDirectoryBytes: number;
  unknown: number;
  blockMapAddress: number;
}
