"use strict";

import { decodeDbiHeader, readBuildNumber, readDbiFlags } from "./dbi-header.js";
import { segmentDbiSubstreams } from "./dbi-substreams.js";
import {
  DebugStreamIndexTable,
  loadFpoRecords,
  loadSectionHeaders
} from "./debug-streams.js";
import { corrupt, ok, type PdbResult } from "./errors.js";
import { decodeFileInfo, type FileNameTable } from "./file-info.js";
import { decodeModuleInfos } from "./module-info.js";
import { parseNameHashTable } from "./name-hash-table.js";
import {
  decodeSectionContributions,
  visitSectionContributions as visitContributionSet
} from "./section-contributions.js";
import { decodeSectionMap } from "./section-map.js";
import { PdbStreamReader } from "./stream-reader.js";
import type {
  DbiBuildNumber,
  DbiFlags,
  DbiHeader,
  DebugStreamKind,
  NameTableLoader,
  PdbAgeSource,
  PdbCoffSectionHeader,
  PdbFileInfo,
  PdbFpoRecord,
  PdbModuleRecord,
  PdbNameTable,
  PdbSectionContributionSet,
  PdbSectionMap,
  PdbStreamDirectory,
  SectionContributionVisitor
} from "./types.js";

export type DbiStreamState = "unloaded" | "loading" | "ready" | "failed";

export interface DbiStreamCollaborators {
  directory: PdbStreamDirectory;
  info: PdbAgeSource;
  nameTableLoader?: NameTableLoader;
}

interface DbiStreamContents {
  header: DbiHeader;
  modules: readonly PdbModuleRecord[];
  sectionContributions: PdbSectionContributionSet;
  sectionMap: PdbSectionMap;
  sectionHeaders: readonly PdbCoffSectionHeader[];
  fpoRecords: readonly PdbFpoRecord[];
  fileInfo: PdbFileInfo;
  fileNames: FileNameTable;
  debugStreams: DebugStreamIndexTable;
  typeServerMap: Uint8Array;
  ecNames: PdbNameTable;
}

/**
 * The DBI (debug information) stream of a PDB: module list, section contributions,
 * section map, per-module source files and the indexed debug streams.
 *
 * `reload` decodes everything in one pass and may only be called once. Accessors
 * are available after it succeeds; calling them earlier throws.
 */
export class DbiStream {
  readonly bytes: Uint8Array;
  private readonly directory: PdbStreamDirectory;
  private readonly info: PdbAgeSource;
  private readonly nameTableLoader: NameTableLoader;
  private currentState: DbiStreamState = "unloaded";
  private contents: DbiStreamContents | null = null;
  private readonly issues: string[] = [];

  constructor(bytes: Uint8Array, collaborators: DbiStreamCollaborators) {
    this.bytes = bytes;
    this.directory = collaborators.directory;
    this.info = collaborators.info;
    this.nameTableLoader = collaborators.nameTableLoader ?? parseNameHashTable;
  }

  get state(): DbiStreamState {
    return this.currentState;
  }

  reload(): PdbResult<void> {
    if (this.currentState !== "unloaded") {
      throw new Error(`DBI stream reload() called in state "${this.currentState}".`);
    }
    this.currentState = "loading";
    const loaded = this.decode();
    if (!loaded.ok) {
      this.currentState = "failed";
      return loaded;
    }
    this.contents = loaded.value;
    this.currentState = "ready";
    return ok(undefined);
  }

  // Writing the stream back is not supported; there is nothing to flush.
  commit(): PdbResult<void> {
    return ok(undefined);
  }

  private decode(): PdbResult<DbiStreamContents> {
    const header = decodeDbiHeader(this.bytes, this.info.getAge());
    if (!header.ok) return header;

    const reader = new PdbStreamReader(this.bytes);
    const substreams = segmentDbiSubstreams(reader, header.value);
    if (!substreams.ok) return substreams;

    const moduleBuilders = decodeModuleInfos(substreams.value.moduleInfo);
    if (!moduleBuilders.ok) return moduleBuilders;

    const debugStreams = new DebugStreamIndexTable(substreams.value.debugStreamIndices);

    const sectionContributions = decodeSectionContributions(substreams.value.sectionContributions);
    if (!sectionContributions.ok) return sectionContributions;
    const sectionHeaders = loadSectionHeaders(debugStreams, this.directory);
    if (!sectionHeaders.ok) return sectionHeaders;
    const sectionMap = decodeSectionMap(substreams.value.sectionMap, this.issues);
    if (!sectionMap.ok) return sectionMap;
    const fileInfo = decodeFileInfo(substreams.value.fileInfo, moduleBuilders.value, this.issues);
    if (!fileInfo.ok) return fileInfo;
    const fpoRecords = loadFpoRecords(debugStreams, this.directory);
    if (!fpoRecords.ok) return fpoRecords;

    if (reader.bytesRemaining > 0) {
      return corrupt(`Found ${reader.bytesRemaining} unexpected bytes in DBI Stream.`);
    }

    const ecNames = this.nameTableLoader(substreams.value.ecNames);
    if (!ecNames.ok) return ecNames;
    if (substreams.value.ecNames.byteLength === 0) this.issues.push("DBI EC substream is empty.");

    return ok({
      header: header.value,
      modules: Object.freeze(moduleBuilders.value.map(builder => builder.build())),
      sectionContributions: sectionContributions.value,
      sectionMap: sectionMap.value,
      sectionHeaders: sectionHeaders.value,
      fpoRecords: fpoRecords.value,
      fileInfo: fileInfo.value.info,
      fileNames: fileInfo.value.fileNames,
      debugStreams,
      typeServerMap: substreams.value.typeServerMap,
      ecNames: ecNames.value
    });
  }

  private get loaded(): DbiStreamContents {
    if (this.contents === null) {
      throw new Error(`DBI stream is not loaded (state "${this.currentState}").`);
    }
    return this.contents;
  }

  getIssues(): readonly string[] {
    return this.issues;
  }

  getHeader(): Readonly<DbiHeader> {
    return this.loaded.header;
  }

  getDbiVersion(): number {
    return this.loaded.header.versionHeader;
  }

  getAge(): number {
    return this.loaded.header.age;
  }

  getGlobalSymbolStreamIndex(): number {
    return this.loaded.header.globalSymbolStreamIndex;
  }

  getPublicSymbolStreamIndex(): number {
    return this.loaded.header.publicSymbolStreamIndex;
  }

  getSymRecordStreamIndex(): number {
    return this.loaded.header.symRecordStreamIndex;
  }

  getPdbDllVersion(): number {
    return this.loaded.header.pdbDllVersion;
  }

  getBuildNumber(): DbiBuildNumber {
    return readBuildNumber(this.loaded.header.buildNumber);
  }

  getBuildMajorVersion(): number {
    return this.getBuildNumber().major;
  }

  getBuildMinorVersion(): number {
    return this.getBuildNumber().minor;
  }

  getFlags(): DbiFlags {
    return readDbiFlags(this.loaded.header.flags);
  }

  isIncrementallyLinked(): boolean {
    return this.getFlags().incrementallyLinked;
  }

  isStripped(): boolean {
    return this.getFlags().stripped;
  }

  hasCTypes(): boolean {
    return this.getFlags().hasCTypes;
  }

  getMachineType(): number {
    return this.loaded.header.machineType;
  }

  modules(): readonly PdbModuleRecord[] {
    return this.loaded.modules;
  }

  getSectionContributionVersion(): PdbSectionContributionSet["version"] {
    return this.loaded.sectionContributions.version;
  }

  visitSectionContributions(visitor: SectionContributionVisitor): void {
    visitContributionSet(this.loaded.sectionContributions, visitor);
  }

  getSectionMap(): PdbSectionMap {
    return this.loaded.sectionMap;
  }

  getSectionHeaders(): readonly PdbCoffSectionHeader[] {
    return this.loaded.sectionHeaders;
  }

  getFpoRecords(): readonly PdbFpoRecord[] {
    return this.loaded.fpoRecords;
  }

  getFileInfo(): PdbFileInfo {
    return this.loaded.fileInfo;
  }

  getFileNameForIndex(index: number): PdbResult<string> {
    return this.loaded.fileNames.resolve(index);
  }

  getDebugStreamIndex(kind: DebugStreamKind): number {
    return this.loaded.debugStreams.get(kind);
  }

  getDebugStreams(): DebugStreamIndexTable {
    return this.loaded.debugStreams;
  }

  getTypeServerMap(): Uint8Array {
    return this.loaded.typeServerMap;
  }

  getEcNames(): PdbNameTable {
    return this.loaded.ecNames;
  }
}
