"use strict";

import { PDB_DBI_STREAM, PDB_INFO_STREAM } from "./constants.js";
import { mapPdbMachine } from "./dbi-header.js";
import { DbiStream } from "./dbi-stream.js";
import { noSuchStream, ok, type PdbResult } from "./errors.js";
import { parsePdbInfoStream, toAgeSource } from "./info-stream.js";
import { hasMsfSignature, parseMsfFile, type MsfFile } from "./msf.js";
import type { NameTableLoader, PdbInfoHeader } from "./types.js";

export interface PdbParseOptions {
  nameTableLoader?: NameTableLoader;
}

export interface PdbParseResult {
  isPdb: true;
  msf: MsfFile;
  info: PdbInfoHeader;
  dbi: DbiStream;
  issues: string[];
}

export const probePdb = (view: DataView): string | null =>
  hasMsfSignature(view) ? "Microsoft PDB debug symbols" : null;

const readFixedStream = (msf: MsfFile, streamIndex: number): PdbResult<Uint8Array> => {
  if (streamIndex >= msf.streamCount()) return noSuchStream(streamIndex);
  return msf.getStreamBytes(streamIndex);
};

export const parsePdb = (bytes: Uint8Array, options: PdbParseOptions = {}): PdbResult<PdbParseResult> => {
  const msf = parseMsfFile(bytes);
  if (!msf.ok) return msf;

  const infoBytes = readFixedStream(msf.value, PDB_INFO_STREAM);
  if (!infoBytes.ok) return infoBytes;
  const info = parsePdbInfoStream(infoBytes.value);
  if (!info.ok) return info;

  const dbiBytes = readFixedStream(msf.value, PDB_DBI_STREAM);
  if (!dbiBytes.ok) return dbiBytes;
  const dbi = new DbiStream(dbiBytes.value, {
    directory: msf.value,
    info: toAgeSource(info.value),
    nameTableLoader: options.nameTableLoader
  });
  const loaded = dbi.reload();
  if (!loaded.ok) return loaded;

  return ok({ isPdb: true, msf: msf.value, info: info.value, dbi, issues: [...dbi.getIssues()] });
};

export const buildPdbLabel = (parsed: PdbParseResult | null): string | null => {
  if (!parsed) return null;
  const parts = ["MSF 7.00", mapPdbMachine(parsed.dbi.getMachineType())];
  const moduleCount = parsed.dbi.modules().length;
  parts.push(`${moduleCount} module${moduleCount === 1 ? "" : "s"}`);
  return `Microsoft PDB (${parts.join(", ")})`;
};

export { DbiStream, hasMsfSignature, parseMsfFile };
