"use strict";

import { DBI_HEADER_SIZE } from "./constants.js";
import { ok, type PdbResult } from "./errors.js";
import type { PdbStreamReader } from "./stream-reader.js";
import type { DbiHeader, DbiSubstreams } from "./types.js";

// Slices the substreams in on-disk order. The reader is left positioned after the
// debug stream index array so the caller can check for leftover bytes.
export const segmentDbiSubstreams = (
  reader: PdbStreamReader,
  header: DbiHeader
): PdbResult<DbiSubstreams> => {
  const headerSet = reader.setOffset(DBI_HEADER_SIZE, "DBI substream start");
  if (!headerSet.ok) return headerSet;

  const moduleInfo = reader.readBytes(header.moduleInfoSize, "DBI module info substream");
  if (!moduleInfo.ok) return moduleInfo;
  const sectionContributions = reader.readBytes(
    header.sectionContributionSize,
    "DBI section contribution substream"
  );
  if (!sectionContributions.ok) return sectionContributions;
  const sectionMap = reader.readBytes(header.sectionMapSize, "DBI section map substream");
  if (!sectionMap.ok) return sectionMap;
  const fileInfo = reader.readBytes(header.fileInfoSize, "DBI file info substream");
  if (!fileInfo.ok) return fileInfo;
  const typeServerMap = reader.readBytes(header.typeServerSize, "DBI type server substream");
  if (!typeServerMap.ok) return typeServerMap;
  const ecNames = reader.readBytes(header.ecSubstreamSize, "DBI EC substream");
  if (!ecNames.ok) return ecNames;

  const indexCount = Math.floor(header.optionalDebugHeaderSize / 2);
  const debugStreamIndices = reader.readFixedArray(
    indexCount,
    2,
    (view, offset) => view.getUint16(offset, true),
    "DBI optional debug header"
  );
  if (!debugStreamIndices.ok) return debugStreamIndices;

  return ok({
    moduleInfo: moduleInfo.value,
    sectionContributions: sectionContributions.value,
    sectionMap: sectionMap.value,
    fileInfo: fileInfo.value,
    typeServerMap: typeServerMap.value,
    ecNames: ecNames.value,
    debugStreamIndices: debugStreamIndices.value
  });
};
