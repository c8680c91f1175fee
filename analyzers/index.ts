"use strict";

export { buildPdbLabel, parsePdb, probePdb } from "./pdb/index.js";
export type { PdbParseOptions, PdbParseResult } from "./pdb/index.js";
export { DbiStream } from "./pdb/dbi-stream.js";
export type { DbiStreamCollaborators, DbiStreamState } from "./pdb/dbi-stream.js";
export { decodeDbiHeader, describeDbiVersion, mapPdbMachine } from "./pdb/dbi-header.js";
export { DebugStreamIndexTable } from "./pdb/debug-streams.js";
export { describePdbError } from "./pdb/errors.js";
export type { PdbError, PdbErrorKind, PdbResult } from "./pdb/errors.js";
export { FileNameTable } from "./pdb/file-info.js";
export { parsePdbInfoStream } from "./pdb/info-stream.js";
export { MsfFile, hasMsfSignature, parseMsfFile } from "./pdb/msf.js";
export { parseNameHashTable } from "./pdb/name-hash-table.js";
export { PdbStreamReader } from "./pdb/stream-reader.js";
export type * from "./pdb/types.js";
