"use strict";

import { toHex32 } from "../../binary-utils.js";
import { PDB_INFO_HEADER_SIZE } from "./constants.js";
import { corrupt, ok, type PdbResult } from "./errors.js";
import { toDataView } from "./stream-reader.js";
import type { PdbAgeSource, PdbInfoHeader } from "./types.js";

const toHexByte = (value: number): string => value.toString(16).padStart(2, "0");

export const formatGuid = (bytes: Uint8Array): string => {
  const view = toDataView(bytes);
  const tail = [...bytes.subarray(8, 16)].map(toHexByte);
  return (
    `${toHex32(view.getUint32(0, true), 8).slice(2)}-` +
    `${view.getUint16(4, true).toString(16).padStart(4, "0")}-` +
    `${view.getUint16(6, true).toString(16).padStart(4, "0")}-` +
    `${tail.slice(0, 2).join("")}-${tail.slice(2).join("")}`
  ).toLowerCase();
};

export const parsePdbInfoStream = (stream: Uint8Array): PdbResult<PdbInfoHeader> => {
  if (stream.byteLength < PDB_INFO_HEADER_SIZE) {
    return corrupt("PDB Info stream does not contain a header.");
  }
  const view = toDataView(stream);
  return ok({
    version: view.getUint32(0, true),
    signature: view.getUint32(4, true),
    age: view.getUint32(8, true),
    guid: formatGuid(stream.subarray(12, 28))
  });
};

export const toAgeSource = (info: PdbInfoHeader): PdbAgeSource => ({
  getAge: () => info.age
});
