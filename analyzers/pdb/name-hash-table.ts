"use strict";

import { toHex32 } from "../../binary-utils.js";
import { NAME_HASH_TABLE_SIGNATURE, NAME_HASH_TABLE_VERSIONS } from "./constants.js";
import { corrupt, ok, unsupported, type PdbResult } from "./errors.js";
import { PdbStreamReader } from "./stream-reader.js";
import type { PdbNameTable } from "./types.js";

const createNameTable = (
  signature: number,
  hashVersion: number,
  buffer: Uint8Array,
  ids: readonly number[],
  nameCount: number
): PdbNameTable => {
  const getString = (id: number): PdbResult<string> => {
    const reader = new PdbStreamReader(buffer);
    const seek = reader.setOffset(id, "Name table string offset");
    if (!seek.ok) return seek;
    return reader.readZeroString(`Name table string ${id}`);
  };
  return {
    signature,
    hashVersion,
    nameCount,
    ids,
    getString,
    names: () => {
      const names: string[] = [];
      for (const id of ids) {
        if (id === 0) continue;
        const name = getString(id);
        if (!name.ok) return name;
        names.push(name.value);
      }
      return ok(names);
    }
  };
};

export const createEmptyNameTable = (): PdbNameTable =>
  createNameTable(NAME_HASH_TABLE_SIGNATURE, 1, new Uint8Array(0), [], 0);

// Header: u32 signature, u32 hash version, u32 buffer size; then the buffer,
// u32 bucket count, u32 ids[bucket count], u32 name count. No bytes at all is an empty table.
export const parseNameHashTable = (bytes: Uint8Array): PdbResult<PdbNameTable> => {
  if (bytes.byteLength === 0) return ok(createEmptyNameTable());
  const reader = new PdbStreamReader(bytes);
  const signature = reader.readUint32("Name hash table header");
  if (!signature.ok) return signature;
  const hashVersion = reader.readUint32("Name hash table header");
  if (!hashVersion.ok) return hashVersion;
  const byteSize = reader.readUint32("Name hash table header");
  if (!byteSize.ok) return byteSize;

  if (signature.value !== NAME_HASH_TABLE_SIGNATURE) {
    return corrupt(`Invalid hash table signature ${toHex32(signature.value, 8)}.`);
  }
  if (!NAME_HASH_TABLE_VERSIONS.some(version => version === hashVersion.value)) {
    return unsupported(`Unsupported hash version ${hashVersion.value}.`);
  }

  const buffer = reader.readBytes(byteSize.value, "Name hash table string buffer");
  if (!buffer.ok) return buffer;
  const bucketCount = reader.readUint32("Name hash table bucket count");
  if (!bucketCount.ok) return bucketCount;
  const ids = reader.readFixedArray(
    bucketCount.value,
    4,
    (view, offset) => view.getUint32(offset, true),
    "Name hash table buckets"
  );
  if (!ids.ok) return ids;
  if (reader.bytesRemaining < 4) return corrupt("Missing name count.");
  const nameCount = reader.readUint32("Name hash table name count");
  if (!nameCount.ok) return nameCount;

  return ok(createNameTable(signature.value, hashVersion.value, buffer.value, ids.value, nameCount.value));
};
