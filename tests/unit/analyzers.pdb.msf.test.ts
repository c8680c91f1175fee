"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { formatGuid, parsePdbInfoStream } from "../../analyzers/pdb/info-stream.js";
import { hasMsfSignature, parseMsfFile } from "../../analyzers/pdb/msf.js";
import { buildInfoStream, buildMsfFile, buildPdbFile } from "../fixtures/pdb-fixtures.js";

void test("parseMsfFile reads the superblock and stream directory", () => {
  const result = parseMsfFile(buildPdbFile());
  assert.ok(result.ok);
  const msf = result.value;
  assert.deepStrictEqual(msf.superBlock, {
    blockSize: 512,
    freeBlockMapBlock: 1,
    numBlocks: 8,
    numDirectoryBytes: 36,
    unknown: 0,
    blockMapAddress: 7
  });
  assert.strictEqual(msf.streamCount(), 5);
  assert.deepStrictEqual(msf.streamBlocks, [[], [3], [], [4], [5]]);
  assert.strictEqual(msf.getStreamLength(3), 352);
  assert.strictEqual(msf.getStreamLength(2), 0);
  assert.strictEqual(msf.getStreamLength(99), 0);
});

void test("MsfFile gathers stream bytes across blocks", () => {
  const large = new Uint8Array(1300).map((_, index) => index & 0xff);
  const result = parseMsfFile(buildMsfFile([new Uint8Array(0), large]));
  assert.ok(result.ok);
  assert.deepStrictEqual(result.value.streamBlocks[1], [3, 4, 5]);
  assert.deepStrictEqual(result.value.getStreamBytes(1), { ok: true, value: large });
  assert.deepStrictEqual(result.value.getStreamBytes(2), {
    ok: false,
    error: { kind: "no-such-stream", message: "Stream 2 does not exist in the PDB." }
  });
});

void test("parseMsfFile validates the superblock", () => {
  const expectCorrupt = (bytes: Uint8Array, message: string): void => {
    assert.deepStrictEqual(parseMsfFile(bytes), { ok: false, error: { kind: "corrupt-file", message } });
  };
  expectCorrupt(new Uint8Array(10), "MSF superblock is truncated.");
  expectCorrupt(new Uint8Array(512), "Missing MSF 7.00 signature.");

  const badBlockSize = buildPdbFile();
  new DataView(badBlockSize.buffer).setUint32(32, 256, true);
  expectCorrupt(badBlockSize, "Unsupported MSF block size 256.");

  const file = buildPdbFile();
  const uneven = new Uint8Array(file.length + 1);
  uneven.set(file);
  expectCorrupt(uneven, "File size is not a multiple of block size.");
});

void test("hasMsfSignature checks the 32-byte magic", () => {
  assert.strictEqual(hasMsfSignature(new DataView(buildPdbFile().buffer)), true);
  assert.strictEqual(hasMsfSignature(new DataView(new Uint8Array(16).buffer)), false);
});

void test("parsePdbInfoStream reads version, signature, age and GUID", () => {
  assert.deepStrictEqual(parsePdbInfoStream(buildInfoStream(5)), {
    ok: true,
    value: {
      version: 20000404,
      signature: 0x5f3e2a10,
      age: 5,
      guid: "12345678-1234-5678-9abc-def001020304"
    }
  });
});

void test("parsePdbInfoStream rejects a truncated header", () => {
  assert.deepStrictEqual(parsePdbInfoStream(new Uint8Array(27)), {
    ok: false,
    error: { kind: "corrupt-file", message: "PDB Info stream does not contain a header." }
  });
});

void test("formatGuid pads every group", () => {
  const bytes = new Uint8Array(16);
  bytes[0] = 0x0a;
  bytes[15] = 0x01;
  assert.strictEqual(formatGuid(bytes), "0000000a-0000-0000-0000-000000000001");
});
