"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { createEmptyNameTable, parseNameHashTable } from "../../analyzers/pdb/name-hash-table.js";
import { buildNameHashTable } from "../fixtures/pdb-fixtures.js";

void test("parseNameHashTable reads the header, buckets and names", () => {
  const result = parseNameHashTable(buildNameHashTable(["kernel32.dll", "user32.dll"]));
  assert.ok(result.ok);
  const table = result.value;
  assert.strictEqual(table.signature, 0xeffeeffe);
  assert.strictEqual(table.hashVersion, 1);
  assert.strictEqual(table.nameCount, 2);
  assert.deepStrictEqual(table.ids, [1, 14, 0]);
  assert.deepStrictEqual(table.getString(14), { ok: true, value: "user32.dll" });
  assert.deepStrictEqual(table.names(), { ok: true, value: ["kernel32.dll", "user32.dll"] });
});

void test("parseNameHashTable accepts hash version 2", () => {
  const result = parseNameHashTable(buildNameHashTable([], { hashVersion: 2 }));
  assert.ok(result.ok);
  assert.strictEqual(result.value.hashVersion, 2);
  assert.deepStrictEqual(result.value.names(), { ok: true, value: [] });
});

void test("parseNameHashTable rejects a wrong signature", () => {
  assert.deepStrictEqual(parseNameHashTable(buildNameHashTable([], { signature: 0x12345678 })), {
    ok: false,
    error: { kind: "corrupt-file", message: "Invalid hash table signature 0x12345678." }
  });
});

void test("parseNameHashTable reports unknown hash versions as unsupported", () => {
  assert.deepStrictEqual(parseNameHashTable(buildNameHashTable([], { hashVersion: 3 })), {
    ok: false,
    error: { kind: "unsupported-feature", message: "Unsupported hash version 3." }
  });
});

void test("parseNameHashTable requires the trailing name count", () => {
  assert.deepStrictEqual(parseNameHashTable(buildNameHashTable(["a.dll"], { omitNameCount: true })), {
    ok: false,
    error: { kind: "corrupt-file", message: "Missing name count." }
  });
});

void test("getString bounds-checks string offsets", () => {
  const result = parseNameHashTable(buildNameHashTable(["a.dll"]));
  assert.ok(result.ok);
  assert.deepStrictEqual(result.value.getString(99), {
    ok: false,
    error: { kind: "corrupt-file", message: "Name table string offset 99 is outside a 7-byte stream." }
  });
});

void test("parseNameHashTable reads an empty byte range as an empty table", () => {
  const result = parseNameHashTable(new Uint8Array(0));
  assert.ok(result.ok);
  assert.strictEqual(result.value.signature, 0xeffeeffe);
  assert.strictEqual(result.value.nameCount, 0);
  assert.deepStrictEqual(result.value.ids, []);
});

void test("createEmptyNameTable holds no names", () => {
  const table = createEmptyNameTable();
  assert.strictEqual(table.nameCount, 0);
  assert.deepStrictEqual(table.names(), { ok: true, value: [] });
});
