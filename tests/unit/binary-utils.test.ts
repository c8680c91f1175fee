"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { alignUpTo, formatHumanSize, readAsciiString, toHex32 } from "../../binary-utils.js";

void test("formatHumanSize reports readable units", () => {
  assert.strictEqual(formatHumanSize(0), "0 B (0 bytes)");
  assert.strictEqual(formatHumanSize(1536), "1.5 KB (1536 bytes)");
  assert.strictEqual(formatHumanSize(4096 * 512), "2 MB (2097152 bytes)");
});

void test("alignUpTo rounds module record lengths to four bytes", () => {
  assert.strictEqual(alignUpTo(82, 4), 84);
  assert.strictEqual(alignUpTo(88, 4), 88);
  assert.strictEqual(alignUpTo(5, 0), 5);
});

void test("readAsciiString stops at NUL and respects the field width", () => {
  const bytes = new Uint8Array([0x2e, 0x74, 0x65, 0x78, 0x74, 0x00, 0x41, 0x42]);
  const view = new DataView(bytes.buffer);
  assert.strictEqual(readAsciiString(view, 0, 8), ".text");
  assert.strictEqual(readAsciiString(view, 1, 3), "tex");
  assert.strictEqual(readAsciiString(view, 6, 8), "AB");
});

void test("toHex32 masks to unsigned and pads width", () => {
  assert.strictEqual(toHex32(-1), "0xffffffff");
  assert.strictEqual(toHex32(0x8664, 4), "0x8664");
  assert.strictEqual(toHex32(0x1a, 8), "0x0000001a");
});
