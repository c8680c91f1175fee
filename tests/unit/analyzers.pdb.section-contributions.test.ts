"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import {
  decodeSectionContributions,
  visitSectionContributions
} from "../../analyzers/pdb/section-contributions.js";
import type { PdbSectionContribution, PdbSectionContribution2 } from "../../analyzers/pdb/types.js";
import { V2_TAG, V60_TAG, buildSectionContributionSubstream } from "../fixtures/pdb-fixtures.js";

const collect = (substream: Uint8Array): { v60: PdbSectionContribution[]; v2: PdbSectionContribution2[] } => {
  const result = decodeSectionContributions(substream);
  assert.ok(result.ok);
  const v60: PdbSectionContribution[] = [];
  const v2: PdbSectionContribution2[] = [];
  visitSectionContributions(result.value, {
    visit: contribution => v60.push(contribution),
    visitV2: contribution => v2.push(contribution)
  });
  return { v60, v2 };
};

void test("decodeSectionContributions reads V60 entries and visits them with visit", () => {
  const substream = buildSectionContributionSubstream(V60_TAG, [
    { sectionIndex: 1, offset: 0x10, size: 0x30, characteristics: 0x60000020, moduleIndex: 0, dataCrc: 0xabcd },
    { sectionIndex: 2, offset: -4, size: 8, characteristics: 0x40000040, moduleIndex: 1 }
  ]);
  const result = decodeSectionContributions(substream);
  assert.ok(result.ok);
  assert.strictEqual(result.value.version, "v60");
  assert.strictEqual(result.value.versionTag, V60_TAG);

  const { v60, v2 } = collect(substream);
  assert.deepStrictEqual(v2, []);
  assert.deepStrictEqual(v60, [
    {
      sectionIndex: 1,
      offset: 0x10,
      size: 0x30,
      characteristics: 0x60000020,
      moduleIndex: 0,
      dataCrc: 0xabcd,
      relocationCrc: 0
    },
    {
      sectionIndex: 2,
      offset: -4,
      size: 8,
      characteristics: 0x40000040,
      moduleIndex: 1,
      dataCrc: 0,
      relocationCrc: 0
    }
  ]);
});

void test("decodeSectionContributions reads V2 entries with their COFF section index", () => {
  const substream = buildSectionContributionSubstream(V2_TAG, [
    { sectionIndex: 3, size: 16, moduleIndex: 4, coffSectionIndex: 9 }
  ]);
  assert.strictEqual(substream.length, 36);
  const { v60, v2 } = collect(substream);
  assert.deepStrictEqual(v60, []);
  assert.deepStrictEqual(v2, [
    {
      sectionIndex: 3,
      offset: 0,
      size: 16,
      characteristics: 0,
      moduleIndex: 4,
      dataCrc: 0,
      relocationCrc: 0,
      coffSectionIndex: 9
    }
  ]);
});

void test("decodeSectionContributions accepts a version tag with no entries", () => {
  const result = decodeSectionContributions(buildSectionContributionSubstream(V2_TAG, []));
  assert.ok(result.ok);
  assert.strictEqual(result.value.version, "v2");
  assert.strictEqual(result.value.entries.length, 0);
});

void test("decodeSectionContributions rejects a partial trailing entry", () => {
  const substream = buildSectionContributionSubstream(V60_TAG, [{}, {}]).subarray(0, 4 + 28 + 4);
  assert.deepStrictEqual(decodeSectionContributions(substream), {
    ok: false,
    error: { kind: "corrupt-file", message: "Invalid number of bytes of section contributions." }
  });
});

void test("decodeSectionContributions reports unknown version tags as unsupported", () => {
  assert.deepStrictEqual(decodeSectionContributions(buildSectionContributionSubstream(0x12345678, [])), {
    ok: false,
    error: { kind: "unsupported-feature", message: "Unsupported DBI Section Contribution version 0x12345678." }
  });
});

void test("decodeSectionContributions rejects a substream without a version tag", () => {
  assert.deepStrictEqual(decodeSectionContributions(new Uint8Array(2)), {
    ok: false,
    error: { kind: "corrupt-file", message: "DBI section contribution version is truncated." }
  });
});
