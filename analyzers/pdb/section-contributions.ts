"use strict";

import { toHex32 } from "../../binary-utils.js";
import {
  SECTION_CONTRIBUTION_SIZE,
  SECTION_CONTRIBUTION_V2_SIZE,
  SECTION_CONTRIBUTION_VERSION_2,
  SECTION_CONTRIBUTION_VERSION_60
} from "./constants.js";
import { corrupt, ok, unsupported, type PdbResult } from "./errors.js";
import { PdbStreamReader } from "./stream-reader.js";
import type {
  PdbSectionContribution,
  PdbSectionContribution2,
  PdbSectionContributionSet,
  SectionContributionVisitor
} from "./types.js";

// SectionContrib: ISect u16, pad, Off i32, Size i32, Characteristics u32, Imod u16, pad,
// DataCrc u32, RelocCrc u32.
export const readSectionContribution = (view: DataView, offset: number): PdbSectionContribution => ({
  sectionIndex: view.getUint16(offset, true),
  offset: view.getInt32(offset + 4, true),
  size: view.getInt32(offset + 8, true),
  characteristics: view.getUint32(offset + 12, true),
  moduleIndex: view.getUint16(offset + 16, true),
  dataCrc: view.getUint32(offset + 20, true),
  relocationCrc: view.getUint32(offset + 24, true)
});

export const readSectionContribution2 = (view: DataView, offset: number): PdbSectionContribution2 => ({
  ...readSectionContribution(view, offset),
  coffSectionIndex: view.getUint32(offset + SECTION_CONTRIBUTION_SIZE, true)
});

const readContributionArray = <T>(
  reader: PdbStreamReader,
  recordSize: number,
  decode: (view: DataView, offset: number) => T
): PdbResult<T[]> => {
  if (reader.bytesRemaining % recordSize !== 0) {
    return corrupt("Invalid number of bytes of section contributions.");
  }
  return reader.readFixedArray(
    reader.bytesRemaining / recordSize,
    recordSize,
    decode,
    "DBI section contributions"
  );
};

export const decodeSectionContributions = (
  substream: Uint8Array
): PdbResult<PdbSectionContributionSet> => {
  const reader = new PdbStreamReader(substream);
  const versionTag = reader.readUint32("DBI section contribution version");
  if (!versionTag.ok) return versionTag;

  if (versionTag.value === SECTION_CONTRIBUTION_VERSION_60) {
    const entries = readContributionArray(reader, SECTION_CONTRIBUTION_SIZE, readSectionContribution);
    if (!entries.ok) return entries;
    return ok({ version: "v60", versionTag: versionTag.value, entries: entries.value });
  }
  if (versionTag.value === SECTION_CONTRIBUTION_VERSION_2) {
    const entries = readContributionArray(reader, SECTION_CONTRIBUTION_V2_SIZE, readSectionContribution2);
    if (!entries.ok) return entries;
    return ok({ version: "v2", versionTag: versionTag.value, entries: entries.value });
  }
  return unsupported(
    `Unsupported DBI Section Contribution version ${toHex32(versionTag.value, 8)}.`
  );
};

export const visitSectionContributions = (
  contributions: PdbSectionContributionSet,
  visitor: SectionContributionVisitor
): void => {
  if (contributions.version === "v60") {
    for (const contribution of contributions.entries) visitor.visit(contribution);
  } else {
    for (const contribution of contributions.entries) visitor.visitV2(contribution);
  }
};
