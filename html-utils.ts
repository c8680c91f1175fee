"use strict";

import { toHex32 } from "./binary-utils.js";

export const escapeHtml = (input: unknown): string =>
  String(input)
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");

export const renderDefinitionRow = (
  label: string,
  valueHtml: string,
  tooltip?: string | null
): string =>
  `<dt${tooltip ? ` title="${escapeHtml(tooltip)}"` : ""}>${label}</dt><dd>${valueHtml}</dd>`;

// One chip per known bit; set bits are highlighted.
export const renderFlagChips = (
  mask: number,
  flags: ReadonlyArray<[number, string, string?]>
): string =>
  `<div class="optionsRow">${flags
    .map(([bit, name, explanation]) => {
      const isSet = (mask & bit) !== 0;
      const label = explanation ? `${name} - ${explanation}` : name;
      const tooltip = `${label} (${toHex32(bit, 4)})`;
      return `<span class="opt ${isSet ? "sel" : "dim"}" title="${escapeHtml(tooltip)}">${name}</span>`;
    })
    .join("")}</div>`;
