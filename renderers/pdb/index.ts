"use strict";

import { formatHumanSize, toHex32 } from "../../binary-utils.js";
import { escapeHtml, renderDefinitionRow, renderFlagChips } from "../../html-utils.js";
import { DBI_FLAGS, FPO_FRAME_TYPES, SECTION_MAP_FLAGS } from "../../analyzers/pdb/constants.js";
import { describeDbiVersion, mapPdbMachine } from "../../analyzers/pdb/dbi-header.js";
import type { PdbParseResult } from "../../analyzers/pdb/index.js";
import type {
  PdbFpoRecord,
  PdbModuleRecord,
  PdbSectionContribution,
  PdbSectionContribution2
} from "../../analyzers/pdb/types.js";

const MAX_TABLE_ROWS = 200;

const renderLimitNote = (shown: number, total: number, noun: string): string =>
  shown < total
    ? `<div class="smallNote">Only the first ${shown} of ${total} ${noun} are shown.</div>`
    : "";

const renderIssues = (issues: readonly string[]): string => {
  if (!issues.length) return "";
  const items = issues.map(issue => `<li>${escapeHtml(issue)}</li>`).join("");
  return `<h4>Warnings</h4><ul class="issueList">${items}</ul>`;
};

const renderStreamIndex = (value: number): string =>
  value === 0xffff ? '<span class="dim">none</span>' : String(value);

const renderContainer = (parsed: PdbParseResult): string => {
  const { superBlock } = parsed.msf;
  const rows = [
    renderDefinitionRow("Block size", `${superBlock.blockSize} bytes`, "MSF page size."),
    renderDefinitionRow(
      "Blocks",
      `${superBlock.numBlocks} (${formatHumanSize(superBlock.numBlocks * superBlock.blockSize)})`
    ),
    renderDefinitionRow("Streams", String(parsed.msf.streamCount()), "Entries in the stream directory.")
  ];
  return `<h4>MSF container</h4><dl>${rows.join("")}</dl>`;
};

const renderInfo = (parsed: PdbParseResult): string => {
  const { info } = parsed;
  const rows = [
    renderDefinitionRow("Version", String(info.version)),
    renderDefinitionRow("Signature", toHex32(info.signature, 8), "Link timestamp written by the linker."),
    renderDefinitionRow("Age", String(info.age), "Incremented each time the PDB is updated."),
    renderDefinitionRow("GUID", escapeHtml(info.guid), "Matches the RSDS record of the image.")
  ];
  return `<h4>PDB Info stream</h4><dl>${rows.join("")}</dl>`;
};

const renderDbiHeader = (parsed: PdbParseResult): string => {
  const { dbi } = parsed;
  const header = dbi.getHeader();
  const build = dbi.getBuildNumber();
  const rows = [
    renderDefinitionRow(
      "DBI version",
      `${header.versionHeader} (${escapeHtml(describeDbiVersion(header.versionHeader))})`
    ),
    renderDefinitionRow("Age", String(header.age)),
    renderDefinitionRow(
      "Toolchain build",
      `${build.major}.${build.minor}${build.isNewVersionFormat ? "" : " (old format)"}`,
      "Version of the linker that wrote the PDB."
    ),
    renderDefinitionRow("PDB DLL", `${header.pdbDllVersion}.${header.pdbDllRebuild}`),
    renderDefinitionRow(
      "Machine",
      `${escapeHtml(mapPdbMachine(header.machineType))} (${toHex32(header.machineType, 4)})`
    ),
    renderDefinitionRow("Flags", renderFlagChips(header.flags, DBI_FLAGS)),
    renderDefinitionRow(
      "Symbol streams",
      [
        `global ${renderStreamIndex(header.globalSymbolStreamIndex)}`,
        `public ${renderStreamIndex(header.publicSymbolStreamIndex)}`,
        `records ${renderStreamIndex(header.symRecordStreamIndex)}`
      ].join(" / ")
    )
  ];
  return `<h4>DBI header</h4><dl>${rows.join("")}</dl>`;
};

const renderModuleRow = (module: PdbModuleRecord, index: number): string =>
  [
    "<tr>",
    `<td>${index}</td>`,
    `<td>${escapeHtml(module.moduleName)}</td>`,
    `<td>${escapeHtml(module.objectFileName)}</td>`,
    `<td>${renderStreamIndex(module.symbolStreamIndex)}</td>`,
    `<td>${module.sourceFiles.map(file => escapeHtml(file)).join("<br>") || "-"}</td>`,
    "</tr>"
  ].join("");

const renderModules = (modules: readonly PdbModuleRecord[]): string => {
  if (!modules.length) return '<p class="dim">No modules are listed in the DBI stream.</p>';
  const shown = modules.slice(0, MAX_TABLE_ROWS);
  return [
    `<h4>Modules (${modules.length})</h4>`,
    '<table class="byteView"><thead><tr><th>#</th><th>Module</th><th>Object file</th>',
    "<th>Symbol stream</th><th>Source files</th></tr></thead>",
    `<tbody>${shown.map(renderModuleRow).join("")}</tbody></table>`,
    renderLimitNote(shown.length, modules.length, "modules")
  ].join("");
};

const renderContributionCells = (contribution: PdbSectionContribution): string =>
  [
    `<td>${contribution.sectionIndex}</td>`,
    `<td>${toHex32(contribution.offset, 8)}</td>`,
    `<td>${contribution.size}</td>`,
    `<td>${toHex32(contribution.characteristics, 8)}</td>`,
    `<td>${contribution.moduleIndex}</td>`
  ].join("");

const renderSectionContributions = (parsed: PdbParseResult): string => {
  const rows: string[] = [];
  let total = 0;
  parsed.dbi.visitSectionContributions({
    visit: (contribution: PdbSectionContribution) => {
      total += 1;
      if (rows.length < MAX_TABLE_ROWS) rows.push(`<tr>${renderContributionCells(contribution)}</tr>`);
    },
    visitV2: (contribution: PdbSectionContribution2) => {
      total += 1;
      if (rows.length < MAX_TABLE_ROWS) {
        rows.push(
          `<tr>${renderContributionCells(contribution)}<td>${contribution.coffSectionIndex}</td></tr>`
        );
      }
    }
  });
  const version = parsed.dbi.getSectionContributionVersion();
  if (!total) return `<h4>Section contributions (${version})</h4><p class="dim">None.</p>`;
  return [
    `<h4>Section contributions (${version}, ${total})</h4>`,
    '<table class="byteView"><thead><tr><th>Section</th><th>Offset</th><th>Size</th>',
    `<th>Characteristics</th><th>Module</th>${version === "v2" ? "<th>COFF section</th>" : ""}`,
    "</tr></thead>",
    `<tbody>${rows.join("")}</tbody></table>`,
    renderLimitNote(rows.length, total, "contributions")
  ].join("");
};

const renderSectionMap = (parsed: PdbParseResult): string => {
  const sectionMap = parsed.dbi.getSectionMap();
  if (!sectionMap.entries.length) return "<h4>Section map</h4><p class=\"dim\">No entries.</p>";
  const shown = sectionMap.entries.slice(0, MAX_TABLE_ROWS);
  const rows = shown
    .map(
      (entry, index) =>
        `<tr><td>${index}</td><td>${renderFlagChips(entry.flags, SECTION_MAP_FLAGS)}</td>` +
        `<td>${entry.frame}</td><td>${toHex32(entry.offset, 8)}</td><td>${entry.sectionLength}</td></tr>`
    )
    .join("");
  return [
    `<h4>Section map (${sectionMap.count} entries, ${sectionMap.logicalCount} logical)</h4>`,
    '<table class="byteView"><thead><tr><th>#</th><th>Flags</th><th>Frame</th><th>Offset</th>',
    "<th>Length</th></tr></thead>",
    `<tbody>${rows}</tbody></table>`,
    renderLimitNote(shown.length, sectionMap.entries.length, "section map entries")
  ].join("");
};

const renderSectionHeaders = (parsed: PdbParseResult): string => {
  const headers = parsed.dbi.getSectionHeaders();
  if (!headers.length) return "<h4>Section headers</h4><p class=\"dim\">None.</p>";
  const shown = headers.slice(0, MAX_TABLE_ROWS);
  const rows = shown
    .map(
      section =>
        `<tr><td>${escapeHtml(section.name || "(unnamed)")}</td>` +
        `<td>${toHex32(section.virtualAddress, 8)}</td><td>${section.virtualSize}</td>` +
        `<td>${toHex32(section.characteristics, 8)}</td></tr>`
    )
    .join("");
  return [
    `<h4>Section headers (${headers.length})</h4>`,
    '<table class="byteView"><thead><tr><th>Name</th><th>RVA</th><th>Virtual size</th>',
    "<th>Characteristics</th></tr></thead>",
    `<tbody>${rows}</tbody></table>`,
    renderLimitNote(shown.length, headers.length, "section headers")
  ].join("");
};

const describeFrameType = (frameType: number): string =>
  FPO_FRAME_TYPES.find(([code]) => code === frameType)?.[1] ?? String(frameType);

const renderFpoRow = (record: PdbFpoRecord): string =>
  [
    "<tr>",
    `<td>${toHex32(record.startOffset, 8)}</td>`,
    `<td>${record.procedureSize}</td>`,
    `<td>${record.localsDwords}</td>`,
    `<td>${record.paramsDwords}</td>`,
    `<td>${record.prologSize}</td>`,
    `<td>${record.savedRegisters}</td>`,
    `<td>${record.usesBasePointer ? "yes" : "no"}</td>`,
    `<td>${describeFrameType(record.frameType)}${record.hasSeh ? " (SEH)" : ""}</td>`,
    "</tr>"
  ].join("");

const renderFpo = (parsed: PdbParseResult): string => {
  const records = parsed.dbi.getFpoRecords();
  if (!records.length) return '<h4>FPO data</h4><p class="dim">No FPO data.</p>';
  const shown = records.slice(0, MAX_TABLE_ROWS);
  return [
    `<h4>FPO data</h4><p>${records.length} frame records.</p>`,
    '<table class="byteView"><thead><tr><th>Start</th><th>Size</th><th>Locals</th><th>Params</th>',
    "<th>Prolog</th><th>Saved regs</th><th>EBP</th><th>Frame</th></tr></thead>",
    `<tbody>${shown.map(renderFpoRow).join("")}</tbody></table>`,
    renderLimitNote(shown.length, records.length, "frame records")
  ].join("");
};

const renderPdb = (parsed: PdbParseResult | null): string => {
  if (!parsed) return "";
  return [
    "<h3>Microsoft PDB</h3>",
    renderContainer(parsed),
    renderInfo(parsed),
    renderDbiHeader(parsed),
    renderModules(parsed.dbi.modules()),
    renderSectionContributions(parsed),
    renderSectionMap(parsed),
    renderSectionHeaders(parsed),
    renderFpo(parsed),
    renderIssues(parsed.issues)
  ].join("");
};

export { renderPdb };
