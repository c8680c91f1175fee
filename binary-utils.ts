"use strict";

export const formatHumanSize = (byteCount: number): string => {
  const base = 1024;
  const units = ["B", "KB", "MB", "GB", "TB"];
  let unitIndex = 0;
  let value = byteCount;
  while (value >= base && unitIndex < units.length - 1) {
    value /= base;
    unitIndex += 1;
  }
  const roundedValue = value >= 100 ? Math.round(value) : Math.round(value * 10) / 10;
  return `${roundedValue} ${units[unitIndex]} (${byteCount} bytes)`;
};

export const toHex32 = (value: number, width = 0): string => {
  const masked = Number(value >>> 0);
  return "0x" + masked.toString(16).padStart(width, "0");
};

// Fixed-width ASCII field such as a COFF section name; stops at the first NUL.
export const readAsciiString = (dataView: DataView, offset: number, maxLength: number): string => {
  let result = "";
  for (let index = 0; index < maxLength && offset + index < dataView.byteLength; index += 1) {
    const codePoint = dataView.getUint8(offset + index);
    if (codePoint === 0) break;
    result += String.fromCharCode(codePoint);
  }
  return result;
};

export const alignUpTo = (value: number, alignment: number): number => {
  if (!alignment) return value >>> 0;
  const mask = (alignment - 1) >>> 0;
  return ((value + mask) & ~mask) >>> 0;
};
