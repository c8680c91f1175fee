"use strict";

// MSF 7.00 superblock magic: "Microsoft C/C++ MSF 7.00\r\n\x1ADS\0\0\0".
export const MSF_MAGIC = "Microsoft C/C++ MSF 7.00\r\n\u001aDS\u0000\u0000\u0000";
export const MSF_SUPERBLOCK_SIZE = 56;
export const MSF_VALID_BLOCK_SIZES = [512, 1024, 2048, 4096] as const;
export const MSF_NIL_STREAM_SIZE = 0xffffffff;

// Fixed stream numbers.
export const PDB_INFO_STREAM = 1;
export const PDB_DBI_STREAM = 3;

export const PDB_INFO_HEADER_SIZE = 28;

// DBI header (64 bytes).
export const DBI_HEADER_SIZE = 64;
export const DBI_VERSION_SIGNATURE = -1;
export const DBI_HEADER_OFF_VERSION_SIGNATURE = 0x00;
export const DBI_HEADER_OFF_VERSION_HEADER = 0x04;
export const DBI_HEADER_OFF_AGE = 0x08;
export const DBI_HEADER_OFF_GLOBAL_SYMBOL_STREAM = 0x0c;
export const DBI_HEADER_OFF_BUILD_NUMBER = 0x0e;
export const DBI_HEADER_OFF_PUBLIC_SYMBOL_STREAM = 0x10;
export const DBI_HEADER_OFF_PDB_DLL_VERSION = 0x12;
export const DBI_HEADER_OFF_SYM_RECORD_STREAM = 0x14;
export const DBI_HEADER_OFF_PDB_DLL_REBUILD = 0x16;
export const DBI_HEADER_OFF_MODULE_INFO_SIZE = 0x18;
export const DBI_HEADER_OFF_SECTION_CONTRIBUTION_SIZE = 0x1c;
export const DBI_HEADER_OFF_SECTION_MAP_SIZE = 0x20;
export const DBI_HEADER_OFF_FILE_INFO_SIZE = 0x24;
export const DBI_HEADER_OFF_TYPE_SERVER_SIZE = 0x28;
export const DBI_HEADER_OFF_MFC_TYPE_SERVER_INDEX = 0x2c;
export const DBI_HEADER_OFF_OPTIONAL_DEBUG_HEADER_SIZE = 0x30;
export const DBI_HEADER_OFF_EC_SUBSTREAM_SIZE = 0x34;
export const DBI_HEADER_OFF_FLAGS = 0x38;
export const DBI_HEADER_OFF_MACHINE_TYPE = 0x3a;
export const DBI_HEADER_OFF_RESERVED = 0x3c;

export const DBI_VERSIONS: Array<[number, string]> = [
  [930803, "V41"],
  [19960307, "V50"],
  [19970606, "V60"],
  [19990903, "V70"],
  [20091201, "V110"]
];

// Oldest layout this decoder understands; present in every PDB written since 1999.
export const DBI_MIN_SUPPORTED_VERSION = 19990903;

// struct DbiBuildNo { MinorVersion : 8; MajorVersion : 7; NewVersionFormat : 1; }
export const DBI_BUILD_MINOR_MASK = 0x00ff;
export const DBI_BUILD_MINOR_SHIFT = 0;
export const DBI_BUILD_MAJOR_MASK = 0x7f00;
export const DBI_BUILD_MAJOR_SHIFT = 8;
export const DBI_BUILD_NEW_FORMAT_MASK = 0x8000;

// struct DbiFlags { IncrementalLinking : 1; IsStripped : 1; HasCTypes : 1; Reserved : 13; }
export const DBI_FLAG_INCREMENTAL = 0x0001;
export const DBI_FLAG_STRIPPED = 0x0002;
export const DBI_FLAG_HAS_CTYPES = 0x0004;

export const DBI_FLAGS: Array<[number, string, string?]> = [
  [DBI_FLAG_INCREMENTAL, "INCREMENTAL", "Linked incrementally"],
  [DBI_FLAG_STRIPPED, "STRIPPED", "Private symbols were stripped"],
  [DBI_FLAG_HAS_CTYPES, "CTYPES", "Linked with /debug:ctypes"]
];

// Module info record: fixed 64-byte prefix, then module name and object file name.
export const MODULE_INFO_HEADER_SIZE = 64;
export const MODULE_INFO_RECORD_ALIGNMENT = 4;
export const MODULE_INFO_OFF_SECTION_CONTRIBUTION = 0x04;
export const MODULE_INFO_OFF_FLAGS = 0x20;
export const MODULE_INFO_OFF_SYMBOL_STREAM = 0x22;
export const MODULE_INFO_OFF_SYMBOL_BYTES = 0x24;
export const MODULE_INFO_OFF_C11_BYTES = 0x28;
export const MODULE_INFO_OFF_C13_BYTES = 0x2c;
export const MODULE_INFO_OFF_NUM_FILES = 0x30;
export const MODULE_INFO_OFF_SOURCE_FILE_NAME_INDEX = 0x38;
export const MODULE_INFO_OFF_PDB_FILE_PATH_NAME_INDEX = 0x3c;

// struct ModInfoFlags { fWritten : 1; fECEnabled : 1; unused : 6; iTSM : 8; }
export const MODULE_FLAG_WRITTEN = 0x0001;
export const MODULE_FLAG_HAS_EC_INFO = 0x0002;
export const MODULE_TYPE_SERVER_INDEX_MASK = 0xff00;
export const MODULE_TYPE_SERVER_INDEX_SHIFT = 8;

// Section contributions.
const SECTION_CONTRIBUTION_VERSION_BASE = 0xeffe0000;
export const SECTION_CONTRIBUTION_VERSION_60 = (SECTION_CONTRIBUTION_VERSION_BASE + 19970605) >>> 0;
export const SECTION_CONTRIBUTION_VERSION_2 = (SECTION_CONTRIBUTION_VERSION_BASE + 20140516) >>> 0;
export const SECTION_CONTRIBUTION_SIZE = 28;
export const SECTION_CONTRIBUTION_V2_SIZE = 32;

// Section map.
export const SECTION_MAP_ENTRY_SIZE = 20;

export const SECTION_MAP_FLAGS: Array<[number, string, string?]> = [
  [0x0001, "READ", "Segment is readable"],
  [0x0002, "WRITE", "Segment is writable"],
  [0x0004, "EXECUTE", "Segment is executable"],
  [0x0008, "ADDRESS_32", "Descriptor describes a 32-bit linear address"],
  [0x0100, "SELECTOR", "Frame represents a selector"],
  [0x0200, "ABSOLUTE", "Frame represents an absolute address"],
  [0x0400, "GROUP", "Descriptor represents a group"]
];

// Debug header stream slots, in on-disk order.
export const DEBUG_STREAM_KINDS = [
  "fpo",
  "exception",
  "fixup",
  "omapToSource",
  "omapFromSource",
  "sectionHeaders",
  "tokenRidMap",
  "xdata",
  "pdata",
  "newFpo",
  "originalSectionHeaders"
] as const;

export const INVALID_STREAM_INDEX = 0xffff;

// Opaque records pulled from indexed streams.
export const COFF_SECTION_HEADER_SIZE = 40;
export const COFF_SECTION_NAME_SIZE = 8;
export const FPO_DATA_SIZE = 16;

// FPO_DATA attributes: cbProlog : 8; cbRegs : 3; fHasSEH : 1; fUseBP : 1; reserved : 1; cbFrame : 2.
export const FPO_PROLOG_SIZE_MASK = 0x00ff;
export const FPO_SAVED_REGISTERS_MASK = 0x0700;
export const FPO_SAVED_REGISTERS_SHIFT = 8;
export const FPO_HAS_SEH_MASK = 0x0800;
export const FPO_USES_BASE_POINTER_MASK = 0x1000;
export const FPO_FRAME_TYPE_MASK = 0xc000;
export const FPO_FRAME_TYPE_SHIFT = 14;

export const FPO_FRAME_TYPES: Array<[number, string]> = [
  [0, "FPO"],
  [1, "TRAP"],
  [2, "TSS"],
  [3, "NONFPO"]
];

// Name hash table (EC substream).
export const NAME_HASH_TABLE_SIGNATURE = 0xeffeeffe;
export const NAME_HASH_TABLE_VERSIONS = [1, 2] as const;

export const PDB_MACHINE_TYPES: Array<[number, string]> = [
  [0x0000, "Unknown"],
  [0x0013, "AM33"],
  [0x014c, "x86"],
  [0x0166, "MIPS R4000"],
  [0x0169, "MIPS WCE v2"],
  [0x01a2, "SH3"],
  [0x01a3, "SH3 DSP"],
  [0x01a6, "SH4"],
  [0x01a8, "SH5"],
  [0x01c0, "ARM"],
  [0x01c2, "Thumb"],
  [0x01c4, "ARMv7 (Thumb-2)"],
  [0x01f0, "PowerPC"],
  [0x01f1, "PowerPC FP"],
  [0x0200, "Itanium"],
  [0x0266, "MIPS16"],
  [0x0366, "MIPS FPU"],
  [0x0466, "MIPS16 FPU"],
  [0x0ebc, "EFI byte code"],
  [0x8664, "x64"],
  [0x9041, "M32R"],
  [0xaa64, "ARM64"],
  [0xffff, "Invalid"]
];
