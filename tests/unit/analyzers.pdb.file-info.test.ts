"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { FileNameTable, decodeFileInfo } from "../../analyzers/pdb/file-info.js";
import { decodeModuleInfos, type ModuleRecordBuilder } from "../../analyzers/pdb/module-info.js";
import {
  type ModuleFixture,
  buildFileInfoSubstream,
  buildModuleInfoSubstream,
  packNames
} from "../fixtures/pdb-fixtures.js";

const loadModules = (modules?: ModuleFixture[]): ModuleRecordBuilder[] => {
  const result = decodeModuleInfos(buildModuleInfoSubstream(modules));
  assert.ok(result.ok);
  return result.value;
};

const TWO_MODULES_ONE_FILE_EACH: ModuleFixture[] = [
  { moduleName: "a.obj", objectFileName: "a.obj", declaredFileCount: 1 },
  { moduleName: "b.obj", objectFileName: "b.obj", declaredFileCount: 1 }
];

void test("decodeFileInfo assigns file names to modules in order", () => {
  const modules = loadModules(TWO_MODULES_ONE_FILE_EACH);
  const names = packNames(["a.c", "b.c"]);
  assert.deepStrictEqual(names.offsets, [0, 4]);
  const issues: string[] = [];
  const result = decodeFileInfo(
    buildFileInfoSubstream({ moduleFileCounts: [1, 1], offsets: names.offsets, names: names.buffer }),
    modules,
    issues
  );
  assert.ok(result.ok);
  assert.deepStrictEqual(
    modules.map(module => module.build().sourceFiles),
    [["a.c"], ["b.c"]]
  );
  assert.deepStrictEqual(result.value.info, {
    declaredModuleCount: 2,
    declaredSourceFileCount: 2,
    sourceFileCount: 2,
    moduleIndices: [0, 0],
    moduleFileCounts: [1, 1]
  });
  assert.strictEqual(result.value.fileNames.count, 2);
  assert.deepStrictEqual(issues, []);
});

void test("decodeFileInfo lets modules share file names", () => {
  const modules = loadModules([
    { moduleName: "a.obj", objectFileName: "a.obj", declaredFileCount: 2 },
    { moduleName: "b.obj", objectFileName: "b.obj", declaredFileCount: 1 }
  ]);
  const names = packNames(["a.c", "common.h"]);
  const result = decodeFileInfo(
    buildFileInfoSubstream({ moduleFileCounts: [2, 1], offsets: [0, 4, 4], names: names.buffer }),
    modules,
    []
  );
  assert.ok(result.ok);
  assert.deepStrictEqual(
    modules.map(module => module.build().sourceFiles),
    [["a.c", "common.h"], ["common.h"]]
  );
});

void test("decodeFileInfo ignores a wrapped NumSourceFiles field", () => {
  const modules = loadModules(TWO_MODULES_ONE_FILE_EACH);
  const names = packNames(["a.c", "b.c"]);
  const issues: string[] = [];
  const result = decodeFileInfo(
    buildFileInfoSubstream({
      moduleFileCounts: [1, 1],
      offsets: names.offsets,
      names: names.buffer,
      declaredSourceFileCount: 0
    }),
    modules,
    issues
  );
  assert.ok(result.ok);
  assert.strictEqual(result.value.info.sourceFileCount, 2);
  assert.strictEqual(result.value.info.declaredSourceFileCount, 0);
  assert.deepStrictEqual(issues, ["File info header declares 0 source files; module counts add up to 2."]);
});

void test("decodeFileInfo notes modules whose own file count disagrees", () => {
  const modules = loadModules([
    { moduleName: "a.obj", objectFileName: "a.obj", declaredFileCount: 3 },
    { moduleName: "b.obj", objectFileName: "b.obj", declaredFileCount: 0 }
  ]);
  const names = packNames(["a.c"]);
  const issues: string[] = [];
  const result = decodeFileInfo(
    buildFileInfoSubstream({ moduleFileCounts: [1, 0], offsets: names.offsets, names: names.buffer }),
    modules,
    issues
  );
  assert.ok(result.ok);
  assert.deepStrictEqual(issues, ["Module 0 (a.obj) declares 3 files; file info lists 1."]);
});

void test("decodeFileInfo rejects a module count that differs from the module info substream", () => {
  const modules = loadModules(TWO_MODULES_ONE_FILE_EACH);
  assert.deepStrictEqual(
    decodeFileInfo(buildFileInfoSubstream({ moduleFileCounts: [0, 0], declaredModuleCount: 3 }), modules, []),
    {
      ok: false,
      error: { kind: "corrupt-file", message: "FileInfo substream module count (3) doesn't match DBI (2)." }
    }
  );
});

void test("decodeFileInfo rejects a file name offset past the names buffer", () => {
  const modules = loadModules(TWO_MODULES_ONE_FILE_EACH);
  const names = packNames(["a.c", "b.c"]);
  assert.deepStrictEqual(
    decodeFileInfo(
      buildFileInfoSubstream({ moduleFileCounts: [1, 1], offsets: [0, 64], names: names.buffer }),
      modules,
      []
    ),
    {
      ok: false,
      error: { kind: "corrupt-file", message: "File name offset 64 is outside a 8-byte stream." }
    }
  );
});

void test("decodeFileInfo rejects offsets missing from a truncated substream", () => {
  const modules = loadModules(TWO_MODULES_ONE_FILE_EACH);
  const bytes = buildFileInfoSubstream({ moduleFileCounts: [1, 1], offsets: [0] });
  assert.deepStrictEqual(decodeFileInfo(bytes, modules, []), {
    ok: false,
    error: { kind: "corrupt-file", message: "DBI file info name offsets is truncated." }
  });
});

void test("FileNameTable resolves names lazily and bounds-checks the index", () => {
  const names = packNames(["a.c", "b.c"]);
  const table = new FileNameTable(names.offsets, names.buffer);
  assert.deepStrictEqual(table.resolve(1), { ok: true, value: "b.c" });
  assert.deepStrictEqual(table.resolve(2), {
    ok: false,
    error: { kind: "index-out-of-bounds", message: "File name index 2 is outside the 2 decoded file name offsets." }
  });
});

void test("decodeFileInfo counts more than 65535 source files without wrapping", () => {
  const modules = loadModules([
    { moduleName: "a.obj", objectFileName: "a.obj", declaredFileCount: 0xffff },
    { moduleName: "b.obj", objectFileName: "b.obj", declaredFileCount: 0xffff }
  ]);
  const names = packNames(["a.c"]);
  const issues: string[] = [];
  const result = decodeFileInfo(
    buildFileInfoSubstream({
      moduleFileCounts: [0xffff, 0xffff],
      offsets: new Array<number>(0x1fffe).fill(0),
      names: names.buffer,
      declaredSourceFileCount: 0xfffe
    }),
    modules,
    issues
  );
  assert.ok(result.ok);
  assert.strictEqual(result.value.info.sourceFileCount, 131070);
  assert.strictEqual(result.value.fileNames.count, 131070);
  const secondModuleFiles = modules.map(module => module.build().sourceFiles)[1] ?? [];
  assert.strictEqual(secondModuleFiles.length, 0xffff);
  assert.strictEqual(secondModuleFiles[0xfffe], "a.c");
  assert.deepStrictEqual(issues, []);
});
