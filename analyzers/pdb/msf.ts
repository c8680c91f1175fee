"use strict";

import {
  MSF_MAGIC,
  MSF_NIL_STREAM_SIZE,
  MSF_SUPERBLOCK_SIZE,
  MSF_VALID_BLOCK_SIZES
} from "./constants.js";
import { corrupt, noSuchStream, ok, type PdbResult } from "./errors.js";
import { PdbStreamReader, toDataView } from "./stream-reader.js";
import type { MsfSuperBlock, PdbStreamDirectory } from "./types.js";

export const hasMsfSignature = (view: DataView): boolean => {
  if (view.byteLength < MSF_MAGIC.length) return false;
  for (let index = 0; index < MSF_MAGIC.length; index += 1) {
    if (view.getUint8(index) !== MSF_MAGIC.charCodeAt(index)) return false;
  }
  return true;
};

const blockCountFor = (byteCount: number, blockSize: number): number =>
  Math.ceil(byteCount / blockSize);

// Copies a block-mapped byte range into one contiguous buffer.
const gatherBlocks = (
  file: Uint8Array,
  blockSize: number,
  blocks: readonly number[],
  byteCount: number,
  label: string
): PdbResult<Uint8Array> => {
  const output = new Uint8Array(byteCount);
  let written = 0;
  for (const block of blocks) {
    const start = block * blockSize;
    const chunkSize = Math.min(blockSize, byteCount - written);
    if (start + chunkSize > file.byteLength) {
      return corrupt(`${label} refers to block ${block}, past the end of the file.`);
    }
    output.set(file.subarray(start, start + chunkSize), written);
    written += chunkSize;
  }
  return ok(output);
};

export class MsfFile implements PdbStreamDirectory {
  readonly bytes: Uint8Array;
  readonly superBlock: MsfSuperBlock;
  readonly streamSizes: readonly number[];
  readonly streamBlocks: ReadonlyArray<readonly number[]>;

  constructor(
    bytes: Uint8Array,
    superBlock: MsfSuperBlock,
    streamSizes: readonly number[],
    streamBlocks: ReadonlyArray<readonly number[]>
  ) {
    this.bytes = bytes;
    this.superBlock = superBlock;
    this.streamSizes = streamSizes;
    this.streamBlocks = streamBlocks;
  }

  streamCount(): number {
    return this.streamSizes.length;
  }

  getStreamLength(streamIndex: number): number {
    const size = this.streamSizes[streamIndex];
    return size === undefined || size === MSF_NIL_STREAM_SIZE ? 0 : size;
  }

  getStreamBytes(streamIndex: number): PdbResult<Uint8Array> {
    const blocks = this.streamBlocks[streamIndex];
    if (blocks === undefined) return noSuchStream(streamIndex);
    return gatherBlocks(
      this.bytes,
      this.superBlock.blockSize,
      blocks,
      this.getStreamLength(streamIndex),
      `Stream ${streamIndex}`
    );
  }
}

const readSuperBlock = (bytes: Uint8Array): PdbResult<MsfSuperBlock> => {
  if (bytes.byteLength < MSF_SUPERBLOCK_SIZE) return corrupt("MSF superblock is truncated.");
  const view = toDataView(bytes);
  if (!hasMsfSignature(view)) return corrupt("Missing MSF 7.00 signature.");
  const superBlock: MsfSuperBlock = {
    blockSize: view.getUint32(32, true),
    freeBlockMapBlock: view.getUint32(36, true),
    numBlocks: view.getUint32(40, true),
    numDirectoryBytes: view.getUint32(44, true),
    unknown: view.getUint32(48, true),
    blockMapAddress: view.getUint32(52, true)
  };
  if (!MSF_VALID_BLOCK_SIZES.some(size => size === superBlock.blockSize)) {
    return corrupt(`Unsupported MSF block size ${superBlock.blockSize}.`);
  }
  if (bytes.byteLength % superBlock.blockSize !== 0) {
    return corrupt("File size is not a multiple of block size.");
  }
  return ok(superBlock);
};

/**
 * Reads the MSF superblock and stream directory. Stream contents are gathered lazily
 * by `getStreamBytes`.
 */
export const parseMsfFile = (bytes: Uint8Array): PdbResult<MsfFile> => {
  const superBlock = readSuperBlock(bytes);
  if (!superBlock.ok) return superBlock;
  const { blockSize, blockMapAddress, numDirectoryBytes } = superBlock.value;

  const blockMapReader = new PdbStreamReader(bytes);
  const blockMapSeek = blockMapReader.setOffset(blockMapAddress * blockSize, "MSF block map");
  if (!blockMapSeek.ok) return blockMapSeek;
  const directoryBlocks = blockMapReader.readFixedArray(
    blockCountFor(numDirectoryBytes, blockSize),
    4,
    (view, offset) => view.getUint32(offset, true),
    "MSF block map"
  );
  if (!directoryBlocks.ok) return directoryBlocks;
  const directory = gatherBlocks(bytes, blockSize, directoryBlocks.value, numDirectoryBytes, "MSF directory");
  if (!directory.ok) return directory;

  const reader = new PdbStreamReader(directory.value);
  const streamCount = reader.readUint32("MSF directory stream count");
  if (!streamCount.ok) return streamCount;
  const streamSizes = reader.readFixedArray(
    streamCount.value,
    4,
    (view, offset) => view.getUint32(offset, true),
    "MSF directory stream sizes"
  );
  if (!streamSizes.ok) return streamSizes;

  const streamBlocks: number[][] = [];
  for (const [streamIndex, size] of streamSizes.value.entries()) {
    const byteCount = size === MSF_NIL_STREAM_SIZE ? 0 : size;
    const blocks = reader.readFixedArray(
      blockCountFor(byteCount, blockSize),
      4,
      (view, offset) => view.getUint32(offset, true),
      `MSF directory block list for stream ${streamIndex}`
    );
    if (!blocks.ok) return blocks;
    streamBlocks.push(blocks.value);
  }

  return ok(new MsfFile(bytes, superBlock.value, streamSizes.value, streamBlocks));
};
