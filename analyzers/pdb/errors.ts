"use strict";

export type PdbErrorKind =
  | "corrupt-file"
  | "unsupported-feature"
  | "no-such-stream"
  | "index-out-of-bounds";

export interface PdbError {
  kind: PdbErrorKind;
  message: string;
}

export interface PdbSuccess<T> {
  ok: true;
  value: T;
}

export interface PdbFailure {
  ok: false;
  error: PdbError;
}

export type PdbResult<T> = PdbSuccess<T> | PdbFailure;

export const ok = <T>(value: T): PdbSuccess<T> => ({ ok: true, value });

export const fail = (kind: PdbErrorKind, message: string): PdbFailure => ({
  ok: false,
  error: { kind, message }
});

export const corrupt = (message: string): PdbFailure => fail("corrupt-file", message);

export const unsupported = (message: string): PdbFailure => fail("unsupported-feature", message);

export const noSuchStream = (streamIndex: number): PdbFailure =>
  fail("no-such-stream", `Stream ${streamIndex} does not exist in the PDB.`);

export const indexOutOfBounds = (message: string): PdbFailure =>
  fail("index-out-of-bounds", message);

export const describePdbError = (error: PdbError): string => `${error.kind}: ${error.message}`;
