/**
 * Pattern flags. The bit values are part of the public API and never change.
 */

import { CompileOption } from "../engine/types.js";
import { IllegalArgumentError } from "../errors.js";

export const UNIX_LINES = 0x01;
export const CASE_INSENSITIVE = 0x02;
export const COMMENTS = 0x04;
export const MULTILINE = 0x08;
export const LITERAL = 0x10;
export const DOTALL = 0x20;
/** Case folding is always Unicode-aware; accepted for compatibility */
export const UNICODE_CASE = 0x40;
export const CANON_EQ = 0x80;
export const UNICODE_CHARACTER_CLASS = 0x100;

const ALL_FLAGS =
  UNIX_LINES |
  CASE_INSENSITIVE |
  COMMENTS |
  MULTILINE |
  LITERAL |
  DOTALL |
  UNICODE_CASE |
  CANON_EQ |
  UNICODE_CHARACTER_CLASS;

const FLAG_TO_OPTION: ReadonlyArray<[flag: number, option: number]> = [
  [UNIX_LINES, CompileOption.NEWLINE_LF],
  [CASE_INSENSITIVE, CompileOption.CASELESS],
  [COMMENTS, CompileOption.EXTENDED],
  [MULTILINE, CompileOption.MULTILINE],
  [LITERAL, CompileOption.LITERAL],
  [DOTALL, CompileOption.DOTALL],
  [UNICODE_CHARACTER_CLASS, CompileOption.UCP],
];

export function validateFlags(flags: number): void {
  if (!Number.isInteger(flags) || (flags & ~ALL_FLAGS) !== 0) {
    throw new IllegalArgumentError(
      `Unknown flag 0x${(flags >>> 0).toString(16)}`,
    );
  }
}

/**
 * Map pattern flags to engine compile options.
 */
export function toCompileOptions(flags: number): number {
  let options = 0;
  for (const [flag, option] of FLAG_TO_OPTION) {
    if ((flags & flag) !== 0) {
      options |= option;
    }
  }
  return options;
}
