/**
 * Engine capability contract.
 *
 * An engine is a byte-oriented matcher reached through handles, the way a
 * native regex library is reached through pointers: compiled code, match
 * data and execution stacks are opaque numbers that the caller owns and
 * must release. Offsets crossing this boundary are UTF-8 byte offsets.
 */

/** Opaque handle to an engine-owned resource. 0 is the null handle. */
export type NativeHandle = number;

export const NULL_HANDLE: NativeHandle = 0;

/** Compile option bits. */
export const CompileOption = {
  CASELESS: 0x1,
  DOTALL: 0x2,
  MULTILINE: 0x4,
  LITERAL: 0x8,
  EXTENDED: 0x10,
  /** Unicode properties for \w, \d, \s and \b */
  UCP: 0x20,
  ANCHORED: 0x40,
  ENDANCHORED: 0x80,
  /** Only LF ends a line; otherwise any Unicode line terminator does */
  NEWLINE_LF: 0x100,
} as const;

export const COMPILE_OPTION_MASK = 0x1ff;

/** Per-call match option bits. */
export const MatchOption = {
  ANCHORED: 0x1,
  ENDANCHORED: 0x2,
  /** Subject start is not the beginning of a line */
  NOTBOL: 0x4,
  /** Subject end is not the end of a line */
  NOTEOL: 0x8,
  PARTIAL_SOFT: 0x10,
} as const;

export const MATCH_OPTION_MASK = 0x1f;

/** Engine return codes. Positive results count the capture pairs set. */
export const ResultCode = {
  NO_MATCH: -1,
  PARTIAL: -2,
  BAD_HANDLE: -30,
  BAD_OFFSET: -33,
  BAD_OPTION: -34,
  UNSUPPORTED_OPTION: -35,
  MATCH_LIMIT: -47,
  DEPTH_LIMIT: -52,
  HEAP_LIMIT: -63,
  INTERNAL: -44,
} as const;

export const LIMIT_CODES: ReadonlySet<number> = new Set([
  ResultCode.MATCH_LIMIT,
  ResultCode.DEPTH_LIMIT,
  ResultCode.HEAP_LIMIT,
]);

export interface NameTableEntry {
  name: string;
  group: number;
}

export type EngineCompileResult =
  | { ok: true; handle: NativeHandle }
  | {
      ok: false;
      code: number;
      message: string;
      /** Byte offset into the pattern, or -1 when unknown */
      offset: number;
    };

export interface EngineCapabilities {
  /** Anchored variants can be precompiled as separate code */
  anchoredVariants: boolean;
  /** PARTIAL_SOFT is honoured */
  partialMatching: boolean;
  /** NOTBOL and NOTEOL are honoured */
  lineBoundaryOptions: boolean;
  /** Matching needs a per-session execution stack */
  executionStack: boolean;
}

export interface RegexEngine {
  readonly name: string;
  readonly capabilities: EngineCapabilities;

  compile(pattern: Uint8Array, options: number): EngineCompileResult;
  captureCount(code: NativeHandle): number;
  nameTable(code: NativeHandle): readonly NameTableEntry[];

  createMatchData(code: NativeHandle): NativeHandle;
  /** Capture pairs of the last match into this match data, in bytes. */
  ovector(matchData: NativeHandle): readonly number[];
  /** Name of the last backtracking marker passed, if the engine has markers. */
  mark?(matchData: NativeHandle): string | null;
  freeMatchData(matchData: NativeHandle): void;

  createExecutionStack?(): NativeHandle;
  releaseExecutionStack?(stack: NativeHandle): void;

  match(
    code: NativeHandle,
    subject: Uint8Array,
    startOffset: number,
    options: number,
    matchData: NativeHandle,
    stack: NativeHandle,
  ): number;

  errorMessage(code: number): string;
  /** Release compiled code. Releasing 0 or a released handle is a no-op. */
  release(code: NativeHandle): void;
}
