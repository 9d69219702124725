/**
 * MatchEngineAdapter - the single point of contact with an engine.
 *
 * Converts pattern text to bytes, turns compile failures into
 * PatternSyntaxError, scopes match data to each call and normalizes
 * engine return codes into MatchOutcome values.
 */

import {
  EngineError,
  MatchLimitError,
  PatternSyntaxError,
} from "../errors.js";
import { CoordinateTranslator } from "../text/coordinates.js";
import type { RegexLogger } from "../types.js";
import {
  type EngineCapabilities,
  LIMIT_CODES,
  type NameTableEntry,
  type NativeHandle,
  NULL_HANDLE,
  type RegexEngine,
  ResultCode,
} from "./types.js";

/**
 * Normalized result of one engine call. Capture offsets are in bytes,
 * relative to the subject passed in, with -1 for unset pairs.
 */
export type MatchOutcome =
  | {
      readonly kind: "matched";
      readonly captures: readonly number[];
      readonly mark: string | null;
    }
  | { readonly kind: "no-match" }
  | { readonly kind: "partial" };

export class MatchEngineAdapter {
  readonly engine: RegexEngine;
  private readonly logger?: RegexLogger;
  private readonly released = new Set<NativeHandle>();

  constructor(engine: RegexEngine, logger?: RegexLogger) {
    this.engine = engine;
    this.logger = logger;
  }

  get capabilities(): EngineCapabilities {
    return this.engine.capabilities;
  }

  /**
   * Compile pattern text. `displayPattern` is the text reported in errors
   * when the compiled text differs from what the caller wrote.
   */
  compile(
    pattern: string,
    options: number,
    mapIndex: (index: number) => number = (index) => index,
    displayPattern: string = pattern,
  ): NativeHandle {
    const coordinates = CoordinateTranslator.of(pattern);
    const result = this.engine.compile(coordinates.bytes, options);
    if (result.ok) {
      this.released.delete(result.handle);
      return result.handle;
    }

    const index =
      result.offset < 0 ? -1 : mapIndex(coordinates.floorUnit(result.offset));
    this.logger?.debug("compile-error", {
      engine: this.engine.name,
      code: result.code,
      offset: result.offset,
    });
    throw new PatternSyntaxError(result.message, displayPattern, index);
  }

  captureCount(code: NativeHandle): number {
    return this.engine.captureCount(code);
  }

  nameTable(code: NativeHandle): readonly NameTableEntry[] {
    return this.engine.nameTable(code);
  }

  /**
   * Run one match. Match data lives for this call only.
   */
  match(
    code: NativeHandle,
    subject: Uint8Array,
    startOffset: number,
    options: number,
    stack: NativeHandle = NULL_HANDLE,
  ): MatchOutcome {
    const matchData = this.engine.createMatchData(code);
    try {
      const rc = this.engine.match(
        code,
        subject,
        startOffset,
        options,
        matchData,
        stack,
      );

      if (rc === ResultCode.NO_MATCH) {
        return { kind: "no-match" };
      }
      if (rc === ResultCode.PARTIAL) {
        return { kind: "partial" };
      }
      if (rc < 0) {
        throw this.failure("match", rc);
      }

      const pairs = this.engine.captureCount(code) + 1;
      return {
        kind: "matched",
        captures: normalizeOvector(this.engine.ovector(matchData), rc, pairs),
        mark: this.engine.mark?.(matchData) ?? null,
      };
    } finally {
      this.engine.freeMatchData(matchData);
    }
  }

  createExecutionStack(): NativeHandle {
    if (!this.capabilities.executionStack || !this.engine.createExecutionStack) {
      return NULL_HANDLE;
    }
    return this.engine.createExecutionStack();
  }

  releaseExecutionStack(stack: NativeHandle): void {
    if (stack === NULL_HANDLE) return;
    this.engine.releaseExecutionStack?.(stack);
  }

  /** Release compiled code once; later calls for the same handle do nothing. */
  release(code: NativeHandle): void {
    if (code === NULL_HANDLE || this.released.has(code)) return;
    this.released.add(code);
    this.engine.release(code);
    this.logger?.debug("release", { engine: this.engine.name, handle: code });
  }

  private failure(operation: string, rc: number): EngineError {
    const detail = this.engine.errorMessage(rc);
    this.logger?.info("engine-error", {
      engine: this.engine.name,
      operation,
      code: rc,
      message: detail,
    });
    if (LIMIT_CODES.has(rc)) {
      return new MatchLimitError(operation, rc, detail);
    }
    return new EngineError(operation, rc, detail);
  }
}

/**
 * Pairs at or beyond the returned count were not set by the engine;
 * a count of 0 means the vector was too small and every pair is valid.
 */
function normalizeOvector(
  ovector: readonly number[],
  rc: number,
  pairs: number,
): number[] {
  const set = rc === 0 ? pairs : Math.min(rc, pairs);
  const captures = new Array<number>(pairs * 2).fill(-1);
  for (let i = 0; i < set; i++) {
    const start = ovector[i * 2];
    const end = ovector[i * 2 + 1];
    if (start === undefined || end === undefined || start < 0 || end < 0) {
      continue;
    }
    captures[i * 2] = start;
    captures[i * 2 + 1] = end;
  }
  return captures;
}
