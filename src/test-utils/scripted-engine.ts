/**
 * ScriptedEngine - an in-process engine whose results are scripted by
 * the test. Records every call so tests can assert on what the adapter
 * and matcher asked for.
 */

import {
  type EngineCapabilities,
  type EngineCompileResult,
  type NameTableEntry,
  type NativeHandle,
  type RegexEngine,
  ResultCode,
} from "../engine/types.js";

export interface ScriptedMatch {
  rc: number;
  /** Byte offsets, relative to the subject passed in */
  ovector?: number[];
  mark?: string | null;
}

export interface ScriptedCompileFailure {
  code: number;
  message: string;
  offset: number;
}

export interface ScriptedEngineOptions {
  capabilities?: Partial<EngineCapabilities>;
  captureCount?: number;
  names?: NameTableEntry[];
  /** Compile failures keyed by zero-based compile call number */
  compileFailures?: Map<number, ScriptedCompileFailure>;
  /** Results handed out in order; NO_MATCH once exhausted */
  matches?: ScriptedMatch[];
  errorMessages?: Map<number, string>;
}

export interface RecordedMatch {
  code: NativeHandle;
  subject: string;
  start: number;
  options: number;
  stack: NativeHandle;
}

const decoder = new TextDecoder();

export class ScriptedEngine implements RegexEngine {
  readonly name = "scripted";
  readonly capabilities: EngineCapabilities;

  readonly compiled: Array<{ pattern: string; options: number }> = [];
  readonly matchCalls: RecordedMatch[] = [];
  readonly released: NativeHandle[] = [];
  readonly stacksCreated: NativeHandle[] = [];
  readonly stacksReleased: NativeHandle[] = [];
  readonly liveMatchData = new Set<NativeHandle>();

  private nextHandle = 1;
  private readonly options: ScriptedEngineOptions;
  private readonly pending: ScriptedMatch[];
  private readonly ovectors = new Map<NativeHandle, number[]>();
  private readonly marks = new Map<NativeHandle, string | null>();

  constructor(options: ScriptedEngineOptions = {}) {
    this.options = options;
    this.pending = [...(options.matches ?? [])];
    this.capabilities = {
      anchoredVariants: false,
      partialMatching: false,
      lineBoundaryOptions: true,
      executionStack: false,
      ...options.capabilities,
    };
  }

  compile(pattern: Uint8Array, options: number): EngineCompileResult {
    const call = this.compiled.length;
    this.compiled.push({ pattern: decoder.decode(pattern), options });
    const failure = this.options.compileFailures?.get(call);
    if (failure) {
      return { ok: false, ...failure };
    }
    return { ok: true, handle: this.nextHandle++ };
  }

  captureCount(_code: NativeHandle): number {
    return this.options.captureCount ?? 0;
  }

  nameTable(_code: NativeHandle): readonly NameTableEntry[] {
    return this.options.names ?? [];
  }

  createMatchData(_code: NativeHandle): NativeHandle {
    const handle = this.nextHandle++;
    this.liveMatchData.add(handle);
    return handle;
  }

  ovector(matchData: NativeHandle): readonly number[] {
    return this.ovectors.get(matchData) ?? [];
  }

  mark(matchData: NativeHandle): string | null {
    return this.marks.get(matchData) ?? null;
  }

  freeMatchData(matchData: NativeHandle): void {
    this.liveMatchData.delete(matchData);
    this.ovectors.delete(matchData);
    this.marks.delete(matchData);
  }

  createExecutionStack(): NativeHandle {
    const handle = this.nextHandle++;
    this.stacksCreated.push(handle);
    return handle;
  }

  releaseExecutionStack(stack: NativeHandle): void {
    this.stacksReleased.push(stack);
  }

  match(
    code: NativeHandle,
    subject: Uint8Array,
    startOffset: number,
    options: number,
    matchData: NativeHandle,
    stack: NativeHandle,
  ): number {
    this.matchCalls.push({
      code,
      subject: decoder.decode(subject),
      start: startOffset,
      options,
      stack,
    });
    const next = this.pending.shift();
    if (!next) {
      return ResultCode.NO_MATCH;
    }
    this.ovectors.set(matchData, next.ovector ?? []);
    this.marks.set(matchData, next.mark ?? null);
    return next.rc;
  }

  errorMessage(code: number): string {
    return this.options.errorMessages?.get(code) ?? `scripted error ${code}`;
  }

  release(code: NativeHandle): void {
    this.released.push(code);
  }
}
