/**
 * RE2 backend via RE2JS: linear-time matching with no backreferences or
 * lookaround. Anchoring is done per call, so no dedicated variants are
 * compiled and line boundary options are not available.
 */

import { RE2JS, RE2JSSyntaxException } from "re2js";
import { CoordinateTranslator } from "../../text/coordinates.js";
import {
  COMPILE_OPTION_MASK,
  CompileOption,
  type EngineCapabilities,
  type EngineCompileResult,
  MATCH_OPTION_MASK,
  MatchOption,
  type NameTableEntry,
  type NativeHandle,
  type RegexEngine,
  ResultCode,
} from "../types.js";

interface CompiledCode {
  source: string;
  flags: number;
  re: RE2JS;
  /** Pattern followed by \z, compiled on first end-anchored call */
  endAnchored: RE2JS | null;
  options: number;
  names: NameTableEntry[];
}

const ERROR_MESSAGES = new Map<number, string>([
  [ResultCode.NO_MATCH, "no match"],
  [ResultCode.BAD_HANDLE, "invalid or released handle"],
  [ResultCode.BAD_OFFSET, "bad offset value"],
  [ResultCode.BAD_OPTION, "bad option value"],
  [ResultCode.UNSUPPORTED_OPTION, "option not supported by the re2 engine"],
  [ResultCode.INTERNAL, "internal error"],
]);

const decoder = new TextDecoder();

/**
 * Escape RE2 metacharacters so the pattern matches literally.
 */
function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function convertFlags(options: number): number {
  let re2Flags = 0;
  if ((options & CompileOption.CASELESS) !== 0) {
    re2Flags |= RE2JS.CASE_INSENSITIVE;
  }
  if ((options & CompileOption.MULTILINE) !== 0) {
    re2Flags |= RE2JS.MULTILINE;
  }
  if ((options & CompileOption.DOTALL) !== 0) {
    re2Flags |= RE2JS.DOTALL;
  }
  return re2Flags;
}

export class Re2Engine implements RegexEngine {
  readonly name = "re2";
  readonly capabilities: EngineCapabilities = {
    anchoredVariants: false,
    partialMatching: false,
    lineBoundaryOptions: false,
    executionStack: false,
  };

  private nextHandle = 1;
  private readonly codes = new Map<NativeHandle, CompiledCode>();
  private readonly matchData = new Map<NativeHandle, number[]>();
  private readonly subjects = new WeakMap<Uint8Array, CoordinateTranslator>();

  compile(pattern: Uint8Array, options: number): EngineCompileResult {
    if ((options & ~COMPILE_OPTION_MASK) !== 0) {
      return this.compileFailure(ResultCode.BAD_OPTION, "unknown compile option bits");
    }
    if ((options & CompileOption.EXTENDED) !== 0) {
      return this.compileFailure(
        ResultCode.UNSUPPORTED_OPTION,
        "extended (comments) mode is not supported by the re2 engine",
      );
    }
    if ((options & CompileOption.UCP) !== 0) {
      return this.compileFailure(
        ResultCode.UNSUPPORTED_OPTION,
        "Unicode character classes are not supported by the re2 engine",
      );
    }

    const text = decoder.decode(pattern);
    const source =
      (options & CompileOption.LITERAL) !== 0 ? escapeRegex(text) : text;
    const flags = convertFlags(options);

    let re: RE2JS;
    try {
      re = RE2JS.compile(source, flags);
    } catch (e) {
      if (e instanceof RE2JSSyntaxException) {
        return this.compileFailure(ResultCode.INTERNAL, e.message);
      }
      throw e;
    }

    const names: NameTableEntry[] = Object.entries(re.namedGroups())
      .map(([name, group]) => ({ name, group: Number(group) }))
      .sort((a, b) => a.group - b.group);

    const handle = this.nextHandle++;
    this.codes.set(handle, {
      source,
      flags,
      re,
      endAnchored: null,
      options,
      names,
    });
    return { ok: true, handle };
  }

  captureCount(code: NativeHandle): number {
    return this.codes.get(code)?.re.groupCount() ?? 0;
  }

  nameTable(code: NativeHandle): readonly NameTableEntry[] {
    return this.codes.get(code)?.names ?? [];
  }

  createMatchData(code: NativeHandle): NativeHandle {
    const compiled = this.codes.get(code);
    if (!compiled) return 0;
    const handle = this.nextHandle++;
    const pairs = compiled.re.groupCount() + 1;
    this.matchData.set(handle, new Array<number>(pairs * 2).fill(-1));
    return handle;
  }

  ovector(matchData: NativeHandle): readonly number[] {
    return this.matchData.get(matchData) ?? [];
  }

  freeMatchData(matchData: NativeHandle): void {
    this.matchData.delete(matchData);
  }

  match(
    code: NativeHandle,
    subject: Uint8Array,
    startOffset: number,
    options: number,
    matchData: NativeHandle,
    _stack: NativeHandle,
  ): number {
    const compiled = this.codes.get(code);
    const ovector = this.matchData.get(matchData);
    if (!compiled || !ovector) {
      return ResultCode.BAD_HANDLE;
    }
    if ((options & ~MATCH_OPTION_MASK) !== 0) {
      return ResultCode.BAD_OPTION;
    }
    const unsupported =
      MatchOption.NOTBOL | MatchOption.NOTEOL | MatchOption.PARTIAL_SOFT;
    if ((options & unsupported) !== 0) {
      return ResultCode.UNSUPPORTED_OPTION;
    }
    if (startOffset < 0 || startOffset > subject.length) {
      return ResultCode.BAD_OFFSET;
    }

    const coordinates = this.decode(subject);
    const startUnit = coordinates.floorUnit(startOffset);
    if (coordinates.unitToByte(startUnit) !== startOffset) {
      return ResultCode.BAD_OFFSET;
    }

    const anchored =
      ((options & MatchOption.ANCHORED) | (compiled.options & CompileOption.ANCHORED)) !== 0;
    const endAnchored =
      (options & MatchOption.ENDANCHORED) !== 0 ||
      (compiled.options & CompileOption.ENDANCHORED) !== 0;

    const re = endAnchored ? this.endAnchored(compiled) : compiled.re;
    const matcher = re.matcher(coordinates.text);
    if (!matcher.find(startUnit)) {
      return ResultCode.NO_MATCH;
    }
    if (anchored && matcher.start(0) !== startUnit) {
      return ResultCode.NO_MATCH;
    }

    ovector.fill(-1);
    let highest = 0;
    for (let group = 0; group < ovector.length / 2; group++) {
      const start = matcher.start(group);
      const end = matcher.end(group);
      if (start < 0 || end < 0) continue;
      ovector[group * 2] = coordinates.unitToByte(start);
      ovector[group * 2 + 1] = coordinates.unitToByte(end);
      highest = group + 1;
    }
    return highest;
  }

  errorMessage(code: number): string {
    return ERROR_MESSAGES.get(code) ?? `unknown error ${code}`;
  }

  release(code: NativeHandle): void {
    this.codes.delete(code);
  }

  private endAnchored(code: CompiledCode): RE2JS {
    if (!code.endAnchored) {
      code.endAnchored = RE2JS.compile(`(?:${code.source})\\z`, code.flags);
    }
    return code.endAnchored;
  }

  private compileFailure(code: number, message: string): EngineCompileResult {
    return { ok: false, code, message, offset: -1 };
  }

  private decode(subject: Uint8Array): CoordinateTranslator {
    let coordinates = this.subjects.get(subject);
    if (!coordinates) {
      coordinates = CoordinateTranslator.of(decoder.decode(subject));
      this.subjects.set(subject, coordinates);
    }
    return coordinates;
  }
}
