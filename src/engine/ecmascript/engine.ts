/**
 * ECMAScript backend: PCRE-flavoured patterns run on the host RegExp.
 *
 * Patterns are translated once (see translate.ts) and rendered into one
 * RegExp per combination of anchoring and line boundary options. The
 * RegExp `d` flag supplies capture indices, which are converted from
 * UTF-16 code units to UTF-8 byte offsets at the boundary.
 */

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
import {
  renderPattern,
  type TranslatedPattern,
  TranslationError,
  translatePattern,
} from "./translate.js";

interface CompiledCode {
  translated: TranslatedPattern;
  options: number;
  /** Rendered RegExps keyed by variant bits */
  variants: Map<number, RegExp>;
}

const VARIANT_ANCHORED = 0x1;
const VARIANT_ENDANCHORED = 0x2;
const VARIANT_NOTBOL = 0x4;
const VARIANT_NOTEOL = 0x8;

const ERROR_MESSAGES = new Map<number, string>([
  [ResultCode.NO_MATCH, "no match"],
  [ResultCode.PARTIAL, "partial match"],
  [ResultCode.BAD_HANDLE, "invalid or released handle"],
  [ResultCode.BAD_OFFSET, "bad offset value"],
  [ResultCode.BAD_OPTION, "bad option value"],
  [ResultCode.UNSUPPORTED_OPTION, "option not supported by this engine"],
  [ResultCode.MATCH_LIMIT, "match limit exceeded"],
  [ResultCode.DEPTH_LIMIT, "depth limit exceeded"],
  [ResultCode.HEAP_LIMIT, "heap limit exceeded"],
  [ResultCode.INTERNAL, "internal error"],
]);

const decoder = new TextDecoder();

export class EcmaScriptEngine implements RegexEngine {
  readonly name = "ecmascript";
  readonly capabilities: EngineCapabilities = {
    anchoredVariants: true,
    partialMatching: false,
    lineBoundaryOptions: true,
    executionStack: false,
  };

  private nextHandle = 1;
  private readonly codes = new Map<NativeHandle, CompiledCode>();
  private readonly matchData = new Map<NativeHandle, number[]>();
  /** Decoded subjects, reused while the caller keeps passing the same view */
  private readonly subjects = new WeakMap<Uint8Array, CoordinateTranslator>();

  compile(pattern: Uint8Array, options: number): EngineCompileResult {
    if ((options & ~COMPILE_OPTION_MASK) !== 0) {
      return {
        ok: false,
        code: ResultCode.BAD_OPTION,
        message: "unknown compile option bits",
        offset: -1,
      };
    }

    const source = decoder.decode(pattern);
    let translated: TranslatedPattern;
    try {
      translated = translatePattern(source, {
        caseless: (options & CompileOption.CASELESS) !== 0,
        dotAll: (options & CompileOption.DOTALL) !== 0,
        multiline: (options & CompileOption.MULTILINE) !== 0,
        literal: (options & CompileOption.LITERAL) !== 0,
        extended: (options & CompileOption.EXTENDED) !== 0,
        ucp: (options & CompileOption.UCP) !== 0,
        newlineLf: (options & CompileOption.NEWLINE_LF) !== 0,
      });
    } catch (error) {
      if (error instanceof TranslationError) {
        return {
          ok: false,
          code: ResultCode.INTERNAL,
          message: error.message,
          offset: CoordinateTranslator.of(source).unitToByte(
            Math.min(error.offset, source.length),
          ),
        };
      }
      throw error;
    }

    const code: CompiledCode = { translated, options, variants: new Map() };
    try {
      this.variant(code, this.baseVariant(options));
    } catch (error) {
      if (error instanceof SyntaxError) {
        return {
          ok: false,
          code: ResultCode.INTERNAL,
          message: error.message,
          offset: -1,
        };
      }
      throw error;
    }

    const handle = this.nextHandle++;
    this.codes.set(handle, code);
    return { ok: true, handle };
  }

  captureCount(code: NativeHandle): number {
    return this.codes.get(code)?.translated.captureCount ?? 0;
  }

  nameTable(code: NativeHandle): readonly NameTableEntry[] {
    return this.codes.get(code)?.translated.names ?? [];
  }

  createMatchData(code: NativeHandle): NativeHandle {
    const compiled = this.codes.get(code);
    if (!compiled) return 0;
    const handle = this.nextHandle++;
    const pairs = compiled.translated.captureCount + 1;
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
    if ((options & MatchOption.PARTIAL_SOFT) !== 0) {
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

    let key = this.baseVariant(compiled.options);
    if ((options & MatchOption.ANCHORED) !== 0) key |= VARIANT_ANCHORED;
    if ((options & MatchOption.ENDANCHORED) !== 0) key |= VARIANT_ENDANCHORED;
    if ((options & MatchOption.NOTBOL) !== 0) key |= VARIANT_NOTBOL;
    if ((options & MatchOption.NOTEOL) !== 0) key |= VARIANT_NOTEOL;

    const regex = this.variant(compiled, key);
    regex.lastIndex = startUnit;
    const match = regex.exec(coordinates.text);
    if (!match) {
      return ResultCode.NO_MATCH;
    }
    const indices = match.indices;
    if (!indices) {
      return ResultCode.INTERNAL;
    }

    ovector.fill(-1);
    let highest = 0;
    for (let group = 0; group < ovector.length / 2; group++) {
      const span = indices[group];
      if (!span) continue;
      ovector[group * 2] = coordinates.unitToByte(span[0]);
      ovector[group * 2 + 1] = coordinates.unitToByte(span[1]);
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

  private baseVariant(options: number): number {
    let key = 0;
    if ((options & CompileOption.ANCHORED) !== 0) key |= VARIANT_ANCHORED;
    if ((options & CompileOption.ENDANCHORED) !== 0) key |= VARIANT_ENDANCHORED;
    return key;
  }

  private variant(code: CompiledCode, key: number): RegExp {
    const cached = code.variants.get(key);
    if (cached) return cached;

    let source = renderPattern(code.translated, {
      notBol: (key & VARIANT_NOTBOL) !== 0,
      notEol: (key & VARIANT_NOTEOL) !== 0,
    });
    if ((key & VARIANT_ENDANCHORED) !== 0) {
      source = `(?:${source})(?![\\s\\S])`;
    }
    let flags = "du";
    if (code.translated.caseless) flags += "i";
    flags += (key & VARIANT_ANCHORED) !== 0 ? "y" : "g";

    const regex = new RegExp(source, flags);
    code.variants.set(key, regex);
    return regex;
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
