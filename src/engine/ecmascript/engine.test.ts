import { describe, expect, it } from "vitest";
import { CompileOption, MatchOption, ResultCode } from "../types.js";
import { EcmaScriptEngine } from "./engine.js";

const encode = (text: string) => new TextEncoder().encode(text);

function compile(engine: EcmaScriptEngine, pattern: string, options = 0) {
  const result = engine.compile(encode(pattern), options);
  if (!result.ok) {
    throw new Error(`compile failed: ${result.message}`);
  }
  return result.handle;
}

function run(
  engine: EcmaScriptEngine,
  code: number,
  subject: Uint8Array,
  start = 0,
  options = 0,
) {
  const matchData = engine.createMatchData(code);
  const rc = engine.match(code, subject, start, options, matchData, 0);
  const ovector = [...engine.ovector(matchData)];
  engine.freeMatchData(matchData);
  return { rc, ovector };
}

describe("EcmaScriptEngine", () => {
  describe("compile()", () => {
    it("reports capture counts and the name table", () => {
      const engine = new EcmaScriptEngine();
      const code = compile(engine, "(a)(?:b)(?<n>c)");
      expect(engine.captureCount(code)).toBe(2);
      expect(engine.nameTable(code)).toEqual([{ name: "n", group: 2 }]);
    });

    it("reports translation errors at a byte offset", () => {
      const engine = new EcmaScriptEngine();
      const result = engine.compile(encode("é(?>x)"), 0);
      expect(result).toEqual({
        ok: false,
        code: ResultCode.INTERNAL,
        message: "atomic groups are not supported",
        offset: 2,
      });
    });

    it("reports host syntax errors without an offset", () => {
      const engine = new EcmaScriptEngine();
      const result = engine.compile(encode("("), 0);
      expect(result.ok).toBe(false);
      expect(!result.ok && result.offset).toBe(-1);
    });

    it("rejects unknown option bits", () => {
      const engine = new EcmaScriptEngine();
      const result = engine.compile(encode("a"), 0x200);
      expect(!result.ok && result.code).toBe(ResultCode.BAD_OPTION);
    });
  });

  describe("match()", () => {
    it("returns capture offsets in bytes", () => {
      const engine = new EcmaScriptEngine();
      const code = compile(engine, "é(x)");
      expect(run(engine, code, encode("aéx"))).toEqual({
        rc: 2,
        ovector: [1, 4, 3, 4],
      });
    });

    it("counts pairs up to the highest group that took part", () => {
      const engine = new EcmaScriptEngine();
      const code = compile(engine, "(a)|(b)");
      expect(run(engine, code, encode("a"))).toEqual({
        rc: 2,
        ovector: [0, 1, 0, 1, -1, -1],
      });
      expect(run(engine, code, encode("b"))).toEqual({
        rc: 3,
        ovector: [0, 1, -1, -1, 0, 1],
      });
    });

    it("searches from the start offset", () => {
      const engine = new EcmaScriptEngine();
      const code = compile(engine, "a");
      expect(run(engine, code, encode("aXa"), 1).ovector).toEqual([2, 3]);
      expect(run(engine, code, encode("aXa"), 3).rc).toBe(ResultCode.NO_MATCH);
    });

    it("honours caseless and multiline compile options", () => {
      const engine = new EcmaScriptEngine();
      const caseless = compile(engine, "abc", CompileOption.CASELESS);
      expect(run(engine, caseless, encode("xABC")).ovector).toEqual([1, 4]);

      const multiline = compile(engine, "^b", CompileOption.MULTILINE);
      expect(run(engine, multiline, encode("a\nb")).ovector).toEqual([2, 3]);
    });

    it("anchors per call", () => {
      const engine = new EcmaScriptEngine();
      const code = compile(engine, "b");
      const subject = encode("ab");
      expect(run(engine, code, subject, 0, MatchOption.ANCHORED).rc).toBe(
        ResultCode.NO_MATCH,
      );
      expect(run(engine, code, subject, 1, MatchOption.ANCHORED).ovector).toEqual([
        1, 2,
      ]);
      expect(run(engine, code, subject, 0, MatchOption.ENDANCHORED).ovector).toEqual(
        [1, 2],
      );
      const a = compile(engine, "a");
      expect(run(engine, a, subject, 0, MatchOption.ENDANCHORED).rc).toBe(
        ResultCode.NO_MATCH,
      );
    });

    it("anchors through compile options", () => {
      const engine = new EcmaScriptEngine();
      const code = compile(engine, "b", CompileOption.ANCHORED);
      expect(run(engine, code, encode("ab")).rc).toBe(ResultCode.NO_MATCH);
      expect(run(engine, code, encode("ab"), 1).rc).toBe(1);
    });

    it("honours NOTBOL and NOTEOL", () => {
      const engine = new EcmaScriptEngine();
      const bol = compile(engine, "^a");
      const eol = compile(engine, "a$");
      const subject = encode("a");
      expect(run(engine, bol, subject).rc).toBe(1);
      expect(run(engine, bol, subject, 0, MatchOption.NOTBOL).rc).toBe(
        ResultCode.NO_MATCH,
      );
      expect(run(engine, eol, subject).rc).toBe(1);
      expect(run(engine, eol, subject, 0, MatchOption.NOTEOL).rc).toBe(
        ResultCode.NO_MATCH,
      );
    });

    it("rejects a start offset inside a character", () => {
      const engine = new EcmaScriptEngine();
      const code = compile(engine, "x");
      expect(run(engine, code, encode("aéx"), 2).rc).toBe(ResultCode.BAD_OFFSET);
      expect(run(engine, code, encode("a"), 5).rc).toBe(ResultCode.BAD_OFFSET);
    });

    it("rejects unsupported and unknown options", () => {
      const engine = new EcmaScriptEngine();
      const code = compile(engine, "a");
      expect(run(engine, code, encode("a"), 0, MatchOption.PARTIAL_SOFT).rc).toBe(
        ResultCode.UNSUPPORTED_OPTION,
      );
      expect(run(engine, code, encode("a"), 0, 0x100).rc).toBe(
        ResultCode.BAD_OPTION,
      );
    });

    it("rejects released code", () => {
      const engine = new EcmaScriptEngine();
      const code = compile(engine, "a");
      const matchData = engine.createMatchData(code);
      engine.release(code);
      expect(engine.match(code, encode("a"), 0, 0, matchData, 0)).toBe(
        ResultCode.BAD_HANDLE,
      );
      expect(engine.createMatchData(code)).toBe(0);
    });
  });

  it("describes its error codes", () => {
    const engine = new EcmaScriptEngine();
    expect(engine.errorMessage(ResultCode.BAD_OFFSET)).toBe("bad offset value");
    expect(engine.errorMessage(-999)).toBe("unknown error -999");
  });
});
