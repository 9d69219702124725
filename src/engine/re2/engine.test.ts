import { describe, expect, it } from "vitest";
import { CompileOption, MatchOption, ResultCode } from "../types.js";
import { Re2Engine } from "./engine.js";

const encode = (text: string) => new TextEncoder().encode(text);

function compile(engine: Re2Engine, pattern: string, options = 0) {
  const result = engine.compile(encode(pattern), options);
  if (!result.ok) {
    throw new Error(`compile failed: ${result.message}`);
  }
  return result.handle;
}

function run(
  engine: Re2Engine,
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

describe("Re2Engine", () => {
  it("does not claim optional capabilities", () => {
    expect(new Re2Engine().capabilities).toEqual({
      anchoredVariants: false,
      partialMatching: false,
      lineBoundaryOptions: false,
      executionStack: false,
    });
  });

  describe("compile()", () => {
    it("reports groups and names", () => {
      const engine = new Re2Engine();
      const code = compile(engine, "(a)(?P<x>b)");
      expect(engine.captureCount(code)).toBe(2);
      expect(engine.nameTable(code)).toEqual([{ name: "x", group: 2 }]);
    });

    it("rejects syntax RE2 does not have", () => {
      const engine = new Re2Engine();
      const result = engine.compile(encode("(?<=a)b"), 0);
      expect(result.ok).toBe(false);
      expect(!result.ok && result.code).toBe(ResultCode.INTERNAL);
      expect(!result.ok && result.offset).toBe(-1);
    });

    it("rejects extended mode and Unicode classes", () => {
      const engine = new Re2Engine();
      expect(engine.compile(encode("a"), CompileOption.EXTENDED)).toEqual({
        ok: false,
        code: ResultCode.UNSUPPORTED_OPTION,
        message: "extended (comments) mode is not supported by the re2 engine",
        offset: -1,
      });
      const ucp = engine.compile(encode("a"), CompileOption.UCP);
      expect(!ucp.ok && ucp.code).toBe(ResultCode.UNSUPPORTED_OPTION);
    });

    it("escapes literal patterns", () => {
      const engine = new Re2Engine();
      const code = compile(engine, "a.b", CompileOption.LITERAL);
      expect(run(engine, code, encode("axb a.b")).ovector).toEqual([4, 7]);
    });
  });

  describe("match()", () => {
    it("returns capture offsets in bytes", () => {
      const engine = new Re2Engine();
      const code = compile(engine, "é(x)");
      expect(run(engine, code, encode("aéx"))).toEqual({
        rc: 2,
        ovector: [1, 4, 3, 4],
      });
    });

    it("leaves unset groups at -1", () => {
      const engine = new Re2Engine();
      const code = compile(engine, "(a)|(b)");
      expect(run(engine, code, encode("b"))).toEqual({
        rc: 3,
        ovector: [0, 1, -1, -1, 0, 1],
      });
    });

    it("honours case folding", () => {
      const engine = new Re2Engine();
      const code = compile(engine, "abc", CompileOption.CASELESS);
      expect(run(engine, code, encode("ABC")).rc).toBe(1);
    });

    it("anchors per call", () => {
      const engine = new Re2Engine();
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

    it("does not take line boundary or partial options", () => {
      const engine = new Re2Engine();
      const code = compile(engine, "a");
      for (const option of [
        MatchOption.NOTBOL,
        MatchOption.NOTEOL,
        MatchOption.PARTIAL_SOFT,
      ]) {
        expect(run(engine, code, encode("a"), 0, option).rc).toBe(
          ResultCode.UNSUPPORTED_OPTION,
        );
      }
    });

    it("rejects a start offset inside a character", () => {
      const engine = new Re2Engine();
      const code = compile(engine, "x");
      expect(run(engine, code, encode("aéx"), 2).rc).toBe(ResultCode.BAD_OFFSET);
    });

    it("rejects released code", () => {
      const engine = new Re2Engine();
      const code = compile(engine, "a");
      const matchData = engine.createMatchData(code);
      engine.release(code);
      expect(engine.match(code, encode("a"), 0, 0, matchData, 0)).toBe(
        ResultCode.BAD_HANDLE,
      );
    });
  });
});
