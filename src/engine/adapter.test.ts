import { describe, expect, it, vi } from "vitest";
import { EngineError, MatchLimitError, PatternSyntaxError } from "../errors.js";
import { ScriptedEngine } from "../test-utils/scripted-engine.js";
import type { RegexLogger } from "../types.js";
import { MatchEngineAdapter } from "./adapter.js";
import { ResultCode } from "./types.js";

function createLogger() {
  return { info: vi.fn(), debug: vi.fn() } satisfies RegexLogger;
}

const encode = (text: string) => new TextEncoder().encode(text);

describe("MatchEngineAdapter", () => {
  describe("compile()", () => {
    it("passes the pattern as UTF-8 bytes", () => {
      const engine = new ScriptedEngine();
      const adapter = new MatchEngineAdapter(engine);
      const handle = adapter.compile("é+", 0x1);
      expect(handle).toBe(1);
      expect(engine.compiled).toEqual([{ pattern: "é+", options: 0x1 }]);
    });

    it("translates the error offset from bytes to code units", () => {
      const engine = new ScriptedEngine({
        compileFailures: new Map([
          [0, { code: -114, message: "missing closing parenthesis", offset: 3 }],
        ]),
      });
      const adapter = new MatchEngineAdapter(engine);

      let error: unknown;
      try {
        adapter.compile("é(x", 0);
      } catch (e) {
        error = e;
      }
      expect(error).toBeInstanceOf(PatternSyntaxError);
      if (!(error instanceof PatternSyntaxError)) return;
      expect(error.index).toBe(2);
      expect(error.pattern).toBe("é(x");
      expect(error.description).toBe("missing closing parenthesis");
      expect(error.message).toBe(
        "missing closing parenthesis near index 2\né(x\n  ^",
      );
    });

    it("reports an unknown offset as -1", () => {
      const engine = new ScriptedEngine({
        compileFailures: new Map([
          [0, { code: -1, message: "bad pattern", offset: -1 }],
        ]),
      });
      const adapter = new MatchEngineAdapter(engine);
      expect(() => adapter.compile("x", 0)).toThrow(
        expect.objectContaining({ index: -1, message: "bad pattern\nx" }),
      );
    });

    it("maps the index and shows the caller's pattern when asked", () => {
      const engine = new ScriptedEngine({
        compileFailures: new Map([[0, { code: -1, message: "bad", offset: 1 }]]),
      });
      const adapter = new MatchEngineAdapter(engine);
      expect(() =>
        adapter.compile("ab", 0, (index) => index + 10, "original"),
      ).toThrow(expect.objectContaining({ index: 11, pattern: "original" }));
    });
  });

  describe("match()", () => {
    it("normalizes unset and uncounted pairs to -1", () => {
      const engine = new ScriptedEngine({
        captureCount: 2,
        matches: [{ rc: 2, ovector: [0, 3, 1, 2, 9, 9] }],
      });
      const adapter = new MatchEngineAdapter(engine);
      const outcome = adapter.match(1, encode("abc"), 0, 0);
      expect(outcome).toEqual({
        kind: "matched",
        captures: [0, 3, 1, 2, -1, -1],
        mark: null,
      });
    });

    it("treats a zero return as every pair being set", () => {
      const engine = new ScriptedEngine({
        captureCount: 1,
        matches: [{ rc: 0, ovector: [0, 2, 1, 2] }],
      });
      const adapter = new MatchEngineAdapter(engine);
      const outcome = adapter.match(1, encode("ab"), 0, 0);
      expect(outcome.kind === "matched" && outcome.captures).toEqual([
        0, 2, 1, 2,
      ]);
    });

    it("reports the mark of a match", () => {
      const engine = new ScriptedEngine({
        matches: [{ rc: 1, ovector: [0, 1], mark: "M1" }],
      });
      const adapter = new MatchEngineAdapter(engine);
      const outcome = adapter.match(1, encode("a"), 0, 0);
      expect(outcome.kind === "matched" && outcome.mark).toBe("M1");
    });

    it("distinguishes no match from a partial match", () => {
      const engine = new ScriptedEngine({
        matches: [
          { rc: ResultCode.NO_MATCH },
          { rc: ResultCode.PARTIAL, ovector: [1, 3] },
        ],
      });
      const adapter = new MatchEngineAdapter(engine);
      expect(adapter.match(1, encode("abc"), 0, 0)).toEqual({
        kind: "no-match",
      });
      expect(adapter.match(1, encode("abc"), 0, 0)).toEqual({
        kind: "partial",
      });
    });

    it("throws MatchLimitError for limit codes", () => {
      const engine = new ScriptedEngine({
        matches: [{ rc: ResultCode.MATCH_LIMIT }],
        errorMessages: new Map([[ResultCode.MATCH_LIMIT, "match limit exceeded"]]),
      });
      const logger = createLogger();
      const adapter = new MatchEngineAdapter(engine, logger);

      expect(() => adapter.match(1, encode("a"), 0, 0)).toThrow(
        new MatchLimitError("match", -47, "match limit exceeded"),
      );
      expect(logger.info).toHaveBeenCalledWith("engine-error", {
        engine: "scripted",
        operation: "match",
        code: -47,
        message: "match limit exceeded",
      });
    });

    it("throws EngineError for other failures", () => {
      const engine = new ScriptedEngine({
        matches: [{ rc: ResultCode.BAD_HANDLE }],
      });
      const adapter = new MatchEngineAdapter(engine);

      let error: unknown;
      try {
        adapter.match(1, encode("a"), 0, 0);
      } catch (e) {
        error = e;
      }
      expect(error).toBeInstanceOf(EngineError);
      expect(error).not.toBeInstanceOf(MatchLimitError);
      expect(error).toHaveProperty(
        "message",
        "match failed: scripted error -30 (engine code -30)",
      );
    });

    it("frees match data on every exit path", () => {
      const engine = new ScriptedEngine({
        matches: [{ rc: 1, ovector: [0, 1] }, { rc: ResultCode.HEAP_LIMIT }],
      });
      const adapter = new MatchEngineAdapter(engine);
      adapter.match(1, encode("a"), 0, 0);
      expect(() => adapter.match(1, encode("a"), 0, 0)).toThrow(MatchLimitError);
      expect(engine.liveMatchData.size).toBe(0);
    });

    it("forwards the execution stack", () => {
      const engine = new ScriptedEngine({ matches: [{ rc: 1, ovector: [0, 0] }] });
      const adapter = new MatchEngineAdapter(engine);
      adapter.match(1, encode(""), 0, 0, 42);
      expect(engine.matchCalls[0]?.stack).toBe(42);
    });
  });

  describe("execution stacks", () => {
    it("creates none when the engine does not need one", () => {
      const engine = new ScriptedEngine();
      const adapter = new MatchEngineAdapter(engine);
      expect(adapter.createExecutionStack()).toBe(0);
      expect(engine.stacksCreated).toEqual([]);
    });

    it("creates and releases stacks when the engine needs them", () => {
      const engine = new ScriptedEngine({
        capabilities: { executionStack: true },
      });
      const adapter = new MatchEngineAdapter(engine);
      const stack = adapter.createExecutionStack();
      adapter.releaseExecutionStack(stack);
      adapter.releaseExecutionStack(0);
      expect(engine.stacksCreated).toEqual([stack]);
      expect(engine.stacksReleased).toEqual([stack]);
    });
  });

  describe("release()", () => {
    it("releases a handle once and ignores the null handle", () => {
      const engine = new ScriptedEngine();
      const logger = createLogger();
      const adapter = new MatchEngineAdapter(engine, logger);
      const handle = adapter.compile("a", 0);

      adapter.release(handle);
      adapter.release(handle);
      adapter.release(0);

      expect(engine.released).toEqual([handle]);
      expect(logger.debug).toHaveBeenCalledWith("release", {
        engine: "scripted",
        handle,
      });
    });
  });
});
