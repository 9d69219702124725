import { describe, expect, it } from "vitest";
import {
  IllegalArgumentError,
  IllegalStateError,
  IndexOutOfBoundsError,
} from "../errors.js";
import { MatchResult, resolveGroup } from "./match-result.js";

const NAMES = new Map([["word", 1]]);

describe("MatchResult", () => {
  it("reads groups by number and name", () => {
    const result = new MatchResult("say hello", [4, 9, 4, 9, -1, -1], 2, NAMES);
    expect(result.hasMatch()).toBe(true);
    expect(result.group()).toBe("hello");
    expect(result.group("word")).toBe("hello");
    expect(result.start(1)).toBe(4);
    expect(result.end()).toBe(9);
    expect(result.group(2)).toBeNull();
    expect(result.start(2)).toBe(-1);
  });

  it("is detached from the indices it was built from", () => {
    const indices = [0, 1];
    const result = new MatchResult("ab", indices, 0, new Map());
    indices[1] = 2;
    expect(result.group()).toBe("a");
  });

  it("throws when it holds no match", () => {
    const result = new MatchResult("ab", null, 0, new Map());
    expect(result.hasMatch()).toBe(false);
    expect(result.groupCount()).toBe(0);
    expect(() => result.group()).toThrow(IllegalStateError);
    expect(() => result.start()).toThrow("No match available");
  });
});

describe("resolveGroup", () => {
  it("passes valid indices through", () => {
    expect(resolveGroup(0, 1, NAMES)).toBe(0);
    expect(resolveGroup(1, 1, NAMES)).toBe(1);
    expect(resolveGroup("word", 1, NAMES)).toBe(1);
  });

  it("rejects out of range indices", () => {
    expect(() => resolveGroup(2, 1, NAMES)).toThrow(
      new IndexOutOfBoundsError("No group 2"),
    );
    expect(() => resolveGroup(-1, 1, NAMES)).toThrow(IndexOutOfBoundsError);
    expect(() => resolveGroup(0.5, 1, NAMES)).toThrow(IndexOutOfBoundsError);
  });

  it("rejects unknown names", () => {
    expect(() => resolveGroup("missing", 1, NAMES)).toThrow(
      new IllegalArgumentError("No group with name <missing>"),
    );
  });
});
