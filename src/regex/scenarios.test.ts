import { describe, expect, it } from "vitest";
import { EcmaScriptEngine } from "../engine/ecmascript/engine.js";
import { IndexOutOfBoundsError } from "../errors.js";
import { Pattern } from "./pattern.js";

function compile(regex: string): Pattern {
  return Pattern.compile(new EcmaScriptEngine(), regex);
}

describe("end-to-end matching", () => {
  it("finds successive matches with their groups", () => {
    const m = compile("a(b)c").matcher("xabcabc");
    expect(m.find()).toBe(true);
    expect([m.start(), m.end()]).toEqual([1, 4]);
    expect(m.group(1)).toBe("b");
    expect([m.start(1), m.end(1)]).toEqual([2, 3]);
    expect(m.find()).toBe(true);
    expect([m.start(), m.end()]).toEqual([4, 7]);
    expect(m.find()).toBe(false);
  });

  it("does not see a word boundary at a mid-word region start", () => {
    const m = compile("\\bfoo\\b").matcher("xfoo foo");
    m.region(2, 8).useAnchoringBounds(false);
    expect(m.find()).toBe(true);
    expect([m.start(), m.end()]).toEqual([5, 8]);
    expect(m.find()).toBe(false);
  });

  it("expands templates against live captures", () => {
    const pattern = compile("(\\w)(\\w)");
    expect(pattern.matcher("AB").replaceAll("$1-${2}")).toBe("A-B");
    expect(() => pattern.matcher("AB").replaceAll("${3}")).toThrow(
      new IndexOutOfBoundsError("No group 3"),
    );
  });

  it("keeps astral characters whole in groups", () => {
    const m = compile("(.)b").matcher("a😀b");
    expect(m.find()).toBe(true);
    expect(m.group(1)).toBe("😀");
    expect(m.group(1)?.length).toBe(2);
    expect([m.start(), m.end()]).toEqual([1, 4]);
  });

  it("distinguishes matches() from lookingAt()", () => {
    const anchored = compile("^abc$");
    expect(anchored.matcher("abc").matches()).toBe(true);
    expect(anchored.matcher("abcd").matches()).toBe(false);
    expect(anchored.matcher("abcd").lookingAt()).toBe(false);
    expect(compile("^abc").matcher("abcd").lookingAt()).toBe(true);
  });
});
