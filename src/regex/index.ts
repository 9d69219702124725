/**
 * Pattern and Matcher: compiled expressions and the matching state over one subject.
 *
 * Usage:
 *   import { createEngine } from '../engine/registry.js';
 *   import { Pattern } from '../regex/index.js';
 *
 *   const pattern = Pattern.compile(createEngine(), "a(b)c");
 *   const m = pattern.matcher("xabcabc");
 *   while (m.find()) console.log(m.start(), m.group(1));
 *   pattern.close();
 */

export * as PatternFlags from "./flags.js";
export { MatchResult } from "./match-result.js";
export { Matcher, type Replacer } from "./matcher.js";
export { type CodeVariant, Pattern, type VariantMode } from "./pattern.js";
export {
  type CaptureSource,
  expandTemplate,
  quoteReplacement,
} from "./replacement.js";
