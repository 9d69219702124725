export type { MatcherOptions, PatternOptions } from "./config.js";
export { MatchEngineAdapter, type MatchOutcome } from "./engine/adapter.js";
export { EcmaScriptEngine } from "./engine/ecmascript/engine.js";
export { Re2Engine } from "./engine/re2/engine.js";
export type { EngineName } from "./engine/registry.js";
export { createEngine, getEngineNames } from "./engine/registry.js";
export type {
  EngineCapabilities,
  EngineCompileResult,
  NameTableEntry,
  NativeHandle,
  RegexEngine,
} from "./engine/types.js";
export {
  COMPILE_OPTION_MASK,
  CompileOption,
  MATCH_OPTION_MASK,
  MatchOption,
  NULL_HANDLE,
  ResultCode,
} from "./engine/types.js";
export {
  EngineError,
  IllegalArgumentError,
  IllegalStateError,
  IndexOutOfBoundsError,
  MatchLimitError,
  PatternSyntaxError,
  RegexError,
  UsageError,
} from "./errors.js";
export {
  type CaptureSource,
  MatchResult,
  Matcher,
  Pattern,
  PatternFlags,
  quoteReplacement,
  type Replacer,
} from "./regex/index.js";
export { CanonicalText } from "./text/canonical.js";
export { CoordinateTranslator } from "./text/coordinates.js";
export type { Appendable, RegexLogger } from "./types.js";
