/**
 * Pattern and Matcher Configuration
 *
 * All options are optional - undefined values use defaults.
 */

import type { RegexLogger } from "./types.js";

export interface PatternOptions {
  /**
   * Compile dedicated anchored code for lookingAt() and matches() when the
   * engine supports it (default: true). When off, or unsupported, the
   * search code is reused with per-call anchoring options.
   */
  precompileAnchoredVariants?: boolean;

  /** Optional logger for compile and engine events */
  logger?: RegexLogger;
}

export interface MatcherOptions {
  /** Region bounds behave like input bounds for ^ and $ (default: true) */
  anchoringBounds?: boolean;

  /**
   * Report partial matches as a distinct outcome (default: false).
   * Requires an engine with partial matching.
   */
  partialMatching?: boolean;
}

export interface ResolvedPatternOptions {
  precompileAnchoredVariants: boolean;
  logger: RegexLogger | undefined;
}

const DEFAULT_PATTERN_OPTIONS: ResolvedPatternOptions = {
  precompileAnchoredVariants: true,
  logger: undefined,
};

const DEFAULT_MATCHER_OPTIONS: Required<MatcherOptions> = {
  anchoringBounds: true,
  partialMatching: false,
};

/**
 * Resolve pattern options by merging user-provided options with defaults.
 */
export function resolvePatternOptions(
  options?: PatternOptions,
): ResolvedPatternOptions {
  if (!options) {
    return { ...DEFAULT_PATTERN_OPTIONS };
  }
  return {
    precompileAnchoredVariants:
      options.precompileAnchoredVariants ??
      DEFAULT_PATTERN_OPTIONS.precompileAnchoredVariants,
    logger: options.logger ?? DEFAULT_PATTERN_OPTIONS.logger,
  };
}

/**
 * Resolve matcher options by merging user-provided options with defaults.
 */
export function resolveMatcherOptions(
  options?: MatcherOptions,
): Required<MatcherOptions> {
  if (!options) {
    return { ...DEFAULT_MATCHER_OPTIONS };
  }
  return {
    anchoringBounds:
      options.anchoringBounds ?? DEFAULT_MATCHER_OPTIONS.anchoringBounds,
    partialMatching:
      options.partialMatching ?? DEFAULT_MATCHER_OPTIONS.partialMatching,
  };
}
