/**
 * Pattern - a compiled regular expression.
 *
 * Compiles up to three code variants from the same source: one for
 * searching, one anchored at the start (lookingAt) and one anchored at
 * both ends (matches). Engines that cannot precompile anchored code share
 * the search code and request anchoring per call instead.
 *
 * A pattern owns engine handles and must be released with close().
 */

import { MatchEngineAdapter } from "../engine/adapter.js";
import {
  CompileOption,
  MatchOption,
  type NativeHandle,
  type RegexEngine,
} from "../engine/types.js";
import { IllegalStateError } from "../errors.js";
import {
  type MatcherOptions,
  type PatternOptions,
  resolvePatternOptions,
} from "../config.js";
import { CanonicalText } from "../text/canonical.js";
import { CANON_EQ, toCompileOptions, validateFlags } from "./flags.js";
import { Matcher } from "./matcher.js";

export type VariantMode = "search" | "lookingAt" | "matches";

/** Code used for one anchoring mode */
export type CodeVariant =
  | { readonly kind: "dedicated"; readonly handle: NativeHandle }
  | {
      readonly kind: "shared";
      readonly handle: NativeHandle;
      readonly matchOptions: number;
    };

const ANCHORING: Readonly<Record<VariantMode, number>> = {
  search: 0,
  lookingAt: CompileOption.ANCHORED,
  matches: CompileOption.ANCHORED | CompileOption.ENDANCHORED,
};

const MATCH_ANCHORING: Readonly<Record<VariantMode, number>> = {
  search: 0,
  lookingAt: MatchOption.ANCHORED,
  matches: MatchOption.ANCHORED | MatchOption.ENDANCHORED,
};

export class Pattern {
  /** Engine access shared by every matcher of this pattern */
  readonly adapter: MatchEngineAdapter;
  private readonly source: string;
  private readonly flagBits: number;
  private readonly variants: Readonly<Record<VariantMode, CodeVariant>>;
  private readonly names: ReadonlyMap<string, number>;
  private readonly captureGroups: number;
  private closed = false;

  private constructor(
    adapter: MatchEngineAdapter,
    source: string,
    flags: number,
    variants: Readonly<Record<VariantMode, CodeVariant>>,
  ) {
    this.adapter = adapter;
    this.source = source;
    this.flagBits = flags;
    this.variants = variants;

    const search = variants.search.handle;
    this.captureGroups = adapter.captureCount(search);
    const names = new Map<string, number>();
    for (const { name, group } of adapter.nameTable(search)) {
      if (!names.has(name)) {
        names.set(name, group);
      }
    }
    this.names = names;
  }

  /**
   * Compile a regular expression with the given flags.
   *
   * @throws PatternSyntaxError if the expression cannot be compiled
   * @throws IllegalArgumentError if unknown flag bits are set
   */
  static compile(
    engine: RegexEngine,
    regex: string,
    flags = 0,
    options?: PatternOptions,
  ): Pattern {
    validateFlags(flags);
    const resolved = resolvePatternOptions(options);
    const adapter = new MatchEngineAdapter(engine, resolved.logger);

    const canonical = (flags & CANON_EQ) !== 0 ? CanonicalText.of(regex) : null;
    const text = canonical ? canonical.normalized : regex;
    const mapIndex = (index: number): number =>
      canonical ? canonical.toOriginalStart(index) : index;
    const base = toCompileOptions(flags);
    const compileVariant = (mode: VariantMode): NativeHandle =>
      adapter.compile(text, base | ANCHORING[mode], mapIndex, regex);

    const search = compileVariant("search");
    let variants: Record<VariantMode, CodeVariant>;

    if (resolved.precompileAnchoredVariants && adapter.capabilities.anchoredVariants) {
      const compiled: NativeHandle[] = [search];
      try {
        const lookingAt = compileVariant("lookingAt");
        compiled.push(lookingAt);
        const matches = compileVariant("matches");
        variants = {
          search: { kind: "dedicated", handle: search },
          lookingAt: { kind: "dedicated", handle: lookingAt },
          matches: { kind: "dedicated", handle: matches },
        };
      } catch (error) {
        for (const handle of compiled) {
          adapter.release(handle);
        }
        throw error;
      }
    } else {
      resolved.logger?.debug("variant-fallback", {
        engine: engine.name,
        pattern: regex,
        reason: adapter.capabilities.anchoredVariants
          ? "disabled"
          : "unsupported",
      });
      variants = {
        search: { kind: "dedicated", handle: search },
        lookingAt: {
          kind: "shared",
          handle: search,
          matchOptions: MATCH_ANCHORING.lookingAt,
        },
        matches: {
          kind: "shared",
          handle: search,
          matchOptions: MATCH_ANCHORING.matches,
        },
      };
    }

    resolved.logger?.debug("compile", {
      engine: engine.name,
      pattern: regex,
      flags,
    });
    return new Pattern(adapter, regex, flags, variants);
  }

  /**
   * Compile `regex` and test whether it matches the whole of `input`.
   */
  static matches(engine: RegexEngine, regex: string, input: string): boolean {
    const pattern = Pattern.compile(engine, regex);
    try {
      return pattern.matcher(input).matches();
    } finally {
      pattern.close();
    }
  }

  /**
   * Return a pattern string that matches `text` literally.
   */
  static quote(text: string): string {
    if (!text.includes("\\E")) {
      return `\\Q${text}\\E`;
    }
    return `\\Q${text.split("\\E").join("\\E\\\\E\\Q")}\\E`;
  }

  pattern(): string {
    return this.source;
  }

  flags(): number {
    return this.flagBits;
  }

  groupCount(): number {
    return this.captureGroups;
  }

  namedGroups(): ReadonlyMap<string, number> {
    return this.names;
  }

  /** Whether subjects are matched in canonical decomposition. */
  get canonicalEquivalence(): boolean {
    return (this.flagBits & CANON_EQ) !== 0;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Code handle and extra match options for an anchoring mode.
   */
  code(mode: VariantMode): { handle: NativeHandle; matchOptions: number } {
    const variant = this.variants[mode];
    return {
      handle: variant.handle,
      matchOptions: variant.kind === "shared" ? variant.matchOptions : 0,
    };
  }

  matcher(input: string, options?: MatcherOptions): Matcher {
    if (this.closed) {
      throw new IllegalStateError("Pattern has been closed");
    }
    return new Matcher(this, input, options);
  }

  /**
   * Split `input` around matches of this pattern.
   *
   * A positive limit caps the number of pieces; zero drops trailing
   * empty strings; a negative limit keeps them.
   */
  split(input: string, limit = 0): string[] {
    return this.splitPieces(input, limit, false);
  }

  /**
   * Like split(), but each delimiter is returned between the pieces it
   * separated.
   */
  splitWithDelimiters(input: string, limit: number): string[] {
    return this.splitPieces(input, limit, true);
  }

  /**
   * Lazily split `input`. Trailing empty strings are dropped.
   */
  *splitAsStream(input: string): Generator<string, void, undefined> {
    if (input.length === 0) {
      yield input;
      return;
    }

    const m = this.matcher(input);
    try {
      let current = 0;
      let pendingEmpty = 0;
      while (m.find()) {
        const piece = input.slice(current, m.start());
        current = m.end();
        if (piece.length > 0) {
          for (; pendingEmpty > 0; pendingEmpty--) yield "";
          yield piece;
        } else if (current > 0) {
          // A zero-width match at the beginning yields no leading piece
          pendingEmpty++;
        }
      }
      const rest = input.slice(current);
      if (rest.length > 0) {
        for (; pendingEmpty > 0; pendingEmpty--) yield "";
        yield rest;
      }
    } finally {
      m.close();
    }
  }

  /** Predicate testing whether the pattern is found in a string. */
  asPredicate(): (input: string) => boolean {
    return (input) => {
      const m = this.matcher(input);
      try {
        return m.find();
      } finally {
        m.close();
      }
    };
  }

  /** Predicate testing whether the pattern matches a whole string. */
  asMatchPredicate(): (input: string) => boolean {
    return (input) => {
      const m = this.matcher(input);
      try {
        return m.matches();
      } finally {
        m.close();
      }
    };
  }

  toString(): string {
    return this.source;
  }

  /**
   * Release the engine handles. Calling close() again does nothing.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const handles = new Set(
      Object.values(this.variants).map((variant) => variant.handle),
    );
    for (const handle of handles) {
      this.adapter.release(handle);
    }
  }

  private splitPieces(
    input: string,
    limit: number,
    withDelimiters: boolean,
  ): string[] {
    const limited = limit > 0;
    const pieces: string[] = [];
    let matchCount = 0;
    let index = 0;

    const m = this.matcher(input);
    try {
      while (m.find()) {
        if (!limited || matchCount < limit - 1) {
          if (index === 0 && m.start() === 0 && m.end() === 0) {
            continue;
          }
          pieces.push(input.slice(index, m.start()));
          if (withDelimiters) {
            pieces.push(input.slice(m.start(), m.end()));
          }
          index = m.end();
          matchCount++;
        } else {
          break;
        }
      }
    } finally {
      m.close();
    }

    if (index === 0) {
      return [input];
    }
    pieces.push(input.slice(index));

    if (limit === 0) {
      while (pieces.length > 0 && pieces[pieces.length - 1] === "") {
        pieces.pop();
      }
    }
    return pieces;
  }
}
