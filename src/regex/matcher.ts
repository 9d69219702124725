/**
 * Matcher - the find/lookingAt/matches state machine over one subject.
 *
 * The engine only ever sees the bytes of the current region, so nothing
 * outside the region can influence a match. Captures come back as byte
 * offsets into the region and are translated to code units of the
 * caller's string before they are stored.
 *
 * A matcher is not safe to share between concurrent callers.
 */

import { type MatcherOptions, resolveMatcherOptions } from "../config.js";
import {
  MatchOption,
  type NativeHandle,
  NULL_HANDLE,
} from "../engine/types.js";
import {
  IllegalArgumentError,
  IllegalStateError,
  IndexOutOfBoundsError,
} from "../errors.js";
import { CanonicalText } from "../text/canonical.js";
import {
  CoordinateTranslator,
  isSurrogatePairAt,
} from "../text/coordinates.js";
import type { Appendable } from "../types.js";
import { MatchResult, resolveGroup } from "./match-result.js";
import type { Pattern, VariantMode } from "./pattern.js";
import {
  type CaptureSource,
  expandTemplate,
  quoteReplacement,
} from "./replacement.js";

type MatchState =
  | { readonly kind: "fresh" }
  | { readonly kind: "no-match"; readonly partial: boolean }
  | {
      readonly kind: "match";
      /** Code unit offsets into the subject, -1 pairs for unset groups */
      readonly indices: readonly number[];
      readonly mark: string | null;
    };

/** The subject as the engine sees it */
interface SearchedText {
  coordinates: CoordinateTranslator;
  /** Present when the pattern matches in canonical decomposition */
  canonical: CanonicalText | null;
}

interface RegionView {
  bytes: Uint8Array;
  byteStart: number;
  byteEnd: number;
}

export type Replacer = (result: MatchResult) => string;

const FRESH: MatchState = { kind: "fresh" };

export class Matcher implements CaptureSource {
  private currentPattern: Pattern;
  private text: string;
  private searched: SearchedText;
  private view: RegionView | null = null;
  private from = 0;
  private to: number;
  private anchoringBounds: boolean;
  private partialMatching: boolean;
  private state: MatchState = FRESH;
  /** Span of the last successful match; find() continues from its end */
  private previous: readonly [start: number, end: number] | null = null;
  /** Set by a failed find(); later find() calls fail until a reset */
  private exhausted = false;
  private appendCursor = 0;
  private stack: NativeHandle;

  constructor(pattern: Pattern, input: string, options?: MatcherOptions) {
    const resolved = resolveMatcherOptions(options);
    this.currentPattern = pattern;
    this.text = input;
    this.to = input.length;
    this.searched = this.prepare(input);
    this.anchoringBounds = resolved.anchoringBounds;
    this.partialMatching = false;
    this.stack = pattern.adapter.createExecutionStack();
    if (resolved.partialMatching) {
      this.usePartialMatching(true);
    }
  }

  /**
   * Escape `\` and `$` so the string is used literally as a template.
   */
  static quoteReplacement(text: string): string {
    return quoteReplacement(text);
  }

  pattern(): Pattern {
    return this.currentPattern;
  }

  // ---- searching ----

  /**
   * Find the next match. Without an argument the search continues after
   * the previous match; with a start offset the matcher is reset first.
   */
  find(start?: number): boolean {
    if (start !== undefined) {
      if (!Number.isInteger(start) || start < 0 || start > this.text.length) {
        throw new IndexOutOfBoundsError(`Illegal start index ${start}`);
      }
      this.reset();
      return this.search(start, "search");
    }

    if (this.exhausted) {
      return false;
    }
    let next = this.from;
    if (this.previous) {
      const [matchStart, matchEnd] = this.previous;
      next = matchEnd;
      if (matchStart === next) {
        // Never split a surrogate pair when stepping past an empty match
        next += isSurrogatePairAt(this.text, next) ? 2 : 1;
      }
    }

    if (next < this.from) {
      next = this.from;
    }
    if (next > this.to) {
      this.state = { kind: "no-match", partial: false };
      this.exhausted = true;
      return false;
    }
    return this.search(next, "search");
  }

  /** Match at the start of the region, without requiring it to reach the end. */
  lookingAt(): boolean {
    return this.search(this.from, "lookingAt");
  }

  /** Match the whole region. */
  matches(): boolean {
    return this.search(this.from, "matches");
  }

  hasMatch(): boolean {
    return this.state.kind === "match";
  }

  /** Whether the last attempt ran out of input while a match was still possible. */
  hasPartialMatch(): boolean {
    return this.state.kind === "no-match" && this.state.partial;
  }

  /** Name of the last backtracking marker passed by the last match. */
  mark(): string | null {
    return this.state.kind === "match" ? this.state.mark : null;
  }

  // ---- captures ----

  groupCount(): number {
    return this.currentPattern.groupCount();
  }

  namedGroups(): ReadonlyMap<string, number> {
    return this.currentPattern.namedGroups();
  }

  start(group: number | string = 0): number {
    return this.bounds(group)[0];
  }

  end(group: number | string = 0): number {
    return this.bounds(group)[1];
  }

  group(): string;
  group(group: number | string): string | null;
  group(group: number | string = 0): string | null {
    const [start, end] = this.bounds(group);
    return start < 0 ? null : this.text.slice(start, end);
  }

  toMatchResult(): MatchResult {
    return new MatchResult(
      this.text,
      this.state.kind === "match" ? this.state.indices : null,
      this.groupCount(),
      this.namedGroups(),
    );
  }

  /**
   * Iterate over the remaining matches as snapshots. Every iteration
   * starts again from the beginning of the region.
   */
  results(): Iterable<MatchResult> {
    return {
      [Symbol.iterator]: () => this.iterateResults(),
    };
  }

  // ---- region and configuration ----

  region(start: number, end: number): this {
    if (!Number.isInteger(start) || start < 0 || start > this.text.length) {
      throw new IndexOutOfBoundsError(`start ${start}`);
    }
    if (!Number.isInteger(end) || end < 0 || end > this.text.length) {
      throw new IndexOutOfBoundsError(`end ${end}`);
    }
    if (start > end) {
      throw new IndexOutOfBoundsError(`start ${start} > end ${end}`);
    }
    this.reset();
    this.from = start;
    this.to = end;
    return this;
  }

  regionStart(): number {
    return this.from;
  }

  regionEnd(): number {
    return this.to;
  }

  /**
   * With anchoring bounds, ^ and $ match at the region edges. Without,
   * the edges behave like ordinary positions unless they are the ends of
   * the subject. Changing the mode discards the current match.
   */
  useAnchoringBounds(value: boolean): this {
    this.anchoringBounds = value;
    this.clearMatch();
    return this;
  }

  hasAnchoringBounds(): boolean {
    return this.anchoringBounds;
  }

  /**
   * Report partial matches. Requires an engine that supports them.
   */
  usePartialMatching(value: boolean): this {
    if (value && !this.currentPattern.adapter.capabilities.partialMatching) {
      throw new IllegalArgumentError(
        `Engine ${this.currentPattern.adapter.engine.name} does not support partial matching`,
      );
    }
    this.partialMatching = value;
    return this;
  }

  /**
   * Reset match state, region and append position. With an argument,
   * also replace the subject.
   */
  reset(input?: string): this {
    if (input !== undefined) {
      this.text = input;
      this.searched = this.prepare(input);
    }
    this.clearMatch();
    this.appendCursor = 0;
    this.from = 0;
    this.to = this.text.length;
    this.view = null;
    return this;
  }

  /**
   * Switch to another pattern. Match state is discarded; the region and
   * append position are kept.
   */
  usePattern(pattern: Pattern): this {
    if (pattern.isClosed) {
      throw new IllegalArgumentError("Pattern has been closed");
    }
    const previous = this.currentPattern;
    previous.adapter.releaseExecutionStack(this.stack);
    this.stack = NULL_HANDLE;

    this.currentPattern = pattern;
    if (pattern.canonicalEquivalence !== previous.canonicalEquivalence) {
      this.searched = this.prepare(this.text);
      this.view = null;
    }
    if (this.partialMatching && !pattern.adapter.capabilities.partialMatching) {
      this.partialMatching = false;
    }
    this.stack = pattern.adapter.createExecutionStack();
    this.clearMatch();
    return this;
  }

  /** Release the execution stack. Calling close() again does nothing. */
  close(): void {
    this.currentPattern.adapter.releaseExecutionStack(this.stack);
    this.stack = NULL_HANDLE;
  }

  // ---- replacement ----

  /**
   * Push the text between the append position and the current match,
   * then the expanded template, and move the append position to the end
   * of the match.
   *
   * Output pushed before a template error stays in the sink.
   */
  appendReplacement(sink: Appendable, replacement: string): this {
    if (this.state.kind !== "match") {
      throw new IllegalStateError();
    }
    const [start, end] = [this.state.indices[0], this.state.indices[1]];
    sink.push(this.text.slice(this.appendCursor, start));
    expandTemplate(replacement, this, sink);
    this.appendCursor = end;
    return this;
  }

  /**
   * Push the text between the append position and the end of the region.
   */
  appendTail<T extends Appendable>(sink: T): T {
    if (this.appendCursor < this.to) {
      sink.push(this.text.slice(this.appendCursor, this.to));
    }
    return sink;
  }

  /**
   * Replace every match. A function replacer receives each match and
   * returns a template.
   */
  replaceAll(replacement: string | Replacer): string {
    return this.replace(replacement, true);
  }

  replaceFirst(replacement: string | Replacer): string {
    return this.replace(replacement, false);
  }

  toString(): string {
    const last = this.state.kind === "match" ? this.group() : "";
    return `Matcher[pattern=${this.currentPattern.pattern()} region=${this.from},${this.to} lastmatch=${last}]`;
  }

  // ---- internals ----

  private replace(replacement: string | Replacer, all: boolean): string {
    this.reset();
    if (!this.find()) {
      return this.text;
    }
    const sink: string[] = [];
    do {
      const template =
        typeof replacement === "string"
          ? replacement
          : replacement(this.toMatchResult());
      this.appendReplacement(sink, template);
    } while (all && this.find());
    this.appendTail(sink);
    return sink.join("");
  }

  private *iterateResults(): Generator<MatchResult, void, undefined> {
    this.clearMatch();
    while (this.find()) {
      yield this.toMatchResult();
    }
  }

  private clearMatch(): void {
    this.state = FRESH;
    this.previous = null;
    this.exhausted = false;
  }

  private bounds(group: number | string): [start: number, end: number] {
    if (this.state.kind !== "match") {
      throw new IllegalStateError();
    }
    const index = resolveGroup(group, this.groupCount(), this.namedGroups());
    return [this.state.indices[index * 2], this.state.indices[index * 2 + 1]];
  }

  private prepare(input: string): SearchedText {
    if (this.currentPattern.canonicalEquivalence) {
      const canonical = CanonicalText.of(input);
      return {
        coordinates: CoordinateTranslator.of(canonical.normalized),
        canonical,
      };
    }
    return { coordinates: CoordinateTranslator.of(input), canonical: null };
  }

  /** Map a subject offset into the searched text. */
  private toSearched(index: number): number {
    const { canonical } = this.searched;
    return canonical ? canonical.toNormalized(index) : index;
  }

  private regionView(): RegionView {
    if (!this.view) {
      const { coordinates } = this.searched;
      // A region edge inside a surrogate pair leaves the pair outside
      const byteStart = coordinates.ceilByte(this.toSearched(this.from));
      const byteEnd = coordinates.unitToByte(this.toSearched(this.to));
      this.view = {
        bytes: coordinates.bytes.subarray(
          byteStart,
          Math.max(byteStart, byteEnd),
        ),
        byteStart,
        byteEnd,
      };
    }
    return this.view;
  }

  private search(from: number, mode: VariantMode): boolean {
    const { handle, matchOptions } = this.currentPattern.code(mode);
    const { coordinates } = this.searched;
    const view = this.regionView();

    let options = matchOptions;
    if (!this.anchoringBounds) {
      if (this.from > 0) options |= MatchOption.NOTBOL;
      if (this.to < this.text.length) options |= MatchOption.NOTEOL;
    }
    if (
      options & (MatchOption.NOTBOL | MatchOption.NOTEOL) &&
      !this.currentPattern.adapter.capabilities.lineBoundaryOptions
    ) {
      throw new IllegalArgumentError(
        `Engine ${this.currentPattern.adapter.engine.name} does not support regions without anchoring bounds`,
      );
    }
    if (this.partialMatching) {
      options |= MatchOption.PARTIAL_SOFT;
    }

    const fromByte = Math.max(
      coordinates.ceilByte(this.toSearched(from)),
      view.byteStart,
    );
    if (fromByte > view.byteEnd) {
      // The start lies inside a pair that closes the region
      return this.fail(mode, false);
    }
    const startByte = fromByte - view.byteStart;
    const outcome = this.currentPattern.adapter.match(
      handle,
      view.bytes,
      startByte,
      options,
      this.stack,
    );

    switch (outcome.kind) {
      case "no-match":
        return this.fail(mode, false);
      case "partial":
        return this.fail(mode, true);
      case "matched": {
        const indices = this.toUnits(outcome.captures, view.byteStart);
        this.state = { kind: "match", indices, mark: outcome.mark };
        this.previous = [indices[0], indices[1]];
        return true;
      }
    }
  }

  /** Only a failed find() ends the search; lookingAt() and matches() do not. */
  private fail(mode: VariantMode, partial: boolean): false {
    this.state = { kind: "no-match", partial };
    if (mode === "search") {
      this.exhausted = true;
    }
    return false;
  }

  /** Translate region-relative byte captures to subject code units. */
  private toUnits(captures: readonly number[], byteStart: number): number[] {
    const { coordinates, canonical } = this.searched;
    const indices = new Array<number>(captures.length).fill(-1);
    for (let i = 0; i + 1 < captures.length; i += 2) {
      if (captures[i] < 0 || captures[i + 1] < 0) continue;
      const start = coordinates.byteToUnit(captures[i] + byteStart);
      const end = coordinates.byteToUnit(captures[i + 1] + byteStart);
      indices[i] = canonical ? canonical.toOriginalStart(start) : start;
      indices[i + 1] = canonical ? canonical.toOriginalEnd(end) : end;
    }
    return indices;
  }
}
