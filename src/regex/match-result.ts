/**
 * MatchResult - an immutable snapshot of one match, detached from the
 * matcher that produced it.
 */

import {
  IllegalArgumentError,
  IllegalStateError,
  IndexOutOfBoundsError,
} from "../errors.js";
import type { CaptureSource } from "./replacement.js";

/**
 * Resolve a group number or name to a group index, validating it
 * against the pattern's groups.
 */
export function resolveGroup(
  group: number | string,
  groupCount: number,
  names: ReadonlyMap<string, number>,
): number {
  if (typeof group === "string") {
    const index = names.get(group);
    if (index === undefined) {
      throw new IllegalArgumentError(`No group with name <${group}>`);
    }
    return index;
  }
  if (!Number.isInteger(group) || group < 0 || group > groupCount) {
    throw new IndexOutOfBoundsError(`No group ${group}`);
  }
  return group;
}

export class MatchResult implements CaptureSource {
  private readonly text: string;
  /** Code unit offsets, two per group, -1 for groups that did not participate */
  private readonly indices: readonly number[] | null;
  private readonly names: ReadonlyMap<string, number>;
  private readonly count: number;

  constructor(
    text: string,
    indices: readonly number[] | null,
    groupCount: number,
    names: ReadonlyMap<string, number>,
  ) {
    this.text = text;
    this.indices = indices === null ? null : [...indices];
    this.count = groupCount;
    this.names = names;
  }

  hasMatch(): boolean {
    return this.indices !== null;
  }

  groupCount(): number {
    return this.count;
  }

  namedGroups(): ReadonlyMap<string, number> {
    return this.names;
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

  private bounds(group: number | string): [start: number, end: number] {
    if (this.indices === null) {
      throw new IllegalStateError();
    }
    const index = resolveGroup(group, this.count, this.names);
    return [this.indices[index * 2], this.indices[index * 2 + 1]];
  }
}
