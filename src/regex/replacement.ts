/**
 * Replacement templates
 *
 * Grammar, scanned once left to right:
 * - `\X` is a literal X
 * - `$n` references group n; further digits are taken while the number
 *   still names an existing group
 * - `${n}` and `${name}` reference a group by number or name
 * - anything else is copied as is
 *
 * Expansion writes to the sink as it scans, so output pushed before a
 * template error stays in the sink.
 */

import { IllegalArgumentError, IndexOutOfBoundsError } from "../errors.js";
import type { Appendable } from "../types.js";

/** What a template expands against: a live matcher or a snapshot. */
export interface CaptureSource {
  groupCount(): number;
  group(group: number): string | null;
  namedGroups(): ReadonlyMap<string, number>;
}

function isAsciiDigit(char: string | undefined): char is string {
  return char !== undefined && char >= "0" && char <= "9";
}

const GROUP_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function resolveName(name: string, captures: CaptureSource): number {
  if (!GROUP_NAME.test(name)) {
    throw new IllegalArgumentError(
      `Named capturing group <${name}> has an invalid name`,
    );
  }
  const group = captures.namedGroups().get(name);
  if (group === undefined) {
    throw new IllegalArgumentError(`No group with name {${name}}`);
  }
  return group;
}

function resolveNumber(digits: string, captures: CaptureSource): number {
  const group = Number.parseInt(digits, 10);
  if (group > captures.groupCount()) {
    throw new IndexOutOfBoundsError(`No group ${digits}`);
  }
  return group;
}

/**
 * Expand a template against the current captures, pushing the result
 * onto the sink. A group that did not participate expands to nothing.
 */
export function expandTemplate(
  template: string,
  captures: CaptureSource,
  sink: Appendable,
): void {
  let literal = "";
  const pushGroup = (group: number): void => {
    const value = captures.group(group);
    if (value !== null) {
      literal += value;
    }
  };

  let i = 0;
  while (i < template.length) {
    const char = template[i];

    if (char === "\\") {
      i++;
      if (i >= template.length) {
        sink.push(literal);
        throw new IllegalArgumentError(
          "character to be escaped is missing",
        );
      }
      // An escape always takes a whole code point
      const escaped = String.fromCodePoint(template.codePointAt(i) ?? 0);
      literal += escaped;
      i += escaped.length;
      continue;
    }

    if (char !== "$") {
      literal += char;
      i++;
      continue;
    }

    i++;
    if (i >= template.length) {
      sink.push(literal);
      throw new IllegalArgumentError(
        "Illegal group reference: group index is missing",
      );
    }

    try {
      if (template[i] === "{") {
        const close = template.indexOf("}", i + 1);
        if (close === -1) {
          throw new IllegalArgumentError("named capturing group is missing trailing '}'");
        }
        const reference = template.slice(i + 1, close);
        if (reference.length === 0) {
          throw new IllegalArgumentError(
            "named capturing group has 0 length name",
          );
        }
        if (isAsciiDigit(reference[0])) {
          if (!/^[0-9]+$/.test(reference)) {
            throw new IllegalArgumentError(
              `Illegal group reference: \${${reference}}`,
            );
          }
          pushGroup(resolveNumber(reference, captures));
        } else {
          pushGroup(resolveName(reference, captures));
        }
        i = close + 1;
        continue;
      }

      if (!isAsciiDigit(template[i])) {
        throw new IllegalArgumentError("Illegal group reference");
      }

      let group = resolveNumber(template[i], captures);
      i++;
      while (isAsciiDigit(template[i])) {
        const next = group * 10 + Number.parseInt(template[i], 10);
        if (next > captures.groupCount()) break;
        group = next;
        i++;
      }
      pushGroup(group);
    } catch (error) {
      sink.push(literal);
      throw error;
    }
  }

  sink.push(literal);
}

/**
 * Escape `\` and `$` so the string is used literally as a template.
 */
export function quoteReplacement(text: string): string {
  if (!text.includes("\\") && !text.includes("$")) {
    return text;
  }
  return text.replace(/[\\$]/g, "\\$&");
}
