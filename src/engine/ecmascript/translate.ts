/**
 * Translation of PCRE-flavoured pattern syntax into ECMAScript RegExp source.
 *
 * Line anchors are kept as tokens and rendered per call, because their
 * meaning depends on the NOTBOL/NOTEOL match options and on the newline
 * convention. Everything else is rewritten once at compile time.
 */

import type { NameTableEntry } from "../types.js";

export interface TranslateOptions {
  caseless: boolean;
  dotAll: boolean;
  multiline: boolean;
  literal: boolean;
  extended: boolean;
  /** Unicode semantics for \w, \d, \s and \b */
  ucp: boolean;
  /** LF is the only line terminator */
  newlineLf: boolean;
}

/** ^, $ and \Z, resolved when the pattern is rendered */
export type AnchorToken = { anchor: "bol" } | { anchor: "eol" } | {
  anchor: "eos";
};

export type PatternPiece = string | AnchorToken;

export interface TranslatedPattern {
  pieces: readonly PatternPiece[];
  captureCount: number;
  names: readonly NameTableEntry[];
  caseless: boolean;
  multiline: boolean;
  newlineLf: boolean;
}

export interface RenderOptions {
  notBol: boolean;
  notEol: boolean;
}

/**
 * Error raised for syntax the translator rejects.
 * `offset` is a code unit offset into the pattern.
 */
export class TranslationError extends Error {
  constructor(
    message: string,
    readonly offset: number,
  ) {
    super(message);
    this.name = "TranslationError";
  }
}

/** POSIX character class to regex character range mapping (Map prevents prototype pollution) */
const POSIX_CLASS_MAP = new Map<string, string>([
  ["alpha", "a-zA-Z"],
  ["digit", "0-9"],
  ["alnum", "a-zA-Z0-9"],
  ["lower", "a-z"],
  ["upper", "A-Z"],
  ["xdigit", "0-9A-Fa-f"],
  ["space", " \\t\\n\\r\\f\\v"],
  ["blank", " \\t"],
  ["punct", "!-\\/:-@\\[-`{-~"],
  ["graph", "!-~"],
  ["print", " -~"],
  ["cntrl", "\\x00-\\x1F\\x7F"],
  ["ascii", "\\x00-\\x7F"],
  ["word", "a-zA-Z0-9_"],
]);

const GENERAL_CATEGORIES = new Set([
  "C", "Cc", "Cf", "Cn", "Co", "Cs",
  "L", "LC", "Ll", "Lm", "Lo", "Lt", "Lu",
  "M", "Mc", "Me", "Mn",
  "N", "Nd", "Nl", "No",
  "P", "Pc", "Pd", "Pe", "Pf", "Pi", "Po", "Ps",
  "S", "Sc", "Sk", "Sm", "So",
  "Z", "Zl", "Zp", "Zs",
]);

const UCP_WORD = "\\p{Alphabetic}\\p{M}\\p{Nd}\\p{Pc}\\p{Join_Control}";
const ASCII_SPACE = "\\t\\n\\v\\f\\r ";
const HORIZONTAL_SPACE =
  "\\t \\u00a0\\u1680\\u180e\\u2000-\\u200a\\u202f\\u205f\\u3000";
const VERTICAL_SPACE = "\\n\\v\\f\\r\\u0085\\u2028\\u2029";
const LINE_TERMINATORS = "\\n\\r\\u0085\\u2028\\u2029";

/** Characters that may be escaped with \ under the RegExp u flag */
const SYNTAX_CHARS = new Set("^$\\.*+?()[]{}|/");

const QUANTIFIER = /^\{\d+(?:,\d*)?\}/;
const GROUP_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const LEADING_FLAGS = /^\(\?([imsx]*)(?:-([imsx]*))?\)/;

function escapeChar(char: string, inClass: boolean): string {
  if (SYNTAX_CHARS.has(char) || (inClass && char === "-")) {
    return `\\${char}`;
  }
  return char;
}

/**
 * Escape a literal string for use inside or outside a character class.
 */
export function escapeLiteral(text: string, inClass = false): string {
  let result = "";
  for (const char of text) {
    result += escapeChar(char, inClass);
  }
  return result;
}

class PatternTranslator {
  private readonly source: string;
  private readonly options: TranslateOptions;
  private readonly pieces: PatternPiece[] = [];
  private readonly names: NameTableEntry[] = [];
  private captureCount = 0;
  private i = 0;

  constructor(source: string, options: TranslateOptions) {
    this.source = source;
    this.options = { ...options };
  }

  translate(): TranslatedPattern {
    if (this.options.literal) {
      this.pieces.push(escapeLiteral(this.source));
    } else {
      this.readLeadingFlags();
      while (this.i < this.source.length) {
        this.step();
      }
    }

    return {
      pieces: this.pieces,
      captureCount: this.captureCount,
      names: this.names,
      caseless: this.options.caseless,
      multiline: this.options.multiline,
      newlineLf: this.options.newlineLf,
    };
  }

  /** (?i), (?s), (?m), (?x) and their negations, at the very start only */
  private readLeadingFlags(): void {
    for (;;) {
      const match = this.source.slice(this.i).match(LEADING_FLAGS);
      if (!match) return;
      this.applyFlags(match[1] ?? "", true);
      this.applyFlags(match[2] ?? "", false);
      this.i += match[0].length;
    }
  }

  private applyFlags(flags: string, on: boolean): void {
    for (const flag of flags) {
      switch (flag) {
        case "i":
          this.options.caseless = on;
          break;
        case "m":
          this.options.multiline = on;
          break;
        case "s":
          this.options.dotAll = on;
          break;
        case "x":
          this.options.extended = on;
          break;
      }
    }
  }

  private emit(piece: PatternPiece): void {
    this.pieces.push(piece);
  }

  private fail(message: string, offset = this.i): never {
    throw new TranslationError(message, offset);
  }

  private step(): void {
    const char = this.source[this.i];

    if (this.options.extended) {
      if (/[ \t\n\v\f\r]/.test(char)) {
        this.i++;
        return;
      }
      if (char === "#") {
        while (this.i < this.source.length && this.source[this.i] !== "\n") {
          this.i++;
        }
        return;
      }
    }

    switch (char) {
      case "\\":
        if (this.source[this.i + 1] === "Z") {
          this.emit({ anchor: "eos" });
          this.i += 2;
        } else {
          this.emit(this.readEscape(false));
        }
        return;
      case "[":
        this.emit(this.readClass());
        return;
      case "(":
        this.readGroupOpen();
        return;
      case ")":
      case "|":
        this.emit(char);
        this.i++;
        return;
      case "^":
        this.emit({ anchor: "bol" });
        this.i++;
        return;
      case "$":
        this.emit({ anchor: "eol" });
        this.i++;
        return;
      case ".":
        this.emit(this.dot());
        this.i++;
        return;
      case "*":
      case "+":
      case "?":
        this.emit(char);
        this.i++;
        this.readQuantifierSuffix();
        return;
      case "{": {
        const quantifier = this.source.slice(this.i).match(QUANTIFIER);
        if (quantifier) {
          this.emit(quantifier[0]);
          this.i += quantifier[0].length;
          this.readQuantifierSuffix();
        } else {
          this.emit("\\{");
          this.i++;
        }
        return;
      }
      case "}":
      case "]":
      case "/":
        this.emit(`\\${char}`);
        this.i++;
        return;
      default:
        this.emit(char);
        this.i++;
    }
  }

  private readQuantifierSuffix(): void {
    const next = this.source[this.i];
    if (next === "+") {
      this.fail("possessive quantifiers are not supported");
    }
    if (next === "?") {
      this.emit("?");
      this.i++;
    }
  }

  private dot(): string {
    if (this.options.dotAll) return "[\\s\\S]";
    return this.options.newlineLf ? "[^\\n]" : `[^${LINE_TERMINATORS}]`;
  }

  private readGroupOpen(): void {
    const start = this.i;
    const rest = this.source.slice(this.i);

    if (rest.startsWith("(*")) {
      this.fail("backtracking control verbs are not supported");
    }
    if (!rest.startsWith("(?")) {
      this.captureCount++;
      this.emit("(");
      this.i++;
      return;
    }

    if (rest.startsWith("(?#")) {
      const close = this.source.indexOf(")", this.i);
      if (close === -1) {
        this.fail("missing ) after (?# comment", this.source.length);
      }
      this.i = close + 1;
      return;
    }

    for (const prefix of ["(?:", "(?=", "(?!", "(?<=", "(?<!"]) {
      if (rest.startsWith(prefix)) {
        this.emit(prefix);
        this.i += prefix.length;
        return;
      }
    }

    const named = rest.match(/^\(\?(?:P?<([^>]*)>|'([^']*)')/);
    if (named) {
      const name = named[1] ?? named[2] ?? "";
      if (!GROUP_NAME.test(name)) {
        this.fail(`invalid group name "${name}"`, start + 2);
      }
      if (this.names.some((entry) => entry.name === name)) {
        this.fail(`two named subpatterns have the same name "${name}"`, start + 2);
      }
      this.captureCount++;
      this.names.push({ name, group: this.captureCount });
      this.emit(`(?<${name}>`);
      this.i += named[0].length;
      return;
    }

    const backref = rest.match(/^\(\?P=([A-Za-z_][A-Za-z0-9_]*)\)/);
    if (backref) {
      this.emit(`\\k<${backref[1]}>`);
      this.i += backref[0].length;
      return;
    }

    if (rest.startsWith("(?>")) {
      this.fail("atomic groups are not supported");
    }
    if (rest.startsWith("(?|")) {
      this.fail("branch reset groups are not supported");
    }
    if (rest.startsWith("(?(")) {
      this.fail("conditional groups are not supported");
    }
    if (/^\(\?(?:R|[+-]?\d|&|P>)/.test(rest)) {
      this.fail("recursion and subroutine calls are not supported");
    }
    if (/^\(\?[a-zA-Z^-]/.test(rest)) {
      this.fail("inline flags are only supported at the start of the pattern");
    }
    this.fail("unrecognized character after (?");
  }

  /**
   * Read a bracket expression. A ] right after [ or [^ is literal, and
   * POSIX classes like [[:alpha:]] expand to ASCII ranges.
   */
  private readClass(): string {
    const start = this.i;
    let result = "[";
    this.i++;

    if (this.source[this.i] === "^") {
      result += "^";
      this.i++;
    }
    if (this.source[this.i] === "]") {
      result += "\\]";
      this.i++;
    }

    while (this.i < this.source.length && this.source[this.i] !== "]") {
      const char = this.source[this.i];

      if (char === "[" && this.source[this.i + 1] === ":") {
        const close = this.source.indexOf(":]", this.i + 2);
        if (close !== -1) {
          const name = this.source.slice(this.i + 2, close);
          const replacement = POSIX_CLASS_MAP.get(name);
          if (!replacement) {
            return this.fail(`unknown POSIX class name "${name}"`);
          }
          result += replacement;
          this.i = close + 2;
          continue;
        }
      }

      if (char === "\\") {
        result += this.readEscape(true);
        continue;
      }

      result += char === "[" ? "\\[" : char;
      this.i++;
    }

    if (this.i >= this.source.length) {
      this.fail("missing terminating ] for character class", start);
    }
    this.i++;
    return `${result}]`;
  }

  /**
   * Read one escape sequence starting at the backslash.
   */
  private readEscape(inClass: boolean): string {
    const start = this.i;
    const next = this.source.codePointAt(this.i + 1);
    if (next === undefined) {
      return this.fail("\\ at end of pattern");
    }
    const char = String.fromCodePoint(next);
    this.i += 1 + char.length;

    if (!/[A-Za-z0-9]/.test(char)) {
      return escapeChar(char, inClass);
    }

    const { ucp } = this.options;
    switch (char) {
      case "d":
        return ucp ? "\\p{Nd}" : "\\d";
      case "D":
        return ucp ? "\\P{Nd}" : "\\D";
      case "w":
        if (!ucp) return "\\w";
        return inClass ? UCP_WORD : `[${UCP_WORD}]`;
      case "W":
        if (!ucp) return "\\W";
        if (inClass) {
          this.fail("\\W inside a character class is not supported with Unicode classes", start);
        }
        return `[^${UCP_WORD}]`;
      case "s":
        if (ucp) return "\\p{White_Space}";
        return inClass ? ASCII_SPACE : `[${ASCII_SPACE}]`;
      case "S":
        if (ucp) return "\\P{White_Space}";
        return inClass ? "\\S" : `[^${ASCII_SPACE}]`;
      case "h":
        return inClass ? HORIZONTAL_SPACE : `[${HORIZONTAL_SPACE}]`;
      case "v":
        return inClass ? VERTICAL_SPACE : `[${VERTICAL_SPACE}]`;
      case "H":
      case "V":
        if (inClass) {
          this.fail(`\\${char} inside a character class is not supported`, start);
        }
        return char === "H" ? `[^${HORIZONTAL_SPACE}]` : `[^${VERTICAL_SPACE}]`;
      case "b":
        if (inClass) return "\\b";
        return ucp
          ? `(?:(?<=[${UCP_WORD}])(?![${UCP_WORD}])|(?<![${UCP_WORD}])(?=[${UCP_WORD}]))`
          : "\\b";
      case "B":
        this.assertOutsideClass(inClass, start, char);
        return ucp
          ? `(?:(?<=[${UCP_WORD}])(?=[${UCP_WORD}])|(?<![${UCP_WORD}])(?![${UCP_WORD}]))`
          : "\\B";
      case "A":
        this.assertOutsideClass(inClass, start, char);
        return "(?<![\\s\\S])";
      case "z":
        this.assertOutsideClass(inClass, start, char);
        return "(?![\\s\\S])";
      case "Z":
        return this.fail("\\Z is not allowed inside a character class", start);
      case "R":
        this.assertOutsideClass(inClass, start, char);
        return `(?:\\r\\n|[${VERTICAL_SPACE}])`;
      case "N":
        this.assertOutsideClass(inClass, start, char);
        return this.options.newlineLf ? "[^\\n]" : `[^${LINE_TERMINATORS}]`;
      case "Q":
        return this.readQuoted(inClass);
      case "E":
        return "";
      case "n":
      case "r":
      case "t":
      case "f":
        return `\\${char}`;
      case "e":
        return "\\x1B";
      case "a":
        return "\\x07";
      case "c": {
        const control = this.source[this.i];
        if (control === undefined || !/[A-Za-z]/.test(control)) {
          this.fail("\\c must be followed by a letter", start);
        }
        this.i++;
        return `\\c${control}`;
      }
      case "x":
        return this.readHexEscape(start);
      case "u": {
        const hex = this.source.slice(this.i, this.i + 4);
        if (!/^[0-9A-Fa-f]{4}$/.test(hex)) {
          this.fail("\\u must be followed by four hex digits", start);
        }
        this.i += 4;
        return `\\u${hex}`;
      }
      case "p":
      case "P":
        return this.readProperty(char === "P", inClass, start);
      case "k":
        return this.readNamedBackreference(start);
      case "g":
        return this.readGReference(start);
      case "0":
        return this.readOctal();
      default:
        break;
    }

    if (/[1-9]/.test(char)) {
      if (inClass) {
        this.fail("octal escapes inside character classes are not supported", start);
      }
      let digits = char;
      while (/[0-9]/.test(this.source[this.i] ?? "")) {
        digits += this.source[this.i];
        this.i++;
      }
      return `\\${digits}`;
    }

    if (char === "G") {
      this.fail("\\G is not supported", start);
    }
    return this.fail(`unrecognized character follows \\: ${char}`, start);
  }

  private assertOutsideClass(inClass: boolean, start: number, char: string): void {
    if (inClass) {
      this.fail(`\\${char} is not allowed inside a character class`, start);
    }
  }

  private readQuoted(inClass: boolean): string {
    const end = this.source.indexOf("\\E", this.i);
    const quoted =
      end === -1 ? this.source.slice(this.i) : this.source.slice(this.i, end);
    this.i = end === -1 ? this.source.length : end + 2;
    return escapeLiteral(quoted, inClass);
  }

  private readHexEscape(start: number): string {
    if (this.source[this.i] === "{") {
      const close = this.source.indexOf("}", this.i);
      const hex = close === -1 ? "" : this.source.slice(this.i + 1, close);
      if (!/^[0-9A-Fa-f]{1,6}$/.test(hex) || Number.parseInt(hex, 16) > 0x10ffff) {
        this.fail("invalid \\x{...} escape", start);
      }
      this.i = close + 1;
      return `\\u{${hex}}`;
    }
    const hex = (this.source.slice(this.i, this.i + 2).match(/^[0-9A-Fa-f]*/) ?? [""])[0];
    this.i += hex.length;
    return `\\x${hex.padStart(2, "0")}`;
  }

  private readOctal(): string {
    const digits = (this.source.slice(this.i, this.i + 2).match(/^[0-7]*/) ?? [""])[0];
    this.i += digits.length;
    const value = digits.length > 0 ? Number.parseInt(digits, 8) : 0;
    return `\\x${value.toString(16).padStart(2, "0")}`;
  }

  private readProperty(negated: boolean, inClass: boolean, start: number): string {
    let name: string;
    if (this.source[this.i] === "{") {
      const close = this.source.indexOf("}", this.i);
      if (close === -1) {
        this.fail("malformed \\p or \\P sequence", start);
      }
      name = this.source.slice(this.i + 1, close);
      this.i = close + 1;
    } else {
      name = this.source[this.i] ?? "";
      this.i++;
    }

    if (name.startsWith("^")) {
      negated = !negated;
      name = name.slice(1);
    }
    if (name.length === 0) {
      this.fail("malformed \\p or \\P sequence", start);
    }

    const prefix = negated ? "\\P" : "\\p";
    if (name === "Any") {
      if (negated) {
        return inClass ? "" : "[^\\s\\S]";
      }
      return inClass ? "\\s\\S" : "[\\s\\S]";
    }
    if (name === "L&") {
      return `${prefix}{LC}`;
    }
    if (GENERAL_CATEGORIES.has(name) || name.includes("=")) {
      return `${prefix}{${name}}`;
    }
    const script = name.startsWith("Is") ? name.slice(2) : name;
    return `${prefix}{Script=${script}}`;
  }

  private readNamedBackreference(start: number): string {
    const match = this.source
      .slice(this.i)
      .match(/^(?:<([^>]*)>|\{([^}]*)\}|'([^']*)')/);
    const name = match ? (match[1] ?? match[2] ?? match[3] ?? "") : "";
    if (!match || !GROUP_NAME.test(name)) {
      return this.fail("\\k is not followed by a group name", start);
    }
    this.i += match[0].length;
    return `\\k<${name}>`;
  }

  private readGReference(start: number): string {
    const match = this.source.slice(this.i).match(/^(?:\{([^}]*)\}|(-?\d+))/);
    if (!match) {
      return this.fail("a numbered reference must not be zero", start);
    }
    const reference = match[1] ?? match[2] ?? "";
    this.i += match[0].length;

    if (/^-\d+$/.test(reference)) {
      const group = this.captureCount + 1 + Number.parseInt(reference, 10);
      if (group < 1) {
        this.fail("reference to non-existent subpattern", start);
      }
      return `\\${group}`;
    }
    if (/^\d+$/.test(reference)) {
      if (Number.parseInt(reference, 10) === 0) {
        this.fail("a numbered reference must not be zero", start);
      }
      return `\\${reference}`;
    }
    if (!GROUP_NAME.test(reference)) {
      this.fail("\\g is not followed by a group name or number", start);
    }
    return `\\k<${reference}>`;
  }
}

export function translatePattern(
  source: string,
  options: TranslateOptions,
): TranslatedPattern {
  return new PatternTranslator(source, options).translate();
}

const START_OF_INPUT = "(?<![\\s\\S])";
const END_OF_INPUT = "(?![\\s\\S])";
const NEVER = "(?!)";

function renderAnchor(
  token: AnchorToken,
  pattern: TranslatedPattern,
  { notBol, notEol }: RenderOptions,
): string {
  const lf = pattern.newlineLf;
  // A lone \r ends a line, but \r\n is one terminator: no line edge inside it
  const notInsideCrlf = lf ? "" : "(?!(?<=\\r)\\n)";
  const terminator = lf ? "\\n" : `[${LINE_TERMINATORS}]`;
  const finalTerminator = lf ? "\\n" : `(?:\\r\\n|[${LINE_TERMINATORS}])`;
  const softEnd = `(?=${finalTerminator}?${END_OF_INPUT})${notInsideCrlf}`;

  switch (token.anchor) {
    case "eos":
      return softEnd;
    case "bol": {
      const afterTerminator = lf
        ? "(?<=\\n)(?=[\\s\\S])"
        : "(?:(?<=[\\n\\u0085\\u2028\\u2029])|(?<=\\r)(?!\\n))(?=[\\s\\S])";
      if (!pattern.multiline) {
        return notBol ? NEVER : START_OF_INPUT;
      }
      return notBol
        ? afterTerminator
        : `(?:${START_OF_INPUT}|${afterTerminator})`;
    }
    case "eol":
      if (!pattern.multiline) {
        return notEol ? NEVER : softEnd;
      }
      return notEol
        ? `(?=${terminator})${notInsideCrlf}`
        : `(?=${terminator}|${END_OF_INPUT})${notInsideCrlf}`;
  }
}

/**
 * Produce RegExp source for one combination of line boundary options.
 */
export function renderPattern(
  pattern: TranslatedPattern,
  options: RenderOptions,
): string {
  return pattern.pieces
    .map((piece) =>
      typeof piece === "string" ? piece : renderAnchor(piece, pattern, options),
    )
    .join("");
}
