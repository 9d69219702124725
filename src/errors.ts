/**
 * Error taxonomy
 *
 * - PatternSyntaxError: the pattern could not be compiled
 * - EngineError: the engine returned a failure code while matching
 * - UsageError: the caller broke an API precondition
 *
 * Nothing here is retried; every error reaches the immediate caller.
 */

export abstract class RegexError extends Error {}

/**
 * Error thrown when a pattern fails to compile.
 */
export class PatternSyntaxError extends RegexError {
  constructor(
    readonly description: string,
    readonly pattern: string,
    /** Code unit offset into the pattern, or -1 when unknown */
    readonly index: number,
  ) {
    super(PatternSyntaxError.format(description, pattern, index));
    this.name = "PatternSyntaxError";
  }

  private static format(
    description: string,
    pattern: string,
    index: number,
  ): string {
    let message = description;
    if (index >= 0) {
      message += ` near index ${index}`;
    }
    message += `\n${pattern}`;
    if (index >= 0 && index <= pattern.length) {
      message += `\n${" ".repeat(index)}^`;
    }
    return message;
  }
}

/**
 * Error thrown when the engine fails a match call.
 */
export class EngineError extends RegexError {
  constructor(
    readonly operation: string,
    readonly code: number,
    detail: string,
  ) {
    super(`${operation} failed: ${detail} (engine code ${code})`);
    this.name = "EngineError";
  }
}

/**
 * Error thrown when the engine gives up because a resource limit was hit.
 */
export class MatchLimitError extends EngineError {
  constructor(operation: string, code: number, detail: string) {
    super(operation, code, detail);
    this.name = "MatchLimitError";
  }
}

export abstract class UsageError extends RegexError {}

/**
 * Error thrown when capture state is read without a current match.
 */
export class IllegalStateError extends UsageError {
  constructor(message = "No match available") {
    super(message);
    this.name = "IllegalStateError";
  }
}

/**
 * Error thrown for group indices, offsets or regions out of range.
 */
export class IndexOutOfBoundsError extends UsageError {
  constructor(message: string) {
    super(message);
    this.name = "IndexOutOfBoundsError";
  }
}

/**
 * Error thrown for unknown group names, malformed replacement templates
 * and missing arguments.
 */
export class IllegalArgumentError extends UsageError {
  constructor(message: string) {
    super(message);
    this.name = "IllegalArgumentError";
  }
}
