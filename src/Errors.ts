/**
 * Error hierarchy for unit parsing, algebra and alias registration.
 *
 * Every failure is a tagged error so callers can pattern match with
 * `Effect.catchTag`. Parse errors carry the formula and the 0-based position of
 * the offending input together with a caret snippet for diagnostics.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Render `formula` with a caret under `position`.
 *
 * @since 0.1.0
 * @example
 * ```ts
 * snippetAt("kg +", 3)
 * // kg +
 * //    ^
 * ```
 */
export const snippetAt = (formula: string, position: number): string =>
  `${formula}\n${" ".repeat(Math.max(0, position))}^`

/**
 * Raised when the formula contains a character that no token accepts.
 *
 * @category Errors
 * @since 0.1.0
 */
export class LexError extends Data.TaggedError("LexError")<{
  readonly formula: string
  readonly position: number
  readonly character: string
}> {
  override get message(): string {
    return `Illegal character "${this.character}" at position ${this.position}`
  }

  get snippet(): string {
    return snippetAt(this.formula, this.position)
  }
}

/**
 * Raised when a token appears where the grammar does not allow it.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnexpectedTokenError extends Data.TaggedError("UnexpectedTokenError")<{
  readonly formula: string
  readonly position: number
  readonly token: string
  readonly expected: string
}> {
  override get message(): string {
    return `Unexpected token "${this.token}" at position ${this.position}: expected ${this.expected}`
  }

  get snippet(): string {
    return snippetAt(this.formula, this.position)
  }
}

/**
 * Structural problems that are not tied to a single stray token.
 *
 * @since 0.1.0
 */
export type SyntaxProblem = "UnterminatedGroup" | "MissingOperand" | "MissingAlias"

/**
 * Raised for unterminated groups, missing operands (including an empty
 * formula) and alias definitions without a `NAME =` part.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitSyntaxError extends Data.TaggedError("UnitSyntaxError")<{
  readonly formula: string
  readonly position: number
  readonly code: SyntaxProblem
  readonly problem: string
}> {
  override get message(): string {
    return `${this.problem} at position ${this.position}`
  }

  get snippet(): string {
    return snippetAt(this.formula, this.position)
  }
}

/**
 * Raised when a symbol, after every prefix split, matches neither a base
 * symbol nor a registered alias.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownUnitSymbolError extends Data.TaggedError("UnknownUnitSymbolError")<{
  readonly formula: string
  readonly position: number
  readonly symbol: string
}> {
  override get message(): string {
    return `Unknown unit symbol "${this.symbol}" at position ${this.position}`
  }

  get snippet(): string {
    return snippetAt(this.formula, this.position)
  }
}

/**
 * Raised by a direct alias lookup miss.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownAliasError extends Data.TaggedError("UnknownAliasError")<{
  readonly alias: string
}> {
  override get message(): string {
    return `Unknown unit alias "${this.alias}"`
  }
}

/**
 * Raised for a non-integer or out-of-range exponent, either in a `**`
 * expression or in a programmatic `power` call.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidExponentError extends Data.TaggedError("InvalidExponentError")<{
  readonly exponent: string
  readonly reason: string
  readonly formula?: string | undefined
  readonly position?: number | undefined
}> {
  override get message(): string {
    return this.position === undefined
      ? `Invalid exponent ${this.exponent}: ${this.reason}`
      : `Invalid exponent "${this.exponent}" at position ${this.position}: ${this.reason}`
  }

  /** Only set when the exponent came from a formula. */
  get snippet(): string | undefined {
    return this.formula === undefined || this.position === undefined
      ? undefined
      : snippetAt(this.formula, this.position)
  }
}

/**
 * Raised when an alias is registered again with a different definition.
 *
 * @category Errors
 * @since 0.1.0
 */
export class AliasConflictError extends Data.TaggedError("AliasConflictError")<{
  readonly alias: string
  readonly existing: string
  readonly attempted: string
}> {
  override get message(): string {
    return `Alias "${this.alias}" is already defined as ${this.existing}, cannot redefine it as ${this.attempted}`
  }
}

/**
 * Raised when a scale factor is zero, negative or not finite.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidScaleError extends Data.TaggedError("InvalidScaleError")<{
  readonly value: string
  readonly formula?: string | undefined
  readonly position?: number | undefined
}> {
  override get message(): string {
    return `Invalid scale ${this.value}: unit scales must be finite and strictly positive`
  }

  get snippet(): string | undefined {
    return this.formula === undefined || this.position === undefined
      ? undefined
      : snippetAt(this.formula, this.position)
  }
}

/**
 * Failures produced while turning text into a unit.
 *
 * @category Errors
 * @since 0.1.0
 */
export type UnitParseError =
  | LexError
  | UnexpectedTokenError
  | UnitSyntaxError
  | UnknownUnitSymbolError
  | InvalidExponentError
  | InvalidScaleError

/**
 * Union of every error this package raises.
 *
 * @category Errors
 * @since 0.1.0
 */
export type UnitError = UnitParseError | UnknownAliasError | AliasConflictError

/**
 * @category Guards
 * @since 0.1.0
 */
export const isUnitParseError = (error: unknown): error is UnitParseError =>
  error instanceof LexError ||
  error instanceof UnexpectedTokenError ||
  error instanceof UnitSyntaxError ||
  error instanceof UnknownUnitSymbolError ||
  error instanceof InvalidExponentError ||
  error instanceof InvalidScaleError

/**
 * @category Guards
 * @since 0.1.0
 */
export const isUnitError = (error: unknown): error is UnitError =>
  isUnitParseError(error) || error instanceof UnknownAliasError || error instanceof AliasConflictError
