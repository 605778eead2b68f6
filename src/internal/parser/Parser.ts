import type { IToken, TokenType } from "chevrotain"
import { Either } from "effect"
import {
  InvalidExponentError,
  InvalidScaleError,
  isUnitParseError,
  LexError,
  UnexpectedTokenError,
  UnitSyntaxError,
  UnknownUnitSymbolError,
  type UnitParseError,
} from "../../Errors.js"
import { SYMBOLS, UNIT_ORDER } from "../../FundamentalUnit.js"
import { prefixSplits } from "../../Prefix.js"
import { PrefixedUnit } from "../../PrefixedUnit.js"
import { Scale } from "../../Scale.js"
import { UnitComposition } from "../../UnitComposition.js"
import {
  Caret,
  DoubleStar,
  Equals,
  Identifier,
  LParen,
  Minus,
  NumberLiteral,
  Plus,
  RParen,
  Slash,
  Star,
  UnitLexer,
} from "./tokens.js"

/**
 * Looks up a registered alias; `undefined` when the name is not registered.
 */
export type AliasLookup = (name: string) => PrefixedUnit | undefined

export interface ParsedFormula {
  /** Name declared with `ALIAS = expr`, if any. */
  readonly alias: string | undefined
  /** The expression text, right of `=` when an alias is declared. */
  readonly expression: string
  readonly unit: PrefixedUnit
  /** Set when the expression is a single, unprefixed alias reference. */
  readonly reference: string | undefined
}

const BASE_SYMBOLS: ReadonlyMap<string, PrefixedUnit> = new Map([
  ...UNIT_ORDER.filter((unit) => unit !== "DIMENSIONLESS").map(
    (unit) => [SYMBOLS[unit], new PrefixedUnit(UnitComposition.of(unit))] as const,
  ),
  ["g", new PrefixedUnit(UnitComposition.of("MASS"), Scale.powerOfTen(-3))] as const,
])

/**
 * Fixed symbols that need no registration: the fundamental units and the gram.
 */
export const lookupBaseSymbol = (symbol: string): PrefixedUnit | undefined => BASE_SYMBOLS.get(symbol)

class Stream {
  readonly #tokens: ReadonlyArray<IToken>
  readonly #formula: string
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>, formula: string) {
    this.#tokens = tokens
    this.#formula = formula
  }

  get formula(): string {
    return this.#formula
  }

  /** Offset of the next token, or the end of the formula. */
  get position(): number {
    return this.peek()?.startOffset ?? this.#formula.length
  }

  get remaining(): number {
    return this.#tokens.length - this.#index
  }

  peek(offset = 0): IToken | undefined {
    return this.#tokens[this.#index + offset]
  }

  match(tokenType: TokenType): IToken | undefined {
    const token = this.peek()
    if (token && token.tokenType === tokenType) {
      this.#index += 1
      return token
    }
    return undefined
  }

  unexpected(token: IToken, expected: string): UnexpectedTokenError {
    return new UnexpectedTokenError({
      formula: this.#formula,
      position: token.startOffset,
      token: token.image,
      expected,
    })
  }

  missingOperand(): UnitSyntaxError {
    return new UnitSyntaxError({
      formula: this.#formula,
      position: this.position,
      code: "MissingOperand",
      problem: "Expected a unit symbol, number or group",
    })
  }
}

const parseExpression = (stream: Stream, aliases: AliasLookup): PrefixedUnit => {
  let current = parseTerm(stream, aliases)
  while (true) {
    if (stream.match(Star)) {
      current = current.multiply(parseTerm(stream, aliases))
      continue
    }
    if (stream.match(Slash)) {
      current = current.divide(parseTerm(stream, aliases))
      continue
    }
    return current
  }
}

const parseTerm = (stream: Stream, aliases: AliasLookup): PrefixedUnit => {
  const base = parseFactor(stream, aliases)
  const operator = stream.match(DoubleStar) ?? stream.match(Caret)
  if (operator === undefined) {
    return base
  }
  const position = stream.position
  const exponent = parseExponent(stream, operator)
  try {
    return base.power(exponent)
  } catch (error) {
    if (error instanceof InvalidExponentError) {
      throw new InvalidExponentError({
        exponent: error.exponent,
        reason: error.reason,
        formula: stream.formula,
        position,
      })
    }
    throw error
  }
}

const parseExponent = (stream: Stream, operator: IToken): number => {
  const negative = stream.match(Minus) !== undefined
  if (!negative) {
    stream.match(Plus)
  }
  const token = stream.peek()
  if (token === undefined || token.tokenType !== NumberLiteral) {
    throw new InvalidExponentError({
      exponent: token?.image ?? "",
      reason: `expected an integer after "${operator.image}"`,
      formula: stream.formula,
      position: stream.position,
    })
  }
  stream.match(NumberLiteral)
  if (!/^\d+$/.test(token.image)) {
    throw new InvalidExponentError({
      exponent: token.image,
      reason: "exponents must be integer literals",
      formula: stream.formula,
      position: token.startOffset,
    })
  }
  const exponent = Number(token.image) * (negative ? -1 : 1)
  if (!Number.isSafeInteger(exponent)) {
    throw new InvalidExponentError({
      exponent: token.image,
      reason: "exponent is out of range",
      formula: stream.formula,
      position: token.startOffset,
    })
  }
  return exponent
}

const parseFactor = (stream: Stream, aliases: AliasLookup): PrefixedUnit => {
  const token = stream.peek()
  if (token === undefined) {
    throw stream.missingOperand()
  }
  if (stream.match(LParen)) {
    const inner = parseExpression(stream, aliases)
    if (stream.match(RParen) === undefined) {
      const next = stream.peek()
      if (next !== undefined) {
        throw stream.unexpected(next, '"*", "/" or ")"')
      }
      throw new UnitSyntaxError({
        formula: stream.formula,
        position: token.startOffset,
        code: "UnterminatedGroup",
        problem: 'Unterminated group opened by "("',
      })
    }
    return inner
  }
  if (stream.match(NumberLiteral)) {
    const scale = Scale.parseDecimal(token.image)
    if (scale === undefined) {
      throw new InvalidScaleError({ value: token.image, formula: stream.formula, position: token.startOffset })
    }
    return new PrefixedUnit(UnitComposition.dimensionless, scale)
  }
  if (stream.match(Identifier)) {
    return resolveSymbol(token, stream.formula, aliases)
  }
  throw stream.unexpected(token, "a unit symbol, number or \"(\"")
}

const resolveSymbol = (token: IToken, formula: string, aliases: AliasLookup): PrefixedUnit => {
  const name = token.image
  const direct = lookupBaseSymbol(name) ?? aliases(name)
  if (direct !== undefined) {
    return direct
  }
  for (const { prefix, rest } of prefixSplits(name)) {
    const base = lookupBaseSymbol(rest) ?? aliases(rest)
    if (base !== undefined) {
      return new PrefixedUnit(base.composition, Scale.powerOfTen(prefix.exponent).multiply(base.scale))
    }
  }
  throw new UnknownUnitSymbolError({ formula, position: token.startOffset, symbol: name })
}

const parseAliasDeclaration = (stream: Stream): string | undefined => {
  const name = stream.peek()
  const equals = stream.peek(1)
  if (name?.tokenType === Identifier && equals?.tokenType === Equals) {
    stream.match(Identifier)
    stream.match(Equals)
    return name.image
  }
  return undefined
}

/**
 * Parse `[ALIAS =] expr` into a prefixed unit. Throws the tagged parse errors
 * from `Errors.ts`; alias registration is left to the caller.
 */
export const parseFormula = (text: string, aliases: AliasLookup): ParsedFormula => {
  const lexing = UnitLexer.tokenize(text)
  const lexError = lexing.errors[0]
  if (lexError !== undefined) {
    throw new LexError({
      formula: text,
      position: lexError.offset,
      character: Array.from(text.slice(lexError.offset))[0] ?? "",
    })
  }
  const stream = new Stream(lexing.tokens, text)
  const alias = parseAliasDeclaration(stream)
  const start = stream.position
  const single = stream.remaining === 1 ? stream.peek() : undefined

  const unit = parseExpression(stream, aliases)
  const trailing = stream.peek()
  if (trailing !== undefined) {
    throw stream.unexpected(trailing, '"*", "/" or the end of the formula')
  }

  const reference =
    single?.tokenType === Identifier &&
    lookupBaseSymbol(single.image) === undefined &&
    aliases(single.image) !== undefined
      ? single.image
      : undefined

  return { alias, expression: text.slice(start).trim(), unit, reference }
}

export const parseFormulaEither = (
  text: string,
  aliases: AliasLookup,
): Either.Either<ParsedFormula, UnitParseError> =>
  Either.try({
    try: () => parseFormula(text, aliases),
    catch: (error) => {
      if (isUnitParseError(error)) {
        return error
      }
      throw error
    },
  })
