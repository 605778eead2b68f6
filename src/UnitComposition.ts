/**
 * Dimension vectors: products of integer powers of the fundamental units.
 *
 * Compositions form a group under multiplication. They are stored sparse and
 * normalized (no zero exponents, ordered by `UNIT_ORDER`), so structural
 * equality is plain term-by-term comparison.
 *
 * @since 0.1.0
 */

import { Equal, Hash } from "effect"
import { InvalidExponentError } from "./Errors.js"
import { type FundamentalUnit, SYMBOLS, UNIT_ORDER } from "./FundamentalUnit.js"

/**
 * Exponent per base dimension; missing keys mean zero.
 *
 * @since 0.1.0
 * @category Models
 */
export type Exponents = Partial<Readonly<Record<FundamentalUnit, number>>>

/**
 * @since 0.1.0
 * @category Models
 */
export interface Term {
  readonly unit: FundamentalUnit
  readonly exponent: number
}

const checkExponent = (exponent: number, reason: string): number => {
  if (!Number.isSafeInteger(exponent)) {
    throw new InvalidExponentError({ exponent: String(exponent), reason })
  }
  return exponent
}

const SUPERSCRIPTS: Readonly<Record<string, string>> = {
  "0": "⁰",
  "1": "¹",
  "2": "²",
  "3": "³",
  "4": "⁴",
  "5": "⁵",
  "6": "⁶",
  "7": "⁷",
  "8": "⁸",
  "9": "⁹",
  "-": "⁻",
}

const superscript = (exponent: number): string =>
  Array.from(String(exponent), (digit) => SUPERSCRIPTS[digit] ?? digit).join("")

/**
 * `sym` for exponent 1, `sym^n` otherwise.
 *
 * @since 0.1.0
 */
export const formatTerm = (symbol: string, exponent: number): string =>
  exponent === 1 ? symbol : `${symbol}^${exponent}`

/**
 * Options of {@link renderCanonical}.
 *
 * @since 0.1.0
 */
export interface RenderOptions {
  /** Replaces the symbol of the leading term (used to attach a prefix). */
  readonly leadingSymbol?: string | undefined
  /** Explicit numeric factor written in front of the product. */
  readonly coefficient?: string | undefined
}

/**
 * Canonical layout shared by compositions and prefixed units: positive terms
 * joined by `*`, then one `/sym^k` per negative term. Every output is accepted
 * by the parser and evaluates left to right to the same unit.
 *
 * @since 0.1.0
 */
export const renderCanonical = (terms: ReadonlyArray<Term>, options: RenderOptions = {}): string => {
  const numerator = terms.filter((term) => term.exponent > 0)
  const denominator = terms.filter((term) => term.exponent < 0)
  const leading = numerator[0] ?? denominator[0]
  const symbol = (term: Term): string =>
    term === leading && options.leadingSymbol !== undefined ? options.leadingSymbol : SYMBOLS[term.unit]

  const top = numerator.map((term) => formatTerm(symbol(term), term.exponent)).join("*")
  const bottom = denominator.map((term) => `/${formatTerm(symbol(term), -term.exponent)}`).join("")
  const { coefficient } = options
  const head =
    coefficient === undefined
      ? top.length > 0 ? top : "1"
      : top.length > 0 ? `${coefficient}*${top}` : coefficient
  return `${head}${bottom}`
}

/**
 * @since 0.1.0
 * @category Models
 */
export class UnitComposition implements Equal.Equal {
  /**
   * The empty composition, rendered `1`.
   */
  static readonly dimensionless: UnitComposition = new UnitComposition([])

  private constructor(readonly terms: ReadonlyArray<Term>) {}

  /**
   * Build a composition from an exponent record. Zero exponents and the
   * `DIMENSIONLESS` entry are dropped (`1^n` is `1`).
   */
  static make(exponents: Exponents): UnitComposition {
    const terms: Array<Term> = []
    for (const unit of UNIT_ORDER) {
      const exponent = exponents[unit] ?? 0
      checkExponent(exponent, "unit exponents must be safe integers")
      if (exponent !== 0 && unit !== "DIMENSIONLESS") {
        terms.push({ unit, exponent })
      }
    }
    return new UnitComposition(terms)
  }

  static of(unit: FundamentalUnit, exponent = 1): UnitComposition {
    const exponents: Partial<Record<FundamentalUnit, number>> = {}
    exponents[unit] = exponent
    return UnitComposition.make(exponents)
  }

  get isDimensionless(): boolean {
    return this.terms.length === 0
  }

  /**
   * The term a prefix attaches to when rendering: the first positive term, or
   * the first negative one when there is no numerator.
   */
  get leading(): Term | undefined {
    return this.terms.find((term) => term.exponent > 0) ?? this.terms[0]
  }

  exponent(unit: FundamentalUnit): number {
    return this.terms.find((term) => term.unit === unit)?.exponent ?? 0
  }

  toRecord(): Exponents {
    const exponents: Partial<Record<FundamentalUnit, number>> = {}
    for (const term of this.terms) {
      exponents[term.unit] = term.exponent
    }
    return exponents
  }

  multiply(that: UnitComposition): UnitComposition {
    return this.combine(that, 1)
  }

  divide(that: UnitComposition): UnitComposition {
    return this.combine(that, -1)
  }

  power(n: number): UnitComposition {
    checkExponent(n, "unit powers must be safe integers")
    if (n === 0) {
      return UnitComposition.dimensionless
    }
    return new UnitComposition(
      this.terms.map((term) => ({
        unit: term.unit,
        exponent: checkExponent(term.exponent * n, `${SYMBOLS[term.unit]}^${term.exponent} raised to ${n} is out of range`),
      })),
    )
  }

  equals(that: UnitComposition): boolean {
    return (
      this.terms.length === that.terms.length &&
      this.terms.every((term, index) => {
        const other = that.terms[index]
        return other !== undefined && other.unit === term.unit && other.exponent === term.exponent
      })
    )
  }

  /**
   * Canonical text, e.g. `kg*m/s^2`; `1` when dimensionless.
   */
  render(): string {
    return renderCanonical(this.terms)
  }

  /**
   * Display form with a middle dot and superscript exponents: `kg·m·s⁻²`.
   */
  renderUnicode(): string {
    if (this.isDimensionless) {
      return "1"
    }
    return this.terms
      .map((term) => (term.exponent === 1 ? SYMBOLS[term.unit] : `${SYMBOLS[term.unit]}${superscript(term.exponent)}`))
      .join("·")
  }

  renderLatex(): string {
    if (this.isDimensionless) {
      return "1"
    }
    return this.terms
      .map((term) =>
        term.exponent === 1
          ? `\\text{${SYMBOLS[term.unit]}}`
          : `\\text{${SYMBOLS[term.unit]}}^{${term.exponent}}`,
      )
      .join(" \\cdot ")
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof UnitComposition && this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.cached(this, Hash.string(this.render()))
  }

  toString(): string {
    return this.render()
  }

  toJSON(): Exponents {
    return this.toRecord()
  }

  private combine(that: UnitComposition, sign: 1 | -1): UnitComposition {
    const exponents: Partial<Record<FundamentalUnit, number>> = {}
    for (const unit of UNIT_ORDER) {
      exponents[unit] = this.exponent(unit) + sign * that.exponent(unit)
    }
    return UnitComposition.make(exponents)
  }
}
