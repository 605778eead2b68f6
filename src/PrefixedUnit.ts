/**
 * A composition together with its scale: `km` is `{ LENGTH: 1 }` at `10^3`.
 *
 * Two prefixed units are equal only when both the composition and the scale
 * match; use {@link PrefixedUnit.dimensionallyEquals} to compare dimensions
 * alone.
 *
 * @since 0.1.0
 */

import { Equal, Hash } from "effect"
import { SYMBOLS } from "./FundamentalUnit.js"
import { bestPrefix, type PrefixChoice } from "./Prefix.js"
import { Scale } from "./Scale.js"
import { type Exponents, renderCanonical, UnitComposition } from "./UnitComposition.js"

/**
 * The gram is `10^-3` of the base mass unit; mass prefixes attach to it.
 */
const GRAM_EXPONENT = -3

/**
 * @since 0.1.0
 * @category Models
 */
export class PrefixedUnit implements Equal.Equal {
  static readonly one: PrefixedUnit = new PrefixedUnit(UnitComposition.dimensionless, Scale.one)

  constructor(
    readonly composition: UnitComposition,
    readonly scale: Scale = Scale.one,
  ) {}

  multiply(that: PrefixedUnit): PrefixedUnit {
    return new PrefixedUnit(this.composition.multiply(that.composition), this.scale.multiply(that.scale))
  }

  divide(that: PrefixedUnit): PrefixedUnit {
    return new PrefixedUnit(this.composition.divide(that.composition), this.scale.divide(that.scale))
  }

  power(n: number): PrefixedUnit {
    return new PrefixedUnit(this.composition.power(n), this.scale.pow(n))
  }

  equals(that: PrefixedUnit): boolean {
    return this.composition.equals(that.composition) && this.scale.equals(that.scale)
  }

  dimensionallyEquals(that: PrefixedUnit): boolean {
    return this.composition.equals(that.composition)
  }

  /**
   * Prefix for the leading rendered term, chosen so that the residual scale is
   * exactly one. For mass the prefix applies to the gram (`k` for `kg`, `m`
   * for `mg`). Without an exact match the symbol is `""` and the residual is
   * the whole scale.
   */
  bestPrefix(): PrefixChoice {
    const leading = this.composition.leading
    if (leading === undefined) {
      return { symbol: "", residual: this.scale }
    }
    if (leading.unit === "MASS") {
      const inGrams = this.scale.divide(Scale.powerOfTen(GRAM_EXPONENT * leading.exponent))
      const choice = bestPrefix(inGrams, leading.exponent)
      return choice.residual.isOne ? choice : { symbol: "", residual: this.scale }
    }
    return bestPrefix(this.scale, leading.exponent)
  }

  /**
   * Canonical text with the best prefix applied (`km`, `mg*m/s^2`, `1/ms`) or,
   * failing that, an explicit coefficient (`60*s`, `1000*m^2`).
   */
  render(): string {
    const leading = this.composition.leading
    if (leading === undefined) {
      return this.scale.isOne ? "1" : this.scale.toString()
    }
    const choice = this.bestPrefix()
    if (!choice.residual.isOne) {
      return renderCanonical(this.composition.terms, { coefficient: choice.residual.toString() })
    }
    const base = leading.unit === "MASS" ? "g" : SYMBOLS[leading.unit]
    return renderCanonical(this.composition.terms, { leadingSymbol: `${choice.symbol}${base}` })
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof PrefixedUnit && this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.combine(Hash.hash(this.scale))(Hash.hash(this.composition))
  }

  toString(): string {
    return this.render()
  }

  /**
   * The scale is written as decimal text so that values outside the double
   * range survive serialization.
   */
  toJSON(): { readonly composition: Exponents; readonly scale: string } {
    return { composition: this.composition.toRecord(), scale: this.scale.toString() }
  }
}
