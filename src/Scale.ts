/**
 * Multiplicative scale of a unit relative to its coherent SI form.
 *
 * A scale is stored as `coefficient × 10^exponent` with the coefficient
 * normalized into `[1, 10)` and the exponent an integer. Decimal prefixes only
 * ever touch the exponent, so `km / mm` is exactly `10^6` with no floating
 * point drift, and no product or power can underflow to zero or overflow to
 * infinity. Non-decimal factors (`6 × 10^1` for a minute) compare with
 * {@link RELATIVE_TOLERANCE}.
 *
 * @since 0.1.0
 */

import { Equal, Hash } from "effect"
import { InvalidExponentError, InvalidScaleError } from "./Errors.js"

/**
 * Relative tolerance used when a scale is not an exact power of ten, and when
 * deciding whether a coefficient already is one.
 *
 * @since 0.1.0
 * @category Constants
 */
export const RELATIVE_TOLERANCE = 1e-12

// beyond this exponent a scale no longer fits a normal double
const PLAIN_EXPONENT_LIMIT = 300

const DECIMAL = /^(\d+(?:\.\d*)?|\.\d+)(?:[eE]([+-]?\d+))?$/

const tenTo = (exponent: number): number => Number(`1e${exponent}`)

/**
 * @since 0.1.0
 * @category Models
 */
export class Scale implements Equal.Equal {
  /**
   * The identity scale ("no prefix").
   */
  static readonly one: Scale = new Scale(1, 0)

  private constructor(
    readonly coefficient: number,
    readonly exponent: number,
  ) {}

  private static normalize(coefficient: number, exponent: number): Scale {
    if (!Number.isFinite(coefficient) || coefficient <= 0) {
      throw new InvalidScaleError({ value: String(coefficient) })
    }
    const [digits = "1", shift = "0"] = coefficient.toExponential().split("e")
    let mantissa = Number(digits)
    let total = exponent + Number(shift)
    if (Math.abs(mantissa / 10 - 1) <= RELATIVE_TOLERANCE) {
      mantissa = 1
      total += 1
    } else if (Math.abs(mantissa - 1) <= RELATIVE_TOLERANCE) {
      mantissa = 1
    }
    if (!Number.isSafeInteger(total)) {
      throw new InvalidExponentError({ exponent: String(total), reason: "scale exponent is out of range" })
    }
    return new Scale(mantissa, total)
  }

  /**
   * `10^exponent`, exactly.
   */
  static powerOfTen(exponent: number): Scale {
    if (!Number.isSafeInteger(exponent)) {
      throw new InvalidExponentError({
        exponent: String(exponent),
        reason: "powers of ten need a safe integer exponent",
      })
    }
    return new Scale(1, exponent)
  }

  static fromNumber(value: number): Scale {
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidScaleError({ value: String(value) })
    }
    return Scale.normalize(value, 0)
  }

  /**
   * Read a positive decimal literal such as `60`, `0.001` or `2e-350`. The
   * written exponent is kept apart from the digits, so literals outside the
   * double range still give their exact scale. `undefined` for zero or
   * malformed input.
   */
  static parseDecimal(text: string): Scale | undefined {
    const match = DECIMAL.exec(text)
    if (match === null) {
      return undefined
    }
    const digits = Number(match[1])
    const exponent = Number(match[2] ?? "0")
    if (!Number.isFinite(digits) || digits <= 0 || !Number.isSafeInteger(exponent)) {
      return undefined
    }
    return Scale.normalize(digits, exponent)
  }

  /**
   * True when the scale is a power of ten, i.e. expressible by a prefix alone.
   */
  get isExact(): boolean {
    return this.coefficient === 1
  }

  get isOne(): boolean {
    return this.isExact && this.exponent === 0
  }

  multiply(that: Scale): Scale {
    return Scale.normalize(this.coefficient * that.coefficient, this.exponent + that.exponent)
  }

  divide(that: Scale): Scale {
    return Scale.normalize(this.coefficient / that.coefficient, this.exponent - that.exponent)
  }

  pow(n: number): Scale {
    if (!Number.isSafeInteger(n)) {
      throw new InvalidExponentError({ exponent: String(n), reason: "scales can only be raised to integer powers" })
    }
    if (this.isExact) {
      const exponent = this.exponent * n
      if (!Number.isSafeInteger(exponent)) {
        throw new InvalidExponentError({
          exponent: String(n),
          reason: `scale exponent ${this.exponent} * ${n} is out of range`,
        })
      }
      return exponent === 0 ? Scale.one : new Scale(1, exponent)
    }
    // square-and-multiply keeps every intermediate mantissa normalized
    let result = Scale.one
    let base: Scale = this
    let remaining = Math.abs(n)
    while (remaining > 0) {
      if (remaining % 2 === 1) {
        result = result.multiply(base)
      }
      remaining = Math.floor(remaining / 2)
      if (remaining > 0) {
        base = base.multiply(base)
      }
    }
    return n < 0 ? Scale.one.divide(result) : result
  }

  /**
   * Nearest double; `Infinity` or `0` for scales outside the double range.
   */
  toNumber(): number {
    return Number(`${this.coefficient}e${this.exponent}`)
  }

  /**
   * Exact for two powers of ten; relative tolerance otherwise.
   */
  equals(that: Scale): boolean {
    if (this.isExact && that.isExact) {
      return this.exponent === that.exponent
    }
    const gap = this.exponent - that.exponent
    if (Math.abs(gap) > 1) {
      return false
    }
    const ratio = (this.coefficient / that.coefficient) * tenTo(gap)
    return Math.abs(ratio - 1) <= RELATIVE_TOLERANCE
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof Scale && this.equals(that)
  }

  [Hash.symbol](): number {
    // inexact scales compare with a tolerance, so they can only share one bucket
    return this.isExact ? Hash.number(this.exponent) : Hash.string("Scale/inexact")
  }

  /**
   * Decimal text the parser reads back: plain (`60`, `0.001`) while the value
   * fits a normal double, `mantissa e exponent` (`1e480`) beyond that.
   */
  toString(): string {
    return Math.abs(this.exponent) <= PLAIN_EXPONENT_LIMIT
      ? String(this.toNumber())
      : `${this.coefficient}e${this.exponent}`
  }
}
