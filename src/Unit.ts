/**
 * Public unit value: the formula it was written with, the resolved prefixed
 * unit and, optionally, the alias it is known by.
 *
 * Units are immutable. Arithmetic returns new units whose formula is the
 * canonical rendering of the result and which carry no alias.
 *
 * @since 0.1.0
 */

import { Effect, Equal, Hash } from "effect"
import type { AliasConflictError, UnitParseError } from "./Errors.js"
import { type ParsedFormula, parseFormulaEither } from "./internal/parser/Parser.js"
import { PrefixedUnit } from "./PrefixedUnit.js"
import type { Scale } from "./Scale.js"
import { UnitAliasManager } from "./UnitAliasManager.js"
import type { UnitComposition } from "./UnitComposition.js"

/**
 * @since 0.1.0
 * @category Models
 */
export class Unit implements Equal.Equal {
  private constructor(
    readonly formula: string,
    readonly prefixed: PrefixedUnit,
    readonly alias: string | undefined,
  ) {}

  /**
   * Parse a formula such as `"kg*m/s**2"`, `"km"` or `"N = kg*m/s**2"`
   * against the aliases of the current {@link UnitAliasManager}. An
   * `ALIAS = formula` input registers the alias before the unit is returned.
   *
   * @since 0.1.0
   * @category Constructors
   * @example
   * ```ts
   * const program = Effect.gen(function* () {
   *   yield* Unit.parse("N = kg*m/s**2")
   *   const force = yield* Unit.parse("N")
   *   return force.render() // "N"
   * }).pipe(Effect.provide(UnitAliasManager.layer()))
   * ```
   */
  static parse(text: string): Effect.Effect<Unit, UnitParseError | AliasConflictError, UnitAliasManager> {
    return Effect.gen(function* () {
      const manager = yield* UnitAliasManager
      const table = yield* manager.aliases
      const parsed = yield* parseFormulaEither(text, (name) => table.get(name))
      if (parsed.alias !== undefined) {
        yield* manager.register(parsed.alias, parsed.unit)
      }
      return Unit.fromParsed(parsed)
    })
  }

  /**
   * @since 0.1.0
   * @category Constructors
   */
  static fromParsed(parsed: ParsedFormula): Unit {
    return new Unit(parsed.expression, parsed.unit, parsed.alias ?? parsed.reference)
  }

  /**
   * @since 0.1.0
   * @category Constructors
   */
  static fromPrefixedUnit(prefixed: PrefixedUnit): Unit {
    return new Unit(prefixed.render(), prefixed, undefined)
  }

  /**
   * @since 0.1.0
   * @category Constructors
   */
  static fromComposition(composition: UnitComposition): Unit {
    return Unit.fromPrefixedUnit(new PrefixedUnit(composition))
  }

  get composition(): UnitComposition {
    return this.prefixed.composition
  }

  get scale(): Scale {
    return this.prefixed.scale
  }

  get isDimensionless(): boolean {
    return this.prefixed.composition.isDimensionless
  }

  multiply(that: Unit): Unit {
    return Unit.fromPrefixedUnit(this.prefixed.multiply(that.prefixed))
  }

  divide(that: Unit): Unit {
    return Unit.fromPrefixedUnit(this.prefixed.divide(that.prefixed))
  }

  /**
   * Throws `InvalidExponentError` for a non-integer or out-of-range `n`.
   */
  power(n: number): Unit {
    return Unit.fromPrefixedUnit(this.prefixed.power(n))
  }

  /**
   * Same composition and same scale; formula and alias are ignored.
   */
  equals(that: Unit): boolean {
    return this.prefixed.equals(that.prefixed)
  }

  /**
   * Same composition, whatever the prefixes (`m` and `km`).
   */
  dimensionallyEquals(that: Unit): boolean {
    return this.prefixed.dimensionallyEquals(that.prefixed)
  }

  withAlias(alias: string): Unit {
    return new Unit(this.formula, this.prefixed, alias)
  }

  /**
   * The alias when there is one, otherwise the canonical prefixed form.
   */
  render(): string {
    return this.alias ?? this.prefixed.render()
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof Unit && this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.hash(this.prefixed)
  }

  toString(): string {
    return this.render()
  }

  toJSON(): { readonly formula: string; readonly alias: string | null; readonly render: string } {
    return { formula: this.formula, alias: this.alias ?? null, render: this.render() }
  }
}
