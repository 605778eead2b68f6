/**
 * Fundamental (base) dimensions of the SI system plus the dimensionless unit.
 *
 * Every derived unit is expressed as a product of integer powers of these
 * dimensions. The set is closed; symbols and display order are fixed data.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Schema for the closed set of base dimensions.
 *
 * @since 0.1.0
 * @category Schemas
 */
export const FundamentalUnit = Schema.Literal(
  "MASS",
  "ANGLE",
  "LENGTH",
  "TIME",
  "LUMINOUS_INTENSITY",
  "TEMPERATURE",
  "CURRENT",
  "AMOUNT_OF_SUBSTANCE",
  "DIMENSIONLESS",
)

/**
 * @since 0.1.0
 * @category Models
 */
export type FundamentalUnit = typeof FundamentalUnit.Type

/**
 * Canonical symbol of each base dimension.
 *
 * @since 0.1.0
 * @category Constants
 */
export const SYMBOLS: Readonly<Record<FundamentalUnit, string>> = Object.freeze({
  MASS: "kg",
  ANGLE: "rad",
  LENGTH: "m",
  TIME: "s",
  LUMINOUS_INTENSITY: "cd",
  TEMPERATURE: "K",
  CURRENT: "A",
  AMOUNT_OF_SUBSTANCE: "mol",
  DIMENSIONLESS: "1",
})

/**
 * Display order used by every canonical rendering.
 *
 * @since 0.1.0
 * @category Constants
 */
export const UNIT_ORDER: ReadonlyArray<FundamentalUnit> = Object.freeze([
  "MASS",
  "ANGLE",
  "LENGTH",
  "TIME",
  "LUMINOUS_INTENSITY",
  "TEMPERATURE",
  "CURRENT",
  "AMOUNT_OF_SUBSTANCE",
  "DIMENSIONLESS",
] as const)

const bySymbol: ReadonlyMap<string, FundamentalUnit> = new Map(
  UNIT_ORDER.map((unit) => [SYMBOLS[unit], unit] as const),
)

/**
 * @since 0.1.0
 * @category Guards
 */
export const isFundamentalUnit = Schema.is(FundamentalUnit)

/**
 * @since 0.1.0
 */
export const symbolOf = (unit: FundamentalUnit): string => SYMBOLS[unit]

/**
 * Look up the base dimension written with `symbol` (`"kg"`, `"mol"`, `"1"`).
 * Symbols are case-sensitive: `"K"` is kelvin, `"k"` is not a unit.
 *
 * @since 0.1.0
 */
export const fromSymbol = (symbol: string): FundamentalUnit | undefined => bySymbol.get(symbol)

/**
 * Position of `unit` in {@link UNIT_ORDER}.
 *
 * @since 0.1.0
 */
export const orderOf = (unit: FundamentalUnit): number => UNIT_ORDER.indexOf(unit)
