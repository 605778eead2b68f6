/**
 * SI decimal prefixes.
 *
 * @since 0.1.0
 */

import { Scale } from "./Scale.js"

/**
 * @since 0.1.0
 * @category Models
 */
export interface Prefix {
  readonly symbol: string
  readonly name: string
  /** Power of ten applied by the prefix. */
  readonly exponent: number
}

/**
 * Display table, largest first. `µ` (micro sign) is the spelling used when
 * rendering.
 *
 * @since 0.1.0
 * @category Constants
 */
export const PREFIXES: ReadonlyArray<Prefix> = [
  { symbol: "Y", name: "yotta", exponent: 24 },
  { symbol: "Z", name: "zetta", exponent: 21 },
  { symbol: "E", name: "exa", exponent: 18 },
  { symbol: "P", name: "peta", exponent: 15 },
  { symbol: "T", name: "tera", exponent: 12 },
  { symbol: "G", name: "giga", exponent: 9 },
  { symbol: "M", name: "mega", exponent: 6 },
  { symbol: "k", name: "kilo", exponent: 3 },
  { symbol: "h", name: "hecto", exponent: 2 },
  { symbol: "da", name: "deca", exponent: 1 },
  { symbol: "d", name: "deci", exponent: -1 },
  { symbol: "c", name: "centi", exponent: -2 },
  { symbol: "m", name: "milli", exponent: -3 },
  { symbol: "µ", name: "micro", exponent: -6 },
  { symbol: "n", name: "nano", exponent: -9 },
  { symbol: "p", name: "pico", exponent: -12 },
  { symbol: "f", name: "femto", exponent: -15 },
  { symbol: "a", name: "atto", exponent: -18 },
  { symbol: "z", name: "zepto", exponent: -21 },
  { symbol: "y", name: "yocto", exponent: -24 },
]

// accepted on input only: ASCII "u" and Greek small mu
const ALTERNATE_SPELLINGS: ReadonlyArray<Prefix> = [
  { symbol: "u", name: "micro", exponent: -6 },
  { symbol: "μ", name: "micro", exponent: -6 },
]

const INPUT_PREFIXES = [...PREFIXES, ...ALTERNATE_SPELLINGS].sort(
  (a, b) => b.symbol.length - a.symbol.length,
)

const bySymbol: ReadonlyMap<string, Prefix> = new Map(
  INPUT_PREFIXES.map((prefix) => [prefix.symbol, prefix] as const),
)

/**
 * @since 0.1.0
 */
export const lookupPrefix = (symbol: string): Prefix | undefined => bySymbol.get(symbol)

/**
 * A possible reading of a token as `prefix + rest`.
 *
 * @since 0.1.0
 * @category Models
 */
export interface PrefixSplit {
  readonly prefix: Prefix
  readonly rest: string
}

/**
 * Every way `token` can be split into a known prefix and a non-empty
 * remainder, longest prefix first (`dam` tries `da|m` before `d|am`).
 *
 * @since 0.1.0
 */
export const prefixSplits = (token: string): ReadonlyArray<PrefixSplit> =>
  INPUT_PREFIXES.filter(
    (prefix) => token.length > prefix.symbol.length && token.startsWith(prefix.symbol),
  ).map((prefix) => ({ prefix, rest: token.slice(prefix.symbol.length) }))

/**
 * Outcome of {@link bestPrefix}: the prefix symbol (`""` for none) and the
 * scale left over once the prefix is applied.
 *
 * @since 0.1.0
 * @category Models
 */
export interface PrefixChoice {
  readonly symbol: string
  readonly residual: Scale
}

/**
 * Pick the prefix that reproduces `scale` exactly when applied to a term
 * raised to `power` (`km^2` carries `10^6`). When no prefix makes the residual
 * exactly one, no prefix is used and the whole scale is returned as residual,
 * to be rendered as an explicit coefficient.
 *
 * @since 0.1.0
 */
export const bestPrefix = (scale: Scale, power = 1): PrefixChoice => {
  if (power !== 0 && scale.isExact && scale.exponent % power === 0) {
    const target = scale.exponent / power
    if (target === 0) {
      return { symbol: "", residual: Scale.one }
    }
    const prefix = PREFIXES.find((candidate) => candidate.exponent === target)
    if (prefix) {
      return { symbol: prefix.symbol, residual: Scale.one }
    }
  }
  return { symbol: "", residual: scale }
}
