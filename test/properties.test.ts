import { describe, it } from "@effect/vitest"
import * as FastCheck from "effect/FastCheck"
import { parseFormula } from "../src/internal/parser/Parser.js"
import { PrefixedUnit } from "../src/PrefixedUnit.js"
import { Scale } from "../src/Scale.js"
import { UnitComposition } from "../src/UnitComposition.js"

const exponent = FastCheck.integer({ min: -3, max: 3 })

const compositionArbitrary = FastCheck.record({
  MASS: exponent,
  ANGLE: exponent,
  LENGTH: exponent,
  TIME: exponent,
  LUMINOUS_INTENSITY: exponent,
  TEMPERATURE: exponent,
  CURRENT: exponent,
  AMOUNT_OF_SUBSTANCE: exponent,
}).map((exponents) => UnitComposition.make(exponents))

const exactArbitrary = FastCheck.tuple(compositionArbitrary, FastCheck.integer({ min: -9, max: 9 })).map(
  ([composition, power]) => new PrefixedUnit(composition, Scale.powerOfTen(power)),
)

const scaledArbitrary = FastCheck.tuple(
  compositionArbitrary,
  FastCheck.double({ min: 1, max: 10, noNaN: true }),
  FastCheck.integer({ min: -400, max: 400 }),
).map(
  ([composition, mantissa, power]) =>
    new PrefixedUnit(composition, Scale.fromNumber(mantissa).multiply(Scale.powerOfTen(power))),
)

const runs = { numRuns: 200 }

describe("composition algebra", () => {
  it("dividing undoes multiplying", () => {
    FastCheck.assert(
      FastCheck.property(compositionArbitrary, compositionArbitrary, (a, b) => a.multiply(b).divide(b).equals(a)),
      runs,
    )
  })

  it("multiplication commutes", () => {
    FastCheck.assert(
      FastCheck.property(compositionArbitrary, compositionArbitrary, (a, b) => a.multiply(b).equals(b.multiply(a))),
      runs,
    )
  })

  it("multiplication associates", () => {
    FastCheck.assert(
      FastCheck.property(compositionArbitrary, compositionArbitrary, compositionArbitrary, (a, b, c) =>
        a.multiply(b).multiply(c).equals(a.multiply(b.multiply(c))),
      ),
      runs,
    )
  })

  it("division commutes only for equal operands", () => {
    FastCheck.assert(
      FastCheck.property(
        compositionArbitrary,
        compositionArbitrary,
        (a, b) => a.divide(b).equals(b.divide(a)) === a.equals(b),
      ),
      runs,
    )
  })

  it("a unit divided by itself is dimensionless", () => {
    FastCheck.assert(
      FastCheck.property(compositionArbitrary, (a) => a.divide(a).isDimensionless),
      runs,
    )
  })

  it("nested powers multiply", () => {
    FastCheck.assert(
      FastCheck.property(
        compositionArbitrary,
        FastCheck.integer({ min: -3, max: 3 }),
        FastCheck.integer({ min: -3, max: 3 }),
        (a, n, m) => a.power(n).power(m).equals(a.power(n * m)),
      ),
      runs,
    )
  })
})

describe("canonical rendering", () => {
  it("parses back to an equal composition", () => {
    FastCheck.assert(
      FastCheck.property(compositionArbitrary, (a) =>
        parseFormula(a.render(), () => undefined).unit.equals(new PrefixedUnit(a)),
      ),
      runs,
    )
  })

  it("parses prefixed units back to an equal unit", () => {
    FastCheck.assert(
      FastCheck.property(exactArbitrary, (unit) => parseFormula(unit.render(), () => undefined).unit.equals(unit)),
      runs,
    )
  })

  it("parses units with any coefficient and exponent back to an equal unit", () => {
    FastCheck.assert(
      FastCheck.property(scaledArbitrary, (unit) => parseFormula(unit.render(), () => undefined).unit.equals(unit)),
      runs,
    )
  })

  it("keeps repeated products strictly positive", () => {
    FastCheck.assert(
      FastCheck.property(scaledArbitrary, FastCheck.integer({ min: 1, max: 60 }), (unit, count) => {
        let product = unit
        for (let i = 1; i < count; i++) {
          product = product.multiply(unit)
        }
        return product.scale.coefficient >= 1 && product.scale.coefficient < 10
      }),
      runs,
    )
  })
})
