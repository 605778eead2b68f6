import { Console, Effect } from "effect"
import { Unit } from "../src/Unit.js"
import { UnitAliasManager } from "../src/UnitAliasManager.js"

const formulas = [
  "kg*m/s**2",
  "N*m",
  "kJ/h",
  "km/h",
  "mg/L",
  "1/ms",
  "mol/(m**3*s)",
]

const describeFormula = (formula: string) =>
  Unit.parse(formula).pipe(
    Effect.flatMap((unit) =>
      Effect.gen(function* () {
        const manager = yield* UnitAliasManager
        const named = yield* manager.annotate(unit)
        return `${formula.padEnd(16)} ${named.render().padEnd(24)} ${unit.composition.renderUnicode()}`
      }),
    ),
    Effect.catchTag("UnknownUnitSymbolError", (error) =>
      Effect.succeed(`${formula.padEnd(16)} ${error.message}\n${error.snippet}`),
    ),
  )

const program = Effect.gen(function* () {
  yield* Unit.parse("rpm = 1/min")
  for (const formula of [...formulas, "rpm", "m*furlong"]) {
    yield* Console.log(yield* describeFormula(formula))
  }
}).pipe(Effect.provide(UnitAliasManager.layer({ defaults: true })))

Effect.runPromise(program).catch((error) => {
  console.error("Failed to render the unit report", error)
  process.exitCode = 1
})
