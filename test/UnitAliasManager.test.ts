import { describe, it, expect } from "@effect/vitest"
import { ConfigProvider, Effect, Either, Option } from "effect"
import { AliasConflictError, UnitSyntaxError, UnknownAliasError } from "../src/Errors.js"
import { DEFAULT_ALIASES } from "../src/internal/defaults.js"
import { PrefixedUnit } from "../src/PrefixedUnit.js"
import { Scale } from "../src/Scale.js"
import { Unit } from "../src/Unit.js"
import {
  aliasOf,
  defaultTable,
  emptyTable,
  lookupAlias,
  registerAlias,
  tableFromDefinitions,
  UnitAliasManager,
  unregisterAlias,
} from "../src/UnitAliasManager.js"
import { UnitComposition } from "../src/UnitComposition.js"

const newton = new PrefixedUnit(UnitComposition.make({ MASS: 1, LENGTH: 1, TIME: -2 }))
const momentum = new PrefixedUnit(UnitComposition.make({ MASS: 1, LENGTH: 1, TIME: -1 }))
const metre = new PrefixedUnit(UnitComposition.of("LENGTH"))

describe("AliasTable", () => {
  it("registers a new alias without touching the original table", () => {
    const result = registerAlias(emptyTable, "N", newton)
    expect(Either.isRight(result)).toBe(true)
    if (Either.isRight(result)) {
      expect(Option.getOrUndefined(lookupAlias(result.right, "N"))?.equals(newton)).toBe(true)
    }
    expect(emptyTable.size).toBe(0)
  })

  it("treats an identical registration as a no-op", () => {
    const table = tableFromDefinitions(["N = kg*m/s**2"])
    const again = registerAlias(table, "N", newton)
    expect(Either.getOrUndefined(again)).toBe(table)
  })

  it("rejects a different definition for a registered alias", () => {
    const table = tableFromDefinitions(["N = kg*m/s**2"])
    const result = registerAlias(table, "N", momentum)
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(AliasConflictError)
      expect(result.left.existing).toBe("kg*m/s^2")
      expect(result.left.attempted).toBe("kg*m/s")
    }
  })

  it("rejects redefining a base symbol", () => {
    const result = registerAlias(emptyTable, "s", metre)
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.alias).toBe("s")
      expect(result.left.existing).toBe("s")
      expect(result.left.attempted).toBe("m")
    }
    const gram = new PrefixedUnit(UnitComposition.of("MASS"), Scale.powerOfTen(-3))
    expect(Either.getOrUndefined(registerAlias(emptyTable, "g", gram))).toBe(emptyTable)
  })

  it("removes aliases and finds them by definition", () => {
    const table = tableFromDefinitions(["N = kg*m/s**2", "newton = N"])
    expect(Option.getOrUndefined(aliasOf(table, newton))).toBe("N")
    expect(Option.isNone(aliasOf(table, metre))).toBe(true)

    const smaller = unregisterAlias(table, "N")
    expect([...smaller.keys()]).toStrictEqual(["newton"])
    expect(unregisterAlias(smaller, "N")).toBe(smaller)
  })

  it("requires a name in every table definition", () => {
    expect(() => tableFromDefinitions(["kg*m"])).toThrow(UnitSyntaxError)
    expect(() => tableFromDefinitions(["kg*m"])).toThrow(
      'Expected an alias definition "NAME = formula" at position 0',
    )
    const result = Either.try({ try: () => tableFromDefinitions(["kg*m"]), catch: (error) => error })
    expect(Either.isLeft(result)).toBe(true)
    const error = Either.isLeft(result) ? result.left : undefined
    expect(error).toBeInstanceOf(UnitSyntaxError)
    if (error instanceof UnitSyntaxError) {
      expect(error.code).toBe("MissingAlias")
      expect(error.formula).toBe("kg*m")
    }
  })

  it("builds the default table in order", () => {
    const table = defaultTable()
    expect(table.size).toBe(DEFAULT_ALIASES.length)
    expect([...table.keys()].slice(0, 3)).toStrictEqual(["N", "J", "W"])
    expect(table.get("h")?.scale.toNumber()).toBe(3600)
    expect(table.get("L")?.render()).toBe("dm^3")
    expect(table.get("Hz")?.render()).toBe("1/s")
  })
})

describe("UnitAliasManager", () => {
  it.effect("registers and resolves aliases", () =>
    Effect.gen(function* () {
      const manager = yield* UnitAliasManager
      yield* manager.register("N", newton)

      const resolved = yield* manager.resolve("N")
      expect(resolved.equals(newton)).toBe(true)
      expect(Option.getOrUndefined(yield* manager.aliasOf(newton))).toBe("N")
    }).pipe(Effect.provide(UnitAliasManager.layer())),
  )

  it.effect("fails to resolve unknown aliases", () =>
    Effect.gen(function* () {
      const manager = yield* UnitAliasManager
      const error = yield* manager.resolve("furlong").pipe(Effect.flip)
      expect(error).toBeInstanceOf(UnknownAliasError)
      expect(error.message).toBe('Unknown unit alias "furlong"')
    }).pipe(Effect.provide(UnitAliasManager.layer())),
  )

  it.effect("fails on conflicting registrations and keeps the first definition", () =>
    Effect.gen(function* () {
      const manager = yield* UnitAliasManager
      yield* manager.register("N", newton)
      const error = yield* manager.register("N", momentum).pipe(Effect.flip)
      expect(error._tag).toBe("AliasConflictError")

      const resolved = yield* manager.resolve("N")
      expect(resolved.equals(newton)).toBe(true)
    }).pipe(Effect.provide(UnitAliasManager.layer())),
  )

  it.effect("unregisters aliases", () =>
    Effect.gen(function* () {
      const manager = yield* UnitAliasManager
      yield* manager.register("N", newton)
      yield* manager.unregister("N")
      yield* manager.unregister("N")

      const table = yield* manager.aliases
      expect(table.size).toBe(0)
    }).pipe(Effect.provide(UnitAliasManager.layer())),
  )

  it.effect("annotates units whose definition has an alias", () =>
    Effect.gen(function* () {
      const manager = yield* UnitAliasManager
      yield* manager.register("N", newton)

      const computed = Unit.fromPrefixedUnit(newton)
      expect(computed.alias).toBeUndefined()
      const annotated = yield* manager.annotate(computed)
      expect(annotated.render()).toBe("N")

      const bare = yield* manager.annotate(Unit.fromPrefixedUnit(metre))
      expect(bare.render()).toBe("m")
    }).pipe(Effect.provide(UnitAliasManager.layer())),
  )

  it.effect("starts from the default aliases when asked", () =>
    Effect.gen(function* () {
      const manager = yield* UnitAliasManager
      const pascal = yield* manager.resolve("Pa")
      expect(pascal.render()).toBe("kg/m/s^2")
    }).pipe(Effect.provide(UnitAliasManager.layer({ defaults: true }))),
  )

  it.effect("gives every layer its own namespace", () =>
    Effect.gen(function* () {
      const manager = yield* UnitAliasManager
      const table = yield* manager.aliases
      expect(table.size).toBe(0)
    }).pipe(Effect.provide(UnitAliasManager.layer())),
  )

  it.effect("reads the defaults flag from configuration", () =>
    Effect.gen(function* () {
      const manager = yield* UnitAliasManager
      const joule = yield* manager.resolve("J")
      expect(joule.render()).toBe("kg*m^2/s^2")
    }).pipe(
      Effect.provide(UnitAliasManager.layerConfig),
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map([["UNITS_DEFAULT_ALIASES", "true"]]))),
    ),
  )

  it.effect("starts empty when configuration leaves the flag unset", () =>
    Effect.gen(function* () {
      const manager = yield* UnitAliasManager
      const table = yield* manager.aliases
      expect(table.size).toBe(0)
    }).pipe(
      Effect.provide(UnitAliasManager.layerConfig),
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map())),
    ),
  )
})
