/**
 * Alias registry mapping short names (`N`, `Pa`, `min`) to fully resolved
 * prefixed units.
 *
 * The registry itself is an immutable {@link AliasTable}; the
 * {@link UnitAliasManager} service keeps the current table in a `Ref` so that
 * every registration is atomic, and so that each layer (and each test) gets
 * its own independent namespace.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Either, Layer, Option, Ref } from "effect"
import { AliasConflictError, UnitSyntaxError, UnknownAliasError } from "./Errors.js"
import { DEFAULT_ALIASES } from "./internal/defaults.js"
import { lookupBaseSymbol, parseFormula } from "./internal/parser/Parser.js"
import type { PrefixedUnit } from "./PrefixedUnit.js"
import type { Unit } from "./Unit.js"

/**
 * Alias name to definition, in registration order.
 *
 * @since 0.1.0
 * @category Models
 */
export type AliasTable = ReadonlyMap<string, PrefixedUnit>

/**
 * @since 0.1.0
 * @category Constructors
 */
export const emptyTable: AliasTable = new Map()

/**
 * Add `name` to the table. Registering an equal definition again returns the
 * same table; a different definition, or a name that is already a base symbol
 * with another meaning, is an {@link AliasConflictError}.
 *
 * @since 0.1.0
 */
export const registerAlias = (
  table: AliasTable,
  name: string,
  unit: PrefixedUnit,
): Either.Either<AliasTable, AliasConflictError> => {
  const existing = lookupBaseSymbol(name) ?? table.get(name)
  if (existing === undefined) {
    return Either.right(new Map(table).set(name, unit))
  }
  if (existing.equals(unit)) {
    return Either.right(table)
  }
  return Either.left(
    new AliasConflictError({ alias: name, existing: existing.render(), attempted: unit.render() }),
  )
}

/**
 * @since 0.1.0
 */
export const lookupAlias = (table: AliasTable, name: string): Option.Option<PrefixedUnit> =>
  Option.fromNullable(table.get(name))

/**
 * @since 0.1.0
 */
export const unregisterAlias = (table: AliasTable, name: string): AliasTable => {
  if (!table.has(name)) {
    return table
  }
  const next = new Map(table)
  next.delete(name)
  return next
}

/**
 * First alias (in registration order) whose definition equals `unit`.
 *
 * @since 0.1.0
 */
export const aliasOf = (table: AliasTable, unit: PrefixedUnit): Option.Option<string> => {
  for (const [name, definition] of table) {
    if (definition.equals(unit)) {
      return Option.some(name)
    }
  }
  return Option.none()
}

/**
 * Build a table from `ALIAS = formula` definitions, each one able to refer to
 * the aliases defined before it. Throws the first parse or conflict error, or
 * a `MissingAlias` syntax error for a definition without a name.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const tableFromDefinitions = (
  definitions: ReadonlyArray<string>,
  initial: AliasTable = emptyTable,
): AliasTable =>
  definitions.reduce((table, definition) => {
    const parsed = parseFormula(definition, (name) => table.get(name))
    if (parsed.alias === undefined) {
      throw new UnitSyntaxError({
        formula: definition,
        position: 0,
        code: "MissingAlias",
        problem: 'Expected an alias definition "NAME = formula"',
      })
    }
    const result = registerAlias(table, parsed.alias, parsed.unit)
    if (Either.isLeft(result)) {
      throw result.left
    }
    return result.right
  }, initial)

/**
 * Derived SI units (`N`, `J`, `Pa`, …) and customary units (`min`, `h`, `L`,
 * `bar`, …).
 *
 * @since 0.1.0
 * @category Constructors
 */
export const defaultTable = (): AliasTable => tableFromDefinitions(DEFAULT_ALIASES)

/**
 * @since 0.1.0
 * @category Models
 */
export interface UnitAliasManagerService {
  readonly register: (name: string, unit: PrefixedUnit) => Effect.Effect<void, AliasConflictError>
  readonly resolve: (name: string) => Effect.Effect<PrefixedUnit, UnknownAliasError>
  readonly unregister: (name: string) => Effect.Effect<void>
  /** Snapshot of the current table. */
  readonly aliases: Effect.Effect<AliasTable>
  readonly aliasOf: (unit: PrefixedUnit) => Effect.Effect<Option.Option<string>>
  /** Attach the registered alias of an equal definition, if there is one. */
  readonly annotate: (unit: Unit) => Effect.Effect<Unit>
}

/**
 * @since 0.1.0
 * @category Constructors
 */
export const make = (initial: AliasTable = emptyTable): Effect.Effect<UnitAliasManagerService> =>
  Effect.gen(function* () {
    const tableRef = yield* Ref.make(initial)
    const aliases = Ref.get(tableRef)

    const register = (name: string, unit: PrefixedUnit): Effect.Effect<void, AliasConflictError> =>
      Ref.modify(tableRef, (table): readonly [Either.Either<boolean, AliasConflictError>, AliasTable] => {
        const result = registerAlias(table, name, unit)
        return Either.isLeft(result)
          ? [Either.left(result.left), table]
          : [Either.right(result.right !== table), result.right]
      }).pipe(
        Effect.flatMap((outcome) =>
          Either.match(outcome, {
            onLeft: (error) => Effect.fail(error),
            onRight: (added) =>
              added
                ? Effect.logDebug("Registered unit alias").pipe(
                    Effect.annotateLogs({ alias: name, definition: unit.render() }),
                  )
                : Effect.void,
          }),
        ),
      )

    const resolve = (name: string): Effect.Effect<PrefixedUnit, UnknownAliasError> =>
      Effect.flatMap(aliases, (table) =>
        Option.match(lookupAlias(table, name), {
          onNone: () => Effect.fail(new UnknownAliasError({ alias: name })),
          onSome: Effect.succeed,
        }),
      )

    const unregister = (name: string): Effect.Effect<void> =>
      Ref.modify(tableRef, (table): readonly [boolean, AliasTable] => {
        const next = unregisterAlias(table, name)
        return [next !== table, next]
      }).pipe(
        Effect.flatMap((removed) =>
          removed
            ? Effect.logDebug("Removed unit alias").pipe(Effect.annotateLogs({ alias: name }))
            : Effect.void,
        ),
      )

    const service: UnitAliasManagerService = {
      register,
      resolve,
      unregister,
      aliases,
      aliasOf: (unit) => Effect.map(aliases, (table) => aliasOf(table, unit)),
      annotate: (unit) =>
        unit.alias !== undefined
          ? Effect.succeed(unit)
          : Effect.map(aliases, (table) =>
              Option.match(aliasOf(table, unit.prefixed), {
                onNone: () => unit,
                onSome: (name) => unit.withAlias(name),
              }),
            ),
    }

    return service
  })

/**
 * @since 0.1.0
 * @category Tags
 */
export class UnitAliasManager extends Context.Tag("unit-algebra/UnitAliasManager")<
  UnitAliasManager,
  UnitAliasManagerService
>() {
  /**
   * Fresh registry, empty unless `defaults` seeds it with {@link defaultTable}.
   */
  static layer(options: { readonly defaults?: boolean } = {}) {
    return Layer.effect(
      this,
      Effect.suspend(() => make(options.defaults === true ? defaultTable() : emptyTable)),
    )
  }

  /**
   * Registry configured from the environment: `UNITS_DEFAULT_ALIASES=true`
   * seeds the built-in aliases.
   */
  static readonly layerConfig = Layer.effect(
    this,
    Effect.gen(function* () {
      const defaults = yield* Config.boolean("UNITS_DEFAULT_ALIASES").pipe(Config.withDefault(false))
      return yield* make(defaults ? defaultTable() : emptyTable)
    }),
  )
}
