/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./FundamentalUnit.js"
export * from "./Scale.js"
export * from "./Prefix.js"
export * from "./UnitComposition.js"
export * from "./PrefixedUnit.js"
export * from "./UnitAliasManager.js"
export * from "./Unit.js"
