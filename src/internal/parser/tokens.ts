import { createToken, Lexer } from "chevrotain"

/**
 * Token definitions for unit formulas. `**` is declared before `*` so the
 * lexer prefers the longer operator; `^` is accepted as the same operator.
 */

export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED })
export const DoubleStar = createToken({ name: "DoubleStar", pattern: /\*\*/ })
export const Star = createToken({ name: "Star", pattern: /\*/ })
export const Slash = createToken({ name: "Slash", pattern: /\// })
export const Caret = createToken({ name: "Caret", pattern: /\^/ })
export const Plus = createToken({ name: "Plus", pattern: /\+/ })
export const Minus = createToken({ name: "Minus", pattern: /-/ })
export const Equals = createToken({ name: "Equals", pattern: /=/ })
export const LParen = createToken({ name: "LParen", pattern: /\(/ })
export const RParen = createToken({ name: "RParen", pattern: /\)/ })
export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/,
})
export const Identifier = createToken({ name: "Identifier", pattern: /[A-Za-z_µμΩ]+/ })

export const UnitTokens = [
  WhiteSpace,
  DoubleStar,
  Star,
  Slash,
  Caret,
  Plus,
  Minus,
  Equals,
  LParen,
  RParen,
  NumberLiteral,
  Identifier,
]

export const UnitLexer = new Lexer(UnitTokens)
