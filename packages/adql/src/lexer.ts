/**
 * ADQL Lexer
 *
 * Defines all tokens of the query language using Chevrotain.
 * Keywords are case-insensitive and reserved; quote them to use them as names.
 */

import { createToken, Lexer, tokenMatcher } from "chevrotain";
import type { IToken, TokenType } from "chevrotain";
import type { Token, TokenKind } from "./types.ts";

// ============================================================================
// Categories
// ============================================================================

export const Keyword = createToken({ name: "Keyword", pattern: Lexer.NA });
export const Operator = createToken({ name: "Operator", pattern: Lexer.NA });
export const LiteralToken = createToken({ name: "Literal", pattern: Lexer.NA });
export const Punctuation = createToken({ name: "Punctuation", pattern: Lexer.NA });

// ============================================================================
// Whitespace & Comments
// ============================================================================

export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /\s+/,
  group: Lexer.SKIPPED,
});

export const LineComment = createToken({
  name: "LineComment",
  pattern: /--[^\n]*/,
  group: Lexer.SKIPPED,
});

export const BlockComment = createToken({
  name: "BlockComment",
  pattern: /\/\*[\s\S]*?\*\//,
  group: Lexer.SKIPPED,
});

// ============================================================================
// Identifiers (must be defined first for longer_alt references)
// ============================================================================

export const Identifier = createToken({ name: "Identifier", label: "identifier", pattern: Lexer.NA });

export const RegularIdentifier = createToken({
  name: "RegularIdentifier",
  pattern: /[a-zA-Z][a-zA-Z0-9_]*/,
  categories: [Identifier],
});

export const DelimitedIdentifier = createToken({
  name: "DelimitedIdentifier",
  pattern: /"(?:[^"]|"")+"/,
  line_breaks: true,
  categories: [Identifier],
});

// ============================================================================
// Keywords (use longer_alt to avoid conflicts)
// ============================================================================

function keyword(word: string): TokenType {
  return createToken({
    name: word.charAt(0) + word.slice(1).toLowerCase(),
    pattern: new RegExp(word, "i"),
    label: word,
    longer_alt: RegularIdentifier,
    categories: [Keyword],
  });
}

export const Select = keyword("SELECT");
export const Distinct = keyword("DISTINCT");
export const All = keyword("ALL");
export const Top = keyword("TOP");
export const From = keyword("FROM");
export const Where = keyword("WHERE");
export const Group = keyword("GROUP");
export const By = keyword("BY");
export const Having = keyword("HAVING");
export const Order = keyword("ORDER");
export const Asc = keyword("ASC");
export const Desc = keyword("DESC");
export const Offset = keyword("OFFSET");
export const As = keyword("AS");
export const And = keyword("AND");
export const Or = keyword("OR");
export const Not = keyword("NOT");
export const Is = keyword("IS");
export const Null = keyword("NULL");
export const True = keyword("TRUE");
export const False = keyword("FALSE");
export const Between = keyword("BETWEEN");
export const In = keyword("IN");
export const Like = keyword("LIKE");
export const ILike = keyword("ILIKE");
export const Exists = keyword("EXISTS");
export const Join = keyword("JOIN");
export const Inner = keyword("INNER");
export const Left = keyword("LEFT");
export const Right = keyword("RIGHT");
export const Full = keyword("FULL");
export const Outer = keyword("OUTER");
export const Cross = keyword("CROSS");
export const Natural = keyword("NATURAL");
export const On = keyword("ON");
export const Using = keyword("USING");
export const Union = keyword("UNION");
export const Intersect = keyword("INTERSECT");
export const Except = keyword("EXCEPT");

// Geometry constructors
export const GeometryKeyword = createToken({
  name: "GeometryKeyword",
  label: "geometry constructor",
  pattern: Lexer.NA,
});

function geometryKeyword(word: string): TokenType {
  return createToken({
    name: word.charAt(0) + word.slice(1).toLowerCase(),
    pattern: new RegExp(word, "i"),
    label: word,
    longer_alt: RegularIdentifier,
    categories: [Keyword, GeometryKeyword],
  });
}

export const Point = geometryKeyword("POINT");
export const Circle = geometryKeyword("CIRCLE");
export const Box = geometryKeyword("BOX");
export const Polygon = geometryKeyword("POLYGON");
export const Region = geometryKeyword("REGION");

// ============================================================================
// Literals
// ============================================================================

export const StringLiteral = createToken({
  name: "StringLiteral",
  label: "string",
  pattern: /'(?:[^']|'')*'/,
  line_breaks: true,
  categories: [LiteralToken],
});

export const UnsignedNumber = createToken({
  name: "UnsignedNumber",
  label: "number",
  pattern: /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/,
  categories: [LiteralToken],
});

// ============================================================================
// Operators
// ============================================================================

export const ComparisonOperator = createToken({
  name: "ComparisonOperator",
  label: "comparison operator",
  pattern: Lexer.NA,
});
export const AdditiveOperator = createToken({
  name: "AdditiveOperator",
  label: "'+' or '-'",
  pattern: Lexer.NA,
});
export const MultiplicativeOperator = createToken({
  name: "MultiplicativeOperator",
  label: "'*' or '/'",
  pattern: Lexer.NA,
});

export const NotEquals = createToken({
  name: "NotEquals",
  label: "'<>'",
  pattern: /<>|!=/,
  categories: [Operator, ComparisonOperator],
});

export const LessThanEquals = createToken({
  name: "LessThanEquals",
  label: "'<='",
  pattern: /<=/,
  categories: [Operator, ComparisonOperator],
});

export const GreaterThanEquals = createToken({
  name: "GreaterThanEquals",
  label: "'>='",
  pattern: />=/,
  categories: [Operator, ComparisonOperator],
});

export const Equals = createToken({
  name: "Equals",
  label: "'='",
  pattern: /=/,
  categories: [Operator, ComparisonOperator],
});

export const LessThan = createToken({
  name: "LessThan",
  label: "'<'",
  pattern: /</,
  categories: [Operator, ComparisonOperator],
});

export const GreaterThan = createToken({
  name: "GreaterThan",
  label: "'>'",
  pattern: />/,
  categories: [Operator, ComparisonOperator],
});

export const Concat = createToken({
  name: "Concat",
  label: "'||'",
  pattern: /\|\|/,
  categories: [Operator],
});

export const Plus = createToken({
  name: "Plus",
  label: "'+'",
  pattern: /\+/,
  categories: [Operator, AdditiveOperator],
});

export const Minus = createToken({
  name: "Minus",
  label: "'-'",
  pattern: /-/,
  categories: [Operator, AdditiveOperator],
});

export const Star = createToken({
  name: "Star",
  label: "'*'",
  pattern: /\*/,
  categories: [Operator, MultiplicativeOperator],
});

export const Slash = createToken({
  name: "Slash",
  label: "'/'",
  pattern: /\//,
  categories: [Operator, MultiplicativeOperator],
});

// ============================================================================
// Punctuation
// ============================================================================

export const LParen = createToken({ name: "LParen", label: "'('", pattern: /\(/, categories: [Punctuation] });
export const RParen = createToken({ name: "RParen", label: "')'", pattern: /\)/, categories: [Punctuation] });
export const Comma = createToken({ name: "Comma", label: "','", pattern: /,/, categories: [Punctuation] });
export const Dot = createToken({ name: "Dot", label: "'.'", pattern: /\./, categories: [Punctuation] });

// ============================================================================
// Token Order (more specific patterns first)
// ============================================================================

export const allTokens = [
  // Whitespace & comments
  WhiteSpace,
  LineComment,
  BlockComment,

  // Categories
  Keyword,
  GeometryKeyword,
  Identifier,
  Operator,
  ComparisonOperator,
  AdditiveOperator,
  MultiplicativeOperator,
  LiteralToken,
  Punctuation,

  // Keywords (a word must precede any keyword that is its prefix)
  Select,
  Distinct,
  All,
  Top,
  From,
  Where,
  Group,
  By,
  Having,
  Order,
  Asc,
  Desc,
  Offset,
  As,
  And,
  Or,
  Not,
  Is,
  Null,
  True,
  False,
  Between,
  Intersect,
  Inner,
  ILike,
  In,
  Like,
  Exists,
  Except,
  Join,
  Left,
  Right,
  Full,
  Outer,
  Cross,
  Natural,
  On,
  Using,
  Union,
  Point,
  Circle,
  Box,
  Polygon,
  Region,

  // Identifiers (after keywords)
  RegularIdentifier,
  DelimitedIdentifier,

  // Literals (number before Dot so ".5" is a number)
  StringLiteral,
  UnsignedNumber,

  // Multi-char operators first
  NotEquals,
  LessThanEquals,
  GreaterThanEquals,
  Concat,
  Equals,
  LessThan,
  GreaterThan,
  Plus,
  Minus,
  Star,
  Slash,

  // Punctuation
  LParen,
  RParen,
  Comma,
  Dot,
];

export const AdqlLexer = new Lexer(allTokens, {
  ensureOptimizations: true,
});

export function tokenize(input: string) {
  return AdqlLexer.tokenize(input);
}

export function tokenKind(token: IToken): TokenKind {
  if (tokenMatcher(token, Keyword)) return "keyword";
  if (tokenMatcher(token, Identifier)) return "identifier";
  if (tokenMatcher(token, Operator)) return "operator";
  if (tokenMatcher(token, LiteralToken)) return "literal";
  return "punctuation";
}

/** UTF-8 byte offset of the string index `offset` in `source`. */
export function byteOffset(source: string, offset: number): number {
  return Buffer.byteLength(source.slice(0, offset), "utf8");
}

export function toToken(token: IToken, source: string): Token {
  return {
    kind: tokenKind(token),
    lexeme: token.image,
    position: {
      line: token.startLine ?? 1,
      column: token.startColumn ?? 1,
      offset: byteOffset(source, token.startOffset),
    },
  };
}
