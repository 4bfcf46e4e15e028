/**
 * Chevrotain Lexer for the schema definition language.
 *
 * Tokenizes .def source text into a stream consumed by the CstParser.
 * Whitespace is skipped; comments go to the "comments" group so the
 * early-model builder can attach them to declarations.
 */
import { createToken, Lexer } from "chevrotain";

// ── Whitespace & comments ──────────────────────────────────────────────────

export const Newline = createToken({
  name: "Newline",
  pattern: /\r?\n/,
  group: Lexer.SKIPPED,
});

export const WS = createToken({
  name: "WS",
  pattern: /[ \t\f]+/,
  group: Lexer.SKIPPED,
});

export const DocComment = createToken({
  name: "DocComment",
  pattern: /\/\/\/[^\r\n]*/,
  group: "comments",
});

export const LineComment = createToken({
  name: "LineComment",
  pattern: /\/\/[^\r\n]*/,
  group: "comments",
});

export const BlockComment = createToken({
  name: "BlockComment",
  pattern: /\/\*[\s\S]*?\*\//,
  group: "comments",
  line_breaks: true,
  start_chars_hint: ["/"],
});

// ── Identifiers (defined first, keywords reference them via longer_alt) ────────

export const Identifier = createToken({
  name: "Identifier",
  pattern: /[a-zA-Z_][a-zA-Z0-9_]*/,
});

// ── Keywords ───────────────────────────────────────────────────────────────

export const ImportKw    = createToken({ name: "ImportKw",    pattern: /import/,    longer_alt: Identifier });
export const AsKw        = createToken({ name: "AsKw",        pattern: /as/,        longer_alt: Identifier });
export const NamespaceKw = createToken({ name: "NamespaceKw", pattern: /namespace/, longer_alt: Identifier });
export const MessageKw   = createToken({ name: "MessageKw",   pattern: /message/,   longer_alt: Identifier });
export const OpenEnumKw  = createToken({ name: "OpenEnumKw",  pattern: /open_enum/, longer_alt: Identifier });
export const EnumKw      = createToken({ name: "EnumKw",      pattern: /enum/,      longer_alt: Identifier });
export const OptionsKw   = createToken({ name: "OptionsKw",   pattern: /options/,   longer_alt: Identifier });
export const MapKw       = createToken({ name: "MapKw",       pattern: /Map/,       longer_alt: Identifier });

// Primitive type names
export const StringKw = createToken({ name: "StringKw", pattern: /string/, longer_alt: Identifier });
export const IntKw    = createToken({ name: "IntKw",    pattern: /int/,    longer_alt: Identifier });
export const FloatKw  = createToken({ name: "FloatKw",  pattern: /float/,  longer_alt: Identifier });
export const BoolKw   = createToken({ name: "BoolKw",   pattern: /bool/,   longer_alt: Identifier });
export const ByteKw   = createToken({ name: "ByteKw",   pattern: /byte/,   longer_alt: Identifier });

// ── Operators & punctuation ────────────────────────────────────────────────

export const DoubleColon = createToken({ name: "DoubleColon", pattern: /::/ });
export const Colon       = createToken({ name: "Colon",       pattern: /:/ });
export const Semicolon   = createToken({ name: "Semicolon",   pattern: /;/ });
export const Comma       = createToken({ name: "Comma",       pattern: /,/ });
export const Dot         = createToken({ name: "Dot",         pattern: /\./ });
export const Pipe        = createToken({ name: "Pipe",        pattern: /\|/ });
export const Equals      = createToken({ name: "Equals",      pattern: /=/ });
export const LCurly      = createToken({ name: "LCurly",      pattern: /\{/ });
export const RCurly      = createToken({ name: "RCurly",      pattern: /\}/ });
export const LSquare     = createToken({ name: "LSquare",     pattern: /\[/ });
export const RSquare     = createToken({ name: "RSquare",     pattern: /\]/ });
export const LAngle      = createToken({ name: "LAngle",      pattern: /</ });
export const RAngle      = createToken({ name: "RAngle",      pattern: />/ });

// ── Literals ───────────────────────────────────────────────────────────────

export const StringLiteral = createToken({
  name: "StringLiteral",
  pattern: /"(?:[^"\\\r\n]|\\.)*"/,
});

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/,
});

// ── Token ordering ─────────────────────────────────────────────────────────

export const primitiveTokens = [StringKw, IntKw, FloatKw, BoolKw, ByteKw];

export const keywordTokens = [
  ImportKw,
  AsKw,
  NamespaceKw,
  MessageKw,
  OpenEnumKw,
  EnumKw,
  OptionsKw,
  MapKw,
  ...primitiveTokens,
];

export const allTokens = [
  WS,
  Newline,
  // `///` before `//`
  DocComment,
  LineComment,
  BlockComment,
  DoubleColon,
  Colon,
  Semicolon,
  Comma,
  Dot,
  Pipe,
  Equals,
  LCurly,
  RCurly,
  LSquare,
  RSquare,
  LAngle,
  RAngle,
  StringLiteral,
  NumberLiteral,
  // Keywords before Identifier (longer_alt prevents prefix stealing)
  ...keywordTokens,
  Identifier,
];

export const SchemaLexer = new Lexer(allTokens, {
  ensureOptimizations: true,
  positionTracking: "full",
});
