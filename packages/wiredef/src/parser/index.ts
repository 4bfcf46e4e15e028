/**
 * Chevrotain-based parser for the schema definition language.
 *
 * Re-exports the public parse functions as well as the lexer for direct access.
 */
export { parseSchema, parseSchemaDiagnostics } from "./parser.js";
export type { ParseTree, SchemaParseResult } from "./parser.js";
export { SchemaLexer, allTokens } from "./lexer.js";
