/**
 * Chevrotain CstParser for the schema definition language.
 *
 * The parser only builds the concrete syntax tree; turning it into an
 * EarlyModel is the job of `early/builder.ts`.
 */
import { CstParser, type CstNode, type ILexingError, type IRecognitionException, type IToken } from "chevrotain";
import {
  allTokens,
  Identifier,
  ImportKw,
  AsKw,
  NamespaceKw,
  MessageKw,
  OpenEnumKw,
  EnumKw,
  OptionsKw,
  MapKw,
  StringKw,
  IntKw,
  FloatKw,
  BoolKw,
  ByteKw,
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
  SchemaLexer,
} from "./lexer.js";
import { SchemaSyntaxError, type SchemaDiagnostic } from "../errors.js";

// ═══════════════════════════════════════════════════════════════════════════
//  Grammar (CstParser)
// ═══════════════════════════════════════════════════════════════════════════

class SchemaParser extends CstParser {
  constructor(opts: { recovery?: boolean } = {}) {
    super(allTokens, {
      recoveryEnabled: opts.recovery ?? false,
      maxLookahead: 3,
    });
    this.performSelfAnalysis();
  }

  // ── Top-level ──────────────────────────────────────────────────────────

  public schemaFile = this.RULE("schemaFile", () => {
    this.MANY(() => {
      this.OR([
        { ALT: () => this.SUBRULE(this.importDecl) },
        { ALT: () => this.SUBRULE(this.item) },
      ]);
    });
  });

  /** import "path" [as Alias] */
  public importDecl = this.RULE("importDecl", () => {
    this.CONSUME(ImportKw);
    this.CONSUME(StringLiteral, { LABEL: "path" });
    this.OPTION(() => {
      this.CONSUME(AsKw);
      this.SUBRULE(this.nameToken, { LABEL: "alias" });
    });
    this.OPTION2(() => this.CONSUME(Semicolon));
  });

  public item = this.RULE("item", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.namespaceDecl) },
      { ALT: () => this.SUBRULE(this.messageDecl) },
      { ALT: () => this.SUBRULE(this.enumDecl) },
      { ALT: () => this.SUBRULE(this.optionsDecl) },
      { ALT: () => this.SUBRULE(this.compoundDecl) },
    ]);
  });

  /** namespace Name { items } */
  public namespaceDecl = this.RULE("namespaceDecl", () => {
    this.CONSUME(NamespaceKw);
    this.SUBRULE(this.nameToken, { LABEL: "name" });
    this.CONSUME(LCurly);
    this.MANY(() => this.SUBRULE(this.item));
    this.CONSUME(RCurly);
  });

  // ── Messages ───────────────────────────────────────────────────────────

  /** message Name [: Parent] { fields } */
  public messageDecl = this.RULE("messageDecl", () => {
    this.CONSUME(MessageKw);
    this.SUBRULE(this.nameToken, { LABEL: "name" });
    this.OPTION(() => {
      this.CONSUME(Colon);
      this.SUBRULE(this.qualifiedName, { LABEL: "parent" });
    });
    this.CONSUME(LCurly);
    this.MANY(() => this.SUBRULE(this.fieldDecl));
    this.CONSUME(RCurly);
  });

  /**
   * [modifier...] name : type [= default] [;]
   *
   * A leading identifier is a modifier only when the token after it is not
   * the `:` that separates the field name from its type.
   */
  public fieldDecl = this.RULE("fieldDecl", () => {
    this.MANY({
      GATE: () => this.LA(2).tokenType !== Colon,
      DEF: () => this.CONSUME(Identifier, { LABEL: "modifier" }),
    });
    this.SUBRULE(this.nameToken, { LABEL: "name" });
    this.CONSUME(Colon);
    this.SUBRULE(this.typeDef);
    this.OPTION(() => {
      this.CONSUME(Equals);
      this.SUBRULE(this.defaultExpr);
    });
    this.OPTION2(() => this.CONSUME(Semicolon));
  });

  /**
   * Default expression, kept as source text. It runs to the end of the
   * line, a `;` or the closing `}` of the message.
   */
  public defaultExpr = this.RULE("defaultExpr", () => {
    this.AT_LEAST_ONE({
      GATE: () => this.LA(1).startLine === this.LA(0).endLine,
      DEF: () => this.SUBRULE(this.defaultAtom),
    });
  });

  public defaultAtom = this.RULE("defaultAtom", () => {
    this.OR([
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.CONSUME(NumberLiteral) },
      { ALT: () => this.CONSUME(Identifier) },
      { ALT: () => this.CONSUME(DoubleColon) },
      { ALT: () => this.CONSUME(Dot) },
      { ALT: () => this.CONSUME(Pipe) },
      { ALT: () => this.CONSUME(Comma) },
      { ALT: () => this.SUBRULE(this.defaultGroup) },
    ]);
  });

  /** Bracketed default: { 1, 2 } or [ a, b ] */
  public defaultGroup = this.RULE("defaultGroup", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(LCurly);
          this.MANY(() => this.SUBRULE(this.defaultAtom));
          this.CONSUME(RCurly);
        },
      },
      {
        ALT: () => {
          this.CONSUME(LSquare);
          this.MANY2(() => this.SUBRULE2(this.defaultAtom));
          this.CONSUME(RSquare);
        },
      },
    ]);
  });

  // ── Types ──────────────────────────────────────────────────────────────

  /** Map<K, V> | element [ "[]" ] */
  public typeDef = this.RULE("typeDef", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.mapType) },
      {
        ALT: () => {
          this.SUBRULE(this.elementType);
          this.OPTION(() => {
            this.CONSUME(LSquare, { LABEL: "array" });
            this.CONSUME(RSquare);
          });
        },
      },
    ]);
  });

  public mapType = this.RULE("mapType", () => {
    this.CONSUME(MapKw);
    this.CONSUME(LAngle);
    this.SUBRULE(this.scalarType, { LABEL: "key" });
    this.CONSUME(Comma);
    this.SUBRULE(this.typeDef, { LABEL: "value" });
    this.CONSUME(RAngle);
  });

  public elementType = this.RULE("elementType", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.inlineEnumType) },
      { ALT: () => this.SUBRULE(this.inlineOptionsType) },
      {
        // float { x, y } is a compound over the scalar
        ALT: () => {
          this.SUBRULE(this.scalarType);
          this.OPTION(() => this.SUBRULE(this.componentList));
        },
      },
    ]);
  });

  /** enum { A, B } | open_enum { A, B } | enum Name */
  public inlineEnumType = this.RULE("inlineEnumType", () => {
    this.OR([
      { ALT: () => this.CONSUME(EnumKw, { LABEL: "enumKw" }) },
      { ALT: () => this.CONSUME(OpenEnumKw, { LABEL: "openEnumKw" }) },
    ]);
    this.OR2([
      { ALT: () => this.SUBRULE(this.valueList) },
      { ALT: () => this.SUBRULE(this.qualifiedName, { LABEL: "ref" }) },
    ]);
  });

  /** options { A, B } */
  public inlineOptionsType = this.RULE("inlineOptionsType", () => {
    this.CONSUME(OptionsKw);
    this.SUBRULE(this.valueList);
  });

  /** A primitive type keyword or a (possibly qualified) type name */
  public scalarType = this.RULE("scalarType", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.primitiveType) },
      { ALT: () => this.SUBRULE(this.qualifiedName) },
    ]);
  });

  public primitiveType = this.RULE("primitiveType", () => {
    this.OR([
      { ALT: () => this.CONSUME(StringKw) },
      { ALT: () => this.CONSUME(IntKw) },
      { ALT: () => this.CONSUME(FloatKw) },
      { ALT: () => this.CONSUME(BoolKw) },
      { ALT: () => this.CONSUME(ByteKw) },
    ]);
  });

  /** Name ( (:: | .) Name )* */
  public qualifiedName = this.RULE("qualifiedName", () => {
    this.CONSUME(Identifier, { LABEL: "first" });
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(DoubleColon) },
        { ALT: () => this.CONSUME(Dot) },
      ]);
      this.SUBRULE(this.nameToken, { LABEL: "rest" });
    });
  });

  // ── Enums, options, compounds ──────────────────────────────────────────

  /** enum Name [: Parent] { values } | open_enum Name [: Parent] { values } */
  public enumDecl = this.RULE("enumDecl", () => {
    this.OR([
      { ALT: () => this.CONSUME(EnumKw, { LABEL: "enumKw" }) },
      { ALT: () => this.CONSUME(OpenEnumKw, { LABEL: "openEnumKw" }) },
    ]);
    this.SUBRULE(this.nameToken, { LABEL: "name" });
    this.OPTION(() => {
      this.CONSUME(Colon);
      this.SUBRULE(this.qualifiedName, { LABEL: "parent" });
    });
    this.SUBRULE(this.valueList);
  });

  /** options Name { values } */
  public optionsDecl = this.RULE("optionsDecl", () => {
    this.CONSUME(OptionsKw);
    this.SUBRULE(this.nameToken, { LABEL: "name" });
    this.SUBRULE(this.valueList);
  });

  /** float Name { x, y, z } */
  public compoundDecl = this.RULE("compoundDecl", () => {
    this.SUBRULE(this.primitiveType, { LABEL: "base" });
    this.SUBRULE(this.nameToken, { LABEL: "name" });
    this.SUBRULE(this.componentList);
  });

  /** { A [= n] [, | ;] ... } */
  public valueList = this.RULE("valueList", () => {
    this.CONSUME(LCurly);
    this.MANY(() => this.SUBRULE(this.valueDecl));
    this.CONSUME(RCurly);
  });

  public valueDecl = this.RULE("valueDecl", () => {
    this.SUBRULE(this.nameToken, { LABEL: "name" });
    this.OPTION(() => {
      this.CONSUME(Equals);
      this.CONSUME(NumberLiteral, { LABEL: "value" });
    });
    this.OPTION2(() => {
      this.OR([
        { ALT: () => this.CONSUME(Comma) },
        { ALT: () => this.CONSUME(Semicolon) },
      ]);
    });
  });

  /** { x, y, z } */
  public componentList = this.RULE("componentList", () => {
    this.CONSUME(LCurly);
    this.MANY(() => {
      this.SUBRULE(this.nameToken, { LABEL: "component" });
      this.OPTION(() => this.CONSUME(Comma));
    });
    this.CONSUME(RCurly);
  });

  /** Declared names may reuse keywords (e.g. a field called `options`) */
  public nameToken = this.RULE("nameToken", () => {
    this.OR([
      { ALT: () => this.CONSUME(Identifier) },
      { ALT: () => this.CONSUME(ImportKw) },
      { ALT: () => this.CONSUME(AsKw) },
      { ALT: () => this.CONSUME(NamespaceKw) },
      { ALT: () => this.CONSUME(MessageKw) },
      { ALT: () => this.CONSUME(OpenEnumKw) },
      { ALT: () => this.CONSUME(EnumKw) },
      { ALT: () => this.CONSUME(OptionsKw) },
      { ALT: () => this.CONSUME(MapKw) },
      { ALT: () => this.CONSUME(StringKw) },
      { ALT: () => this.CONSUME(IntKw) },
      { ALT: () => this.CONSUME(FloatKw) },
      { ALT: () => this.CONSUME(BoolKw) },
      { ALT: () => this.CONSUME(ByteKw) },
    ]);
  });
}

// Strict instance: parseSchema stops at the first error
const parserInstance = new SchemaParser();
// Error recovery enabled, used for diagnostics
const diagParserInstance = new SchemaParser({ recovery: true });

// ═══════════════════════════════════════════════════════════════════════════
//  Public API
// ═══════════════════════════════════════════════════════════════════════════

/** Concrete syntax tree of one schema file plus what the builder needs from the lexer. */
export type ParseTree = {
  cst: CstNode;
  text: string;
  file: string;
  /** Significant tokens in source order */
  tokens: IToken[];
  /** Comment tokens in source order */
  comments: IToken[];
};

/**
 * Parse schema text into a concrete syntax tree.
 *
 * @throws SchemaSyntaxError on the first lexing or parsing error
 */
export function parseSchema(text: string, file = "<input>"): ParseTree {
  const lexResult = SchemaLexer.tokenize(text);
  if (lexResult.errors.length > 0) {
    throw lexingError(lexResult.errors[0], text, file);
  }

  parserInstance.input = lexResult.tokens;
  const cst = parserInstance.schemaFile();
  if (parserInstance.errors.length > 0) {
    throw recognitionError(parserInstance.errors[0], file, lexResult.tokens);
  }

  return {
    cst,
    text,
    file,
    tokens: lexResult.tokens,
    comments: lexResult.groups.comments ?? [],
  };
}

export type SchemaParseResult = {
  /** Present only when the text parsed without errors */
  tree: ParseTree | undefined;
  diagnostics: SchemaDiagnostic[];
};

/**
 * Parse schema text and collect every syntax problem instead of stopping
 * at the first. Uses Chevrotain's error recovery. Designed for editor use.
 */
export function parseSchemaDiagnostics(text: string, file = "<input>"): SchemaParseResult {
  const diagnostics: SchemaDiagnostic[] = [];

  // 1. Lex
  const lexResult = SchemaLexer.tokenize(text);
  for (const e of lexResult.errors) {
    const line = (e.line ?? 1) - 1;
    const character = (e.column ?? 1) - 1;
    diagnostics.push({
      message: lexingError(e, text, file).message,
      severity: "error",
      code: "syntax",
      file,
      range: {
        start: { line, character },
        end: { line, character: character + e.length },
      },
    });
  }

  // 2. Parse with error recovery (builds partial CST past errors)
  diagParserInstance.input = lexResult.tokens;
  const cst = diagParserInstance.schemaFile();
  for (const e of diagParserInstance.errors) {
    const t = e.token;
    const startLine = Number.isNaN(t.startOffset) ? lastLine(lexResult.tokens) : (t.startLine ?? 1);
    diagnostics.push({
      message: e.message,
      severity: "error",
      code: "syntax",
      file,
      range: {
        start: { line: startLine - 1, character: (t.startColumn ?? 1) - 1 },
        end: { line: (t.endLine ?? startLine) - 1, character: t.endColumn ?? t.startColumn ?? 1 },
      },
    });
  }

  const tree =
    diagnostics.length === 0
      ? { cst, text, file, tokens: lexResult.tokens, comments: lexResult.groups.comments ?? [] }
      : undefined;
  return { tree, diagnostics };
}

function lexingError(e: ILexingError, text: string, file: string): SchemaSyntaxError {
  const found = text.slice(e.offset, e.offset + e.length);
  return new SchemaSyntaxError(
    `Unexpected character "${found}"`,
    { file, line: e.line ?? 0, column: e.column ?? 0 },
    found,
  );
}

function recognitionError(e: IRecognitionException, file: string, tokens: IToken[]): SchemaSyntaxError {
  const t = e.token;
  // EOF has no position
  if (Number.isNaN(t.startOffset)) {
    return new SchemaSyntaxError(e.message, { file, line: lastLine(tokens) });
  }
  return new SchemaSyntaxError(
    e.message,
    { file, line: t.startLine ?? 0, column: t.startColumn ?? 0 },
    t.image,
  );
}

function lastLine(tokens: IToken[]): number {
  return tokens.at(-1)?.endLine ?? 1;
}
