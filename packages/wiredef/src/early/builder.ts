/**
 * Imperative CST → EarlyModel visitor.
 *
 * Walks the concrete syntax tree of one file and produces its EarlyModel:
 * declarations with raw (unresolved) type names, verbatim default
 * expressions, source lines and attached comments.
 */
import { basename, extname } from "node:path";
import type { CstNode, IToken } from "chevrotain";
import type { ParseTree } from "../parser/parser.js";
import { CommentIndex } from "../parser/comments.js";
import {
  collectTokens,
  endOffset,
  extractNameToken,
  findFirstToken,
  findLastToken,
  line,
  sub,
  subs,
  tok,
  toks,
} from "../parser/cst.js";
import { SchemaSyntaxError } from "../errors.js";
import { inEnumRange, numberEnumValues, numberOptionValues } from "./numbering.js";
import {
  isPrimitiveName,
  type Comments,
  type EarlyCompound,
  type EarlyEnum,
  type EarlyField,
  type EarlyImport,
  type EarlyMessage,
  type EarlyModel,
  type EarlyScope,
  type RawElementType,
  type RawPrimitiveType,
  type RawScalarType,
  type RawType,
  type RawValue,
} from "./types.js";

/** `dir/shapes.def` → `shapes` */
export function fileNamespaceOf(file: string): string {
  return basename(file, extname(file));
}

export function emptyModel(file: string, fileNamespace = fileNamespaceOf(file)): EarlyModel {
  return {
    file,
    fileNamespace,
    messages: [],
    enums: [],
    options: [],
    compounds: [],
    namespaces: [],
    arena: [],
    importsRaw: [],
    imports: new Map(),
  };
}

/**
 * Build the EarlyModel for one parsed file.
 *
 * @param fileNamespace - defaults to the stem of `tree.file`
 * @throws SchemaSyntaxError for constructs the grammar accepts but the model does not
 */
export function buildEarlyModel(tree: ParseTree, fileNamespace = fileNamespaceOf(tree.file)): EarlyModel {
  return new EarlyModelBuilder(tree, fileNamespace).build();
}

class EarlyModelBuilder {
  private readonly comments: CommentIndex;
  private readonly model: EarlyModel;

  constructor(private readonly tree: ParseTree, fileNamespace: string) {
    this.comments = new CommentIndex(tree.tokens, tree.comments);
    this.model = emptyModel(tree.file, fileNamespace);
  }

  build(): EarlyModel {
    const { cst } = this.tree;
    for (const node of subs(cst, "importDecl")) {
      this.model.importsRaw.push(this.buildImport(node));
    }
    for (const node of subs(cst, "item")) {
      this.addItem(node, this.model, undefined, this.model.fileNamespace);
    }
    return this.model;
  }

  // ── Declarations ────────────────────────────────────────────────────────

  private buildImport(node: CstNode): EarlyImport {
    const path = this.required(tok(node, "path"), node, "import path");
    const alias = sub(node, "alias");
    return {
      path: unquote(path.image),
      ...(alias ? { alias: extractNameToken(alias) } : {}),
      line: line(path),
    };
  }

  private addItem(item: CstNode, scope: EarlyScope, parent: number | undefined, namespace: string): void {
    const ns = sub(item, "namespaceDecl");
    if (ns) {
      scope.namespaces.push(this.buildNamespace(ns, parent));
      return;
    }
    const message = sub(item, "messageDecl");
    if (message) {
      scope.messages.push(this.buildMessage(message, namespace));
      return;
    }
    const enumNode = sub(item, "enumDecl");
    if (enumNode) {
      scope.enums.push(this.buildEnum(enumNode, namespace));
      return;
    }
    const options = sub(item, "optionsDecl");
    if (options) {
      scope.options.push(this.buildOptions(options, namespace));
      return;
    }
    const compound = sub(item, "compoundDecl");
    if (compound) {
      scope.compounds.push(this.buildCompound(compound, namespace));
      return;
    }
    throw this.syntaxError("Unrecognized declaration", item);
  }

  /** Appends the namespace to the arena and returns its index */
  private buildNamespace(node: CstNode, parent: number | undefined): number {
    const name = this.name(node);
    const index = this.model.arena.length;
    this.model.arena.push({
      name,
      ...(parent !== undefined ? { parent } : {}),
      file: this.tree.file,
      line: this.lineOf(node),
      ...this.commentsOf(node),
      messages: [],
      enums: [],
      options: [],
      compounds: [],
      namespaces: [],
    });
    const scope = this.model.arena[index];
    for (const item of subs(node, "item")) {
      this.addItem(item, scope, index, name);
    }
    return index;
  }

  private buildMessage(node: CstNode, namespace: string): EarlyMessage {
    const parent = sub(node, "parent");
    return {
      name: this.name(node),
      ...(parent ? { parentRaw: qualifiedText(parent) } : {}),
      fields: subs(node, "fieldDecl").map((f) => this.buildField(f, namespace)),
      file: this.tree.file,
      line: this.lineOf(node),
      namespace,
      ...this.commentsOf(node),
    };
  }

  private buildField(node: CstNode, namespace: string): EarlyField {
    const defaultExpr = sub(node, "defaultExpr");
    return {
      name: this.name(node),
      type: this.buildType(this.required(sub(node, "typeDef"), node, "field type")),
      modifiers: toks(node, "modifier").map((t) => t.image),
      ...(defaultExpr ? { defaultRaw: this.sourceText(defaultExpr) } : {}),
      file: this.tree.file,
      line: this.lineOf(node),
      namespace,
      ...this.commentsOf(node),
    };
  }

  private buildEnum(node: CstNode, namespace: string): EarlyEnum {
    const parent = sub(node, "parent");
    const where = { file: this.tree.file, namespace };
    return {
      name: this.name(node),
      ...(parent ? { parentRaw: qualifiedText(parent) } : {}),
      isOpen: tok(node, "openEnumKw") !== undefined,
      isOptions: false,
      values: numberEnumValues(this.rawValues(node), where),
      ...where,
      line: this.lineOf(node),
      ...this.commentsOf(node),
    };
  }

  private buildOptions(node: CstNode, namespace: string): EarlyEnum {
    const where = { file: this.tree.file, namespace };
    return {
      name: this.name(node),
      isOpen: true,
      isOptions: true,
      values: numberOptionValues(this.rawValues(node), where),
      ...where,
      line: this.lineOf(node),
      ...this.commentsOf(node),
    };
  }

  private buildCompound(node: CstNode, namespace: string): EarlyCompound {
    return {
      name: this.name(node),
      base: this.primitive(this.required(sub(node, "base"), node, "compound base type")),
      components: this.components(node),
      file: this.tree.file,
      line: this.lineOf(node),
      namespace,
      ...this.commentsOf(node),
    };
  }

  // ── Types ───────────────────────────────────────────────────────────────

  private buildType(node: CstNode): RawType {
    const map = sub(node, "mapType");
    if (map) {
      return {
        kind: "map",
        key: this.scalar(this.required(sub(map, "key"), map, "map key type")),
        value: this.buildType(this.required(sub(map, "value"), map, "map value type")),
      };
    }
    const element = this.element(this.required(sub(node, "elementType"), node, "type"));
    return tok(node, "array") ? { kind: "array", element } : element;
  }

  private element(node: CstNode): RawElementType {
    const inlineEnum = sub(node, "inlineEnumType");
    if (inlineEnum) {
      // `enum Color` names a declared enum
      const ref = sub(inlineEnum, "ref");
      if (ref) return { kind: "ref", name: qualifiedText(ref) };
      return {
        kind: "enum",
        open: tok(inlineEnum, "openEnumKw") !== undefined,
        values: this.rawValues(inlineEnum),
      };
    }
    const inlineOptions = sub(node, "inlineOptionsType");
    if (inlineOptions) {
      return { kind: "options", values: this.rawValues(inlineOptions) };
    }
    const base = this.scalar(this.required(sub(node, "scalarType"), node, "type"));
    if (sub(node, "componentList")) {
      return { kind: "compound", base, components: this.components(node) };
    }
    return base;
  }

  private scalar(node: CstNode): RawScalarType {
    const primitive = sub(node, "primitiveType");
    if (primitive) return this.primitive(primitive);
    return { kind: "ref", name: qualifiedText(this.required(sub(node, "qualifiedName"), node, "type name")) };
  }

  private primitive(node: CstNode): RawPrimitiveType {
    const name = extractNameToken(node);
    if (!isPrimitiveName(name)) throw this.syntaxError(`"${name}" is not a primitive type`, node);
    return { kind: "primitive", name };
  }

  private components(node: CstNode): string[] {
    const list = this.required(sub(node, "componentList"), node, "component list");
    return subs(list, "component").map(extractNameToken);
  }

  /** Values of the `valueList` under `node`, without numbering */
  private rawValues(node: CstNode): RawValue[] {
    const list = this.required(sub(node, "valueList"), node, "value list");
    return subs(list, "valueDecl").map((v) => {
      const literal = tok(v, "value");
      if (literal && !/^-?\d+$/.test(literal.image)) {
        throw this.syntaxError(`Enum value must be an integer, found "${literal.image}"`, v);
      }
      const value = literal ? BigInt(literal.image) : undefined;
      if (value !== undefined && !inEnumRange(value)) {
        throw this.syntaxError(`Enum value ${value} does not fit in 64 bits`, v);
      }
      return {
        name: this.name(v),
        ...(value !== undefined ? { value } : {}),
        line: this.lineOf(v),
        ...this.commentsOf(v),
      };
    });
  }

  // ── Helpers ─────────────────────────────────────────────────────────────

  private name(node: CstNode): string {
    return extractNameToken(this.required(sub(node, "name"), node, "name"));
  }

  private lineOf(node: CstNode): number {
    return line(findFirstToken(node));
  }

  private commentsOf(node: CstNode): Comments {
    return this.comments.attach(findFirstToken(node), findLastToken(node));
  }

  /** Source text spanned by `node`, verbatim */
  private sourceText(node: CstNode): string {
    const tokens = collectTokens(node);
    const first = tokens[0];
    const last = tokens.at(-1);
    if (!first || !last) return "";
    return this.tree.text.slice(first.startOffset, endOffset(last) + 1);
  }

  private required<T extends CstNode | IToken>(value: T | undefined, node: CstNode, what: string): T {
    if (value === undefined) throw this.syntaxError(`Missing ${what}`, node);
    return value;
  }

  private syntaxError(message: string, node: CstNode): SchemaSyntaxError {
    const first = findFirstToken(node);
    return new SchemaSyntaxError(
      message,
      { file: this.tree.file, line: line(first), column: first?.startColumn ?? 0 },
      first?.image,
    );
  }
}

/** Reassemble `a::b.c` from a qualifiedName node */
function qualifiedText(node: CstNode): string {
  return collectTokens(node)
    .map((t) => t.image)
    .join("");
}

function unquote(s: string): string {
  if (s.startsWith('"') && s.endsWith('"')) return s.slice(1, -1);
  return s;
}
