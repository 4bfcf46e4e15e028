/**
 * Model builder: EarlyModel → Model.
 *
 * Binds every QFN the early passes produced to an entity, merges enum
 * inheritance, computes bit widths and reduces default expressions.
 * Problems are collected rather than thrown one at a time; the build ends
 * with a single `CompilationError` listing all of them.
 */
import {
  CircularImportError,
  CircularInheritanceError,
  CompilationError,
  DuplicateDefinitionError,
  DuplicateEnumValueError,
  InvalidDefaultError,
  InvalidTypeError,
  PipelineError,
  UnresolvedReferenceError,
  type SchemaError,
  type SourceLocation,
} from "../errors.js";
import { defaultLogger, type Logger } from "../logger.js";
import type {
  EarlyCompound,
  EarlyEnum,
  EarlyField,
  EarlyMessage,
  EarlyModel,
  EarlyNamespace,
  RawRefType,
  RawType,
} from "../early/types.js";
import { forEachNamespace, joinQfn, namespacePath } from "../early/walk.js";
import { DefaultValueError, reduceDefault } from "./defaults.js";
import { bitWidthFor, mergeEnumValues } from "./enums.js";
import { Model } from "./model.js";
import {
  refKindOf,
  type Compound,
  type DefaultValue,
  type Entity,
  type Enum,
  type EnumValue,
  type Field,
  type FieldType,
  type Message,
  type Namespace,
  type TypeRef,
} from "./types.js";

const FIELD_MODIFIERS: ReadonlySet<string> = new Set(["optional", "required", "repeated"]);

export type BuildOptions = {
  logger?: Logger;
  /** Models already built, keyed by absolute file path. Shared so each file is built once. */
  registry?: Map<string, Model>;
};

/**
 * Build the Model of `early` and, first, of every file it imports.
 *
 * @throws CompilationError listing every problem found
 */
export function buildModel(early: EarlyModel, options?: BuildOptions): Model {
  return new ModelBuilder(options).build(early);
}

type BuildState = {
  errors: SchemaError[];
  /** Files whose build failed, so dependents skip them without repeating the errors */
  failed: Set<string>;
};

export class ModelBuilder {
  private readonly registry: Map<string, Model>;
  private readonly logger: Logger;

  constructor(options?: BuildOptions) {
    this.registry = options?.registry ?? new Map();
    this.logger = options?.logger ?? defaultLogger;
  }

  build(early: EarlyModel): Model {
    const state: BuildState = { errors: [], failed: new Set() };
    const model = this.buildFile(early, state, []);
    if (!model || state.errors.length > 0) {
      this.logger.warn("[wiredef] %s: compilation failed with %d error(s)", early.file, state.errors.length);
      throw new CompilationError(state.errors);
    }
    return model;
  }

  private buildFile(early: EarlyModel, state: BuildState, chain: readonly string[]): Model | undefined {
    const cached = this.registry.get(early.file);
    if (cached) return cached;
    if (state.failed.has(early.file)) return undefined;
    if (chain.includes(early.file)) {
      const cycle = [...chain.slice(chain.indexOf(early.file)), early.file];
      state.errors.push(new CircularImportError(cycle, { file: early.file, line: 0 }));
      state.failed.add(early.file);
      return undefined;
    }

    const imports = new Map<string, Model>();
    let importsBuilt = true;
    for (const [key, imported] of early.imports) {
      const model = this.buildFile(imported, state, [...chain, early.file]);
      if (model) imports.set(key, model);
      else importsBuilt = false;
    }
    if (!importsBuilt) {
      state.failed.add(early.file);
      return undefined;
    }

    const before = state.errors.length;
    const model = new FileModelBuilder(early, imports, state.errors).build();
    if (state.errors.length > before) {
      state.failed.add(early.file);
      return undefined;
    }
    this.logger.debug("[wiredef] built model for %s", early.file);
    this.registry.set(early.file, model);
    return model;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
//  One file
// ═══════════════════════════════════════════════════════════════════════════

type Declared =
  | { kind: "message"; qfn: string; decl: EarlyMessage }
  | { kind: "enum"; qfn: string; decl: EarlyEnum }
  | { kind: "compound"; qfn: string; decl: EarlyCompound };

type DeclaredEnum = Extract<Declared, { kind: "enum" }>;
type DeclaredCompound = Extract<Declared, { kind: "compound" }>;

class FileModelBuilder {
  /** Declarations of this file by QFN */
  private readonly declared = new Map<string, Declared>();
  /** Namespace QFNs by arena index */
  private readonly namespaceQfns: string[] = [];
  /** Every model reachable through the imports, each once */
  private readonly imported: Model[];

  private readonly enums = new Map<string, Enum>();
  private readonly compounds = new Map<string, Compound>();
  private readonly messages = new Map<string, Message>();

  constructor(
    private readonly early: EarlyModel,
    private readonly imports: ReadonlyMap<string, Model>,
    private readonly errors: SchemaError[],
  ) {
    const seen = new Set<Model>();
    this.imported = [];
    for (const model of imports.values()) {
      for (const m of model.reachable()) {
        if (seen.has(m)) continue;
        seen.add(m);
        this.imported.push(m);
      }
    }
  }

  build(): Model {
    this.checkFileScope();
    this.indexDeclarations();
    this.checkImportedNamespaces();

    for (const d of this.declared.values()) {
      if (d.kind === "enum") this.resolveEnum(d, []);
      else if (d.kind === "compound") this.buildCompound(d);
    }
    this.checkMessageCycles();
    for (const d of this.declared.values()) {
      if (d.kind === "message") this.messages.set(d.qfn, this.buildMessage(d.decl, d.qfn));
    }

    const namespaces = this.early.arena.map((ns, index) => this.buildNamespace(ns, index));
    return new Model(this.early.file, this.early.fileNamespace, namespaces, [...this.early.namespaces], this.imports);
  }

  // ── Indexing ────────────────────────────────────────────────────────────

  private checkFileScope(): void {
    const stray = [...this.early.messages, ...this.early.enums, ...this.early.options, ...this.early.compounds];
    if (stray.length > 0) {
      this.errors.push(
        new PipelineError(`"${stray[0].name}" is declared outside any namespace; add the file-level namespace first`, at(stray[0])),
      );
    }
  }

  private indexDeclarations(): void {
    const namespaceLines = new Map<string, number>();
    forEachNamespace(this.early, (ns, index) => {
      const qfn = ns.qfn ?? namespacePath(this.early, index);
      this.namespaceQfns[index] = qfn;

      const first = namespaceLines.get(qfn);
      if (first !== undefined) {
        this.errors.push(
          new DuplicateDefinitionError(`Namespace "${qfn}" is already declared at line ${first}`, at(ns)),
        );
      } else {
        namespaceLines.set(qfn, ns.line);
      }

      const names = new Map<string, number>();
      const add = (d: Declared) => {
        const firstLine = names.get(d.decl.name);
        if (firstLine !== undefined) {
          this.errors.push(
            new DuplicateDefinitionError(
              `Duplicate definition of "${d.decl.name}" in namespace ${qfn} (first declared at line ${firstLine})`,
              at(d.decl),
            ),
          );
          return;
        }
        names.set(d.decl.name, d.decl.line);
        this.declared.set(d.qfn, d);
      };
      for (const decl of ns.messages) add({ kind: "message", qfn: joinQfn(qfn, decl.name), decl });
      for (const decl of [...ns.enums, ...ns.options]) add({ kind: "enum", qfn: joinQfn(qfn, decl.name), decl });
      for (const decl of ns.compounds) add({ kind: "compound", qfn: joinQfn(qfn, decl.name), decl });
    });
  }

  /** Namespace QFNs must not repeat across this file and everything it imports */
  private checkImportedNamespaces(): void {
    const owners = new Map<string, string>();
    for (const qfn of this.namespaceQfns) {
      if (qfn !== undefined) owners.set(qfn, this.early.file);
    }
    const reported = new Set<string>();
    for (const [key, model] of this.imports) {
      const line = this.early.importsRaw.find((imp) => (imp.alias ?? imp.path) === key)?.line ?? 0;
      for (const m of model.reachable()) {
        for (const ns of m.namespaces) {
          const owner = owners.get(ns.qfn);
          if (owner === undefined) {
            owners.set(ns.qfn, m.file);
          } else if (owner !== m.file && !reported.has(ns.qfn)) {
            reported.add(ns.qfn);
            this.errors.push(
              new DuplicateDefinitionError(`Namespace "${ns.qfn}" is declared in both ${owner} and ${m.file}`, {
                file: this.early.file,
                line,
              }),
            );
          }
        }
      }
    }
  }

  // ── Lookup ──────────────────────────────────────────────────────────────

  /** `resolved` is the qualified-name pass's mark; names it could not resolve bind to nothing */
  private refTo(qfn: string, resolved: boolean | undefined): TypeRef | undefined {
    if (!resolved) return undefined;
    const local = this.declared.get(qfn);
    if (local) {
      const kind = local.kind === "enum" && local.decl.isOptions ? "options" : local.kind;
      return { kind, qfn };
    }
    const entity = this.importedEntity(qfn);
    return entity ? { kind: refKindOf(entity), qfn } : undefined;
  }

  private importedEntity(qfn: string): Entity | undefined {
    for (const model of this.imported) {
      const entity = model.own(qfn);
      if (entity) return entity;
    }
    return undefined;
  }

  private enumValues(qfn: string): readonly EnumValue[] | undefined {
    const local = this.enums.get(qfn);
    if (local) return local.values;
    const entity = this.importedEntity(qfn);
    return entity?.kind === "enum" ? entity.values : undefined;
  }

  private compound(qfn: string): Compound | undefined {
    const local = this.declared.get(qfn);
    if (local?.kind === "compound") return this.buildCompound(local);
    const entity = this.importedEntity(qfn);
    return entity?.kind === "compound" ? entity : undefined;
  }

  // ── Enums ───────────────────────────────────────────────────────────────

  private resolveEnum(d: DeclaredEnum, chain: readonly string[]): Enum | undefined {
    const done = this.enums.get(d.qfn);
    if (done) return done;
    if (chain.includes(d.qfn)) {
      this.errors.push(new CircularInheritanceError([...chain.slice(chain.indexOf(d.qfn)), d.qfn], at(d.decl)));
      return undefined;
    }

    const e = d.decl;
    let parent: TypeRef | undefined;
    let inherited: readonly EnumValue[] = [];
    if (e.parentRaw !== undefined) {
      const ref = this.refTo(e.parentRaw, e.parentResolved);
      if (!ref) {
        this.errors.push(new UnresolvedReferenceError(e.parentRaw, `parent of enum ${d.qfn}`, at(e)));
      } else if (ref.kind !== "enum") {
        this.errors.push(new InvalidTypeError(`Parent "${ref.qfn}" of enum ${d.qfn} is not an enum`, at(e)));
      } else {
        parent = ref;
        const local = this.declared.get(ref.qfn);
        inherited =
          (local?.kind === "enum" ? this.resolveEnum(local, [...chain, d.qfn])?.values : this.enumValues(ref.qfn)) ?? [];
      }
    }

    const { values, duplicates, overflows } = mergeEnumValues(inherited, e.values, !e.isOptions);
    for (const dup of duplicates) {
      const message = dup.inherited
        ? `Enum value "${dup.value.name}" of ${d.qfn} redefines a value inherited from ${parent?.qfn ?? "its parent"}`
        : `Duplicate enum value "${dup.value.name}" in ${d.qfn}`;
      this.errors.push(new DuplicateEnumValueError(message, at(dup.value)));
    }
    for (const v of overflows) {
      this.errors.push(new InvalidTypeError(`Value of "${v.name}" in ${d.qfn} does not fit in 64 bits`, at(v)));
    }

    const result: Enum = {
      kind: "enum",
      name: e.name,
      qfn: d.qfn,
      isOpen: e.isOpen,
      isOptions: e.isOptions,
      bitWidth: bitWidthFor(
        values.map((v) => v.value),
        e.isOpen && !e.isOptions,
      ),
      ...(parent ? { parent } : {}),
      values,
      ...sourceInfo(e),
    };
    this.enums.set(d.qfn, result);
    return result;
  }

  // ── Compounds ───────────────────────────────────────────────────────────

  private buildCompound(d: DeclaredCompound): Compound {
    const done = this.compounds.get(d.qfn);
    if (done) return done;
    const c = d.decl;
    const result: Compound = {
      kind: "compound",
      name: c.name,
      qfn: d.qfn,
      base: { kind: "primitive", name: c.base.name },
      components: [...c.components],
      ...sourceInfo(c),
    };
    this.compounds.set(d.qfn, result);
    return result;
  }

  // ── Messages ────────────────────────────────────────────────────────────

  private checkMessageCycles(): void {
    const reported = new Set<string>();
    for (const d of this.declared.values()) {
      if (d.kind !== "message" || reported.has(d.qfn)) continue;
      const path: string[] = [];
      let current: string | undefined = d.qfn;
      while (current !== undefined && !path.includes(current)) {
        path.push(current);
        const next = this.declared.get(current);
        current = next?.kind === "message" ? next.decl.parentRaw : undefined;
      }
      if (current === undefined) continue;

      const cycle = [...path.slice(path.indexOf(current)), current];
      if (cycle.some((qfn) => reported.has(qfn))) continue;
      for (const qfn of cycle) reported.add(qfn);
      const start = this.declared.get(current);
      this.errors.push(
        new CircularInheritanceError(cycle, start ? at(start.decl) : { file: this.early.file, line: 0 }),
      );
    }
  }

  private buildMessage(m: EarlyMessage, qfn: string): Message {
    let parent: TypeRef | undefined;
    if (m.parentRaw !== undefined) {
      const ref = this.refTo(m.parentRaw, m.parentResolved);
      if (!ref) {
        this.errors.push(new UnresolvedReferenceError(m.parentRaw, `parent of message ${qfn}`, at(m)));
      } else if (ref.kind !== "message") {
        this.errors.push(new InvalidTypeError(`Parent "${ref.qfn}" of message ${qfn} is not a message`, at(m)));
      } else {
        parent = ref;
      }
    }

    const inherited = parent ? this.fieldOwners(parent.qfn) : new Map<string, string>();
    const own = new Set<string>();
    const fields: Field[] = [];
    for (const f of m.fields) {
      const owner = inherited.get(f.name);
      if (own.has(f.name)) {
        this.errors.push(new DuplicateDefinitionError(`Duplicate field "${f.name}" in message ${qfn}`, at(f)));
        continue;
      }
      if (owner !== undefined) {
        this.errors.push(
          new DuplicateDefinitionError(`Field "${f.name}" of message ${qfn} is already declared in ${owner}`, at(f)),
        );
        continue;
      }
      own.add(f.name);
      const field = this.buildField(f, qfn);
      if (field) fields.push(field);
    }

    return {
      kind: "message",
      name: m.name,
      qfn,
      ...(parent ? { parent } : {}),
      fields,
      ...sourceInfo(m),
    };
  }

  /** Field name → QFN of the ancestor declaring it, for `qfn` and its ancestors */
  private fieldOwners(qfn: string): Map<string, string> {
    const owners = new Map<string, string>();
    const seen = new Set<string>();
    let current: string | undefined = qfn;
    while (current !== undefined && !seen.has(current)) {
      seen.add(current);
      const local = this.declared.get(current);
      if (local?.kind === "message") {
        for (const f of local.decl.fields) if (!owners.has(f.name)) owners.set(f.name, current);
        current = local.decl.parentRaw;
        continue;
      }
      const entity = this.importedEntity(current);
      if (entity?.kind !== "message") break;
      for (const f of entity.fields) if (!owners.has(f.name)) owners.set(f.name, current);
      current = entity.parent?.qfn;
    }
    return owners;
  }

  private buildField(f: EarlyField, owner: string): Field | undefined {
    const context = `field ${owner}.${f.name}`;
    const type = this.fieldType(f.type, f, context);
    if (!type) return undefined;

    for (const modifier of f.modifiers) {
      if (!FIELD_MODIFIERS.has(modifier)) {
        this.errors.push(new InvalidTypeError(`Unknown modifier "${modifier}" on ${context}`, at(f)));
      }
    }

    let defaultValue: DefaultValue | undefined;
    if (f.defaultRaw !== undefined) {
      try {
        defaultValue = reduceDefault(f.defaultRaw, type, (qfn) => this.enumValues(qfn));
      } catch (err) {
        if (!(err instanceof DefaultValueError)) throw err;
        this.errors.push(new InvalidDefaultError(`${err.message} (${context})`, at(f)));
      }
    }

    const typeRef = outermostRef(type);
    return {
      name: f.name,
      type,
      ...(typeRef ? { typeRef } : {}),
      modifiers: [...f.modifiers],
      optional: f.modifiers.includes("optional"),
      ...(defaultValue ? { default: defaultValue } : {}),
      ...sourceInfo(f),
    };
  }

  private fieldType(raw: RawType, f: EarlyField, context: string): FieldType | undefined {
    switch (raw.kind) {
      case "primitive":
        return { kind: "primitive", name: raw.name };
      case "ref":
        return this.refType(raw, f, context);
      case "compound":
        if (raw.base.kind !== "primitive") {
          this.errors.push(
            new InvalidTypeError(`Compound base of ${context} must be a primitive type, found "${raw.base.name}"`, at(f)),
          );
          return undefined;
        }
        return { kind: "compound", base: { kind: "primitive", name: raw.base.name }, components: [...raw.components] };
      case "array": {
        const element = this.fieldType(raw.element, f, context);
        return element && { kind: "array", element };
      }
      case "map": {
        const key = this.fieldType(raw.key, f, context);
        const value = this.fieldType(raw.value, f, context);
        if (!key || !value) return undefined;
        if (key.kind !== "primitive" && key.kind !== "enum" && key.kind !== "options") {
          this.errors.push(new InvalidTypeError(`Map key of ${context} must be a primitive or enum type`, at(f)));
          return undefined;
        }
        return { kind: "map", key, value };
      }
      case "enum":
      case "options":
        this.errors.push(new PipelineError(`Inline ${raw.kind} on ${context} has not been promoted`, at(f)));
        return undefined;
    }
  }

  private refType(raw: RawRefType, f: EarlyField, context: string): FieldType | undefined {
    const ref = this.refTo(raw.name, raw.resolved);
    if (!ref) {
      this.errors.push(new UnresolvedReferenceError(raw.name, context, at(f)));
      return undefined;
    }
    switch (ref.kind) {
      case "message":
        return { kind: "message", ref };
      case "enum":
        return { kind: "enum", ref };
      case "options":
        return { kind: "options", ref };
      case "compound": {
        const compound = this.compound(ref.qfn);
        return compound && { kind: "compound", base: compound.base, components: compound.components, ref };
      }
    }
  }

  // ── Namespaces ──────────────────────────────────────────────────────────

  private buildNamespace(ns: EarlyNamespace, index: number): Namespace {
    const qfn = this.namespaceQfns[index] ?? namespacePath(this.early, index);
    const pick = <T>(decls: readonly { name: string }[], built: ReadonlyMap<string, T>): T[] =>
      decls.map((d) => built.get(joinQfn(qfn, d.name))).filter((v): v is T => v !== undefined);
    return {
      name: ns.name,
      qfn,
      ...(ns.parent !== undefined ? { parent: ns.parent } : {}),
      children: [...ns.namespaces],
      messages: pick(ns.messages, this.messages),
      enums: pick(ns.enums, this.enums),
      options: pick(ns.options, this.enums),
      compounds: pick(ns.compounds, this.compounds),
      file: ns.file,
      line: ns.line,
      doc: ns.doc,
      comment: ns.comment,
    };
  }
}

function outermostRef(type: FieldType): TypeRef | undefined {
  switch (type.kind) {
    case "message":
    case "enum":
    case "options":
      return type.ref;
    case "array":
      return outermostRef(type.element);
    case "map":
      return outermostRef(type.value) ?? outermostRef(type.key);
    default:
      return undefined;
  }
}

function at(decl: { file: string; line: number }): SourceLocation {
  return { file: decl.file, line: decl.line };
}

function sourceInfo(decl: { file: string; line: number; namespace: string; doc: string; comment: string }) {
  return { file: decl.file, line: decl.line, namespace: decl.namespace, doc: decl.doc, comment: decl.comment };
}
