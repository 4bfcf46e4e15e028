import type { Compound, Entity, Enum, Message, Namespace, TypeRef } from "./types.js";
import { refKindOf } from "./types.js";

/**
 * The compiled form of one schema file.
 *
 * Namespaces live in one array and point at each other by index. Entities
 * of imported files are reached through `imports`, shared with every
 * other model that imports the same file.
 */
export class Model {
  private readonly symbols = new Map<string, Entity>();

  constructor(
    readonly file: string,
    readonly fileNamespace: string,
    readonly namespaces: readonly Namespace[],
    /** Indices of the outermost namespaces */
    readonly roots: readonly number[],
    /** Imported models keyed by alias, or by import path when unaliased */
    readonly imports: ReadonlyMap<string, Model>,
  ) {
    for (const ns of namespaces) {
      for (const entity of [...ns.messages, ...ns.enums, ...ns.options, ...ns.compounds]) {
        this.symbols.set(entity.qfn, entity);
      }
    }
    deepFreeze(namespaces);
    Object.freeze(this);
  }

  /** Entity declared in this file */
  own(qfn: string): Entity | undefined {
    return this.symbols.get(qfn);
  }

  /** Entity declared in this file or any file it imports, directly or not */
  lookup(qfn: string): Entity | undefined {
    for (const model of this.reachable()) {
      const entity = model.own(qfn);
      if (entity) return entity;
    }
    return undefined;
  }

  /** Entity a reference points at, when its kind matches */
  resolve(ref: TypeRef): Entity | undefined {
    const entity = this.lookup(ref.qfn);
    return entity && refKindOf(entity) === ref.kind ? entity : undefined;
  }

  message(qfn: string): Message | undefined {
    const entity = this.lookup(qfn);
    return entity?.kind === "message" ? entity : undefined;
  }

  enum(qfn: string): Enum | undefined {
    const entity = this.lookup(qfn);
    return entity?.kind === "enum" ? entity : undefined;
  }

  compound(qfn: string): Compound | undefined {
    const entity = this.lookup(qfn);
    return entity?.kind === "compound" ? entity : undefined;
  }

  namespace(qfn: string): Namespace | undefined {
    return this.namespaces.find((ns) => ns.qfn === qfn);
  }

  /** Entities declared in this file, namespace by namespace */
  entities(): Entity[] {
    return [...this.symbols.values()];
  }

  /** This model followed by every model it imports, each once */
  reachable(): Model[] {
    const seen = new Set<Model>();
    const out: Model[] = [];
    const visit = (model: Model) => {
      if (seen.has(model)) return;
      seen.add(model);
      out.push(model);
      for (const imported of model.imports.values()) visit(imported);
    };
    visit(this);
    return out;
  }

  /**
   * Fields of a message including those inherited from its ancestors,
   * ancestors' fields first.
   */
  allFields(message: Message): Message["fields"] {
    const chain: Message[] = [];
    const seen = new Set<string>();
    let current: Message | undefined = message;
    while (current && !seen.has(current.qfn)) {
      seen.add(current.qfn);
      chain.unshift(current);
      current = current.parent ? this.message(current.parent.qfn) : undefined;
    }
    return chain.flatMap((m) => m.fields);
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
