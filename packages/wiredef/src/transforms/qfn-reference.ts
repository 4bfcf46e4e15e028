import { PipelineError } from "../errors.js";
import type { EarlyTransform } from "../pipeline.js";
import type { EarlyEnum, EarlyMessage, EarlyModel, EarlyScope, RawRefType, RawType } from "../early/types.js";
import { forEachNamespace, joinQfn, mapTypeRefs } from "../early/walk.js";
import { inlineEntityName } from "./promote-inline-enums.js";

/** Simple name → fully qualified name */
type SymbolTable = Map<string, string>;

/** Key of the file scope in `FileSymbols.members` (arena indices are ≥ 0) */
const FILE_SCOPE = -1;

type FileSymbols = {
  /** Direct members of each namespace, by arena index */
  members: Map<number, SymbolTable>;
  /** QFN of every type the file declares */
  entities: Set<string>;
  /** Members of the file-level namespace */
  root: SymbolTable;
  rootQfn: string | undefined;
};

/**
 * Assigns every namespace its fully qualified name and rewrites every type
 * reference and parent name in the file to the QFN it denotes.
 *
 * Unqualified names are looked up among the direct members of the
 * enclosing namespaces, innermost first, then among the top-level members
 * of unaliased imports. Qualified names are tried relative to each
 * enclosing namespace, then as absolute names in this file and in the
 * unaliased imports. `Alias::X` names resolve through the aliased import.
 * Resolved references are marked so the model builder binds only those;
 * names that match nothing are left unchanged for it to report.
 */
export class QfnReference implements EarlyTransform {
  readonly name = "qfn-reference";

  transform(model: EarlyModel): EarlyModel {
    const stray = model.messages.length + model.enums.length + model.options.length + model.compounds.length;
    if (stray > 0 || fileRootIndex(model) === undefined) {
      throw new PipelineError(
        `${this.name} needs everything inside the file-level namespace "${model.fileNamespace}"`,
        { file: model.file, line: 1 },
      );
    }

    forEachNamespace(model, (ns, _index, stack) => {
      const parentIndex = stack.length > 1 ? stack[stack.length - 2] : undefined;
      ns.qfn = joinQfn(parentIndex === undefined ? undefined : model.arena[parentIndex].qfn, ns.name);
    });

    const local = collectSymbols(model);
    const unaliased: FileSymbols[] = [];
    const aliased = new Map<string, SymbolTable>();
    for (const [key, imported] of model.imports) {
      const symbols = collectSymbols(imported);
      if (model.importsRaw.some((imp) => imp.alias === key)) {
        aliased.set(key, aliasTable(symbols.entities, imported.fileNamespace, key));
      } else {
        unaliased.push(symbols);
      }
    }

    const resolve = (name: string, stack: readonly number[]): string | undefined => {
      if (!name.includes("::")) {
        for (let i = stack.length - 1; i >= 0; i--) {
          const hit = local.members.get(stack[i])?.get(name);
          if (hit) return hit;
        }
        const top = local.members.get(FILE_SCOPE)?.get(name);
        if (top) return top;
        for (const imp of unaliased) {
          const hit = imp.root.get(name);
          if (hit) return hit;
        }
        return undefined;
      }

      const viaAlias = aliased.get(name.split("::")[0])?.get(name);
      if (viaAlias) return viaAlias;
      for (let i = stack.length - 1; i >= 0; i--) {
        const candidate = joinQfn(model.arena[stack[i]].qfn, name);
        if (local.entities.has(candidate)) return candidate;
      }
      if (local.entities.has(name)) return name;
      for (const imp of unaliased) {
        if (imp.entities.has(name)) return name;
        const relative = joinQfn(imp.rootQfn, name);
        if (imp.entities.has(relative)) return relative;
      }
      return undefined;
    };

    const resolveRef = (ref: RawRefType, stack: readonly number[]): RawRefType => {
      if (ref.resolved) return ref;
      const qfn = resolve(ref.name, stack);
      return qfn === undefined ? ref : { kind: "ref", name: qfn, resolved: true };
    };

    const resolveParent = (decl: EarlyMessage | EarlyEnum, stack: readonly number[]) => {
      if (decl.parentRaw === undefined || decl.parentResolved) return;
      const qfn = resolve(decl.parentRaw, stack);
      if (qfn === undefined) return;
      decl.parentRaw = qfn;
      decl.parentResolved = true;
    };

    const rewrite = (scope: EarlyScope, stack: readonly number[]) => {
      for (const message of scope.messages) {
        resolveParent(message, stack);
        for (const field of message.fields) {
          field.type = mapTypeRefs(field.type, (ref) => resolveRef(ref, stack));
        }
      }
      for (const e of scope.enums) resolveParent(e, stack);
    };

    rewrite(model, []);
    forEachNamespace(model, (ns, _index, stack) => rewrite(ns, stack));
    return model;
  }
}

/**
 * Symbol tables of one file. Inline enums and options that the promotion
 * pass will lift out are registered under their future names so fields
 * may refer to them.
 */
function collectSymbols(model: EarlyModel): FileSymbols {
  const members = new Map<number, SymbolTable>();
  const entities = new Set<string>();

  const register = (key: number, scope: EarlyScope, prefix: string | undefined) => {
    const table: SymbolTable = new Map();
    const add = (name: string) => {
      const qfn = joinQfn(prefix, name);
      if (!table.has(name)) table.set(name, qfn);
      entities.add(qfn);
    };
    for (const message of scope.messages) {
      add(message.name);
      for (const field of message.fields) {
        if (hasInlineValues(field.type)) add(inlineEntityName(message.name, field.name));
      }
    }
    for (const e of [...scope.enums, ...scope.options, ...scope.compounds]) add(e.name);
    members.set(key, table);
  };

  register(FILE_SCOPE, model, undefined);
  const qfns = new Map<number, string>();
  forEachNamespace(model, (ns, index, stack) => {
    const parentIndex = stack.length > 1 ? stack[stack.length - 2] : undefined;
    const qfn = joinQfn(parentIndex === undefined ? undefined : qfns.get(parentIndex), ns.name);
    qfns.set(index, qfn);
    register(index, ns, qfn);
  });

  const rootIndex = fileRootIndex(model);
  return {
    members,
    entities,
    root: members.get(rootIndex ?? FILE_SCOPE) ?? new Map(),
    rootQfn: rootIndex === undefined ? undefined : qfns.get(rootIndex),
  };
}

/** Arena index of the file-level namespace, when the file has been wrapped in one */
function fileRootIndex(model: EarlyModel): number | undefined {
  if (model.namespaces.length !== 1) return undefined;
  const index = model.namespaces[0];
  return model.arena[index].name === model.fileNamespace ? index : undefined;
}

/** `alias::rest` → real QFN for every entity of an aliased import */
function aliasTable(entities: Set<string>, fileNamespace: string, alias: string): SymbolTable {
  const table: SymbolTable = new Map();
  const prefix = `${fileNamespace}::`;
  for (const qfn of entities) {
    const aliasQfn = qfn.startsWith(prefix) ? `${alias}::${qfn.slice(prefix.length)}` : `${alias}::${qfn}`;
    table.set(aliasQfn, qfn);
  }
  return table;
}

function hasInlineValues(type: RawType): boolean {
  switch (type.kind) {
    case "enum":
    case "options":
      return true;
    case "array":
      return hasInlineValues(type.element);
    case "map":
      return hasInlineValues(type.value);
    default:
      return false;
  }
}
