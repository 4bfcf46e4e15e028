import type {
  EarlyModel,
  EarlyNamespace,
  EarlyScope,
  RawElementType,
  RawRefType,
  RawScalarType,
  RawType,
} from "./types.js";

/**
 * Visit every namespace reachable from the file scope, depth-first in
 * declaration order. `stack` lists arena indices from the outermost
 * namespace down to (and including) `index`.
 */
export function forEachNamespace(
  model: EarlyModel,
  visit: (ns: EarlyNamespace, index: number, stack: readonly number[]) => void,
): void {
  const walk = (scope: EarlyScope, stack: number[]) => {
    for (const index of scope.namespaces) {
      const ns = model.arena[index];
      const inner = [...stack, index];
      visit(ns, index, inner);
      walk(ns, inner);
    }
  };
  walk(model, []);
}

/** `a::b::c` for a namespace, computed from the arena parent links */
export function namespacePath(model: EarlyModel, index: number): string {
  const names: string[] = [];
  let current: number | undefined = index;
  const seen = new Set<number>();
  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    const ns: EarlyNamespace = model.arena[current];
    names.unshift(ns.name);
    current = ns.parent;
  }
  return names.join("::");
}

export function joinQfn(prefix: string | undefined, name: string): string {
  return prefix ? `${prefix}::${name}` : name;
}

/** The file scope followed by every namespace */
export function allScopes(model: EarlyModel): EarlyScope[] {
  const scopes: EarlyScope[] = [model];
  forEachNamespace(model, (ns) => scopes.push(ns));
  return scopes;
}

// ── Raw type rewriting ────────────────────────────────────────────────────

type Rename = (name: string) => string;
type MapRef = (ref: RawRefType) => RawRefType;

function mapScalarRefs(type: RawScalarType, map: MapRef): RawScalarType {
  return type.kind === "ref" ? map(type) : type;
}

function mapElementRefs(type: RawElementType, map: MapRef): RawElementType {
  switch (type.kind) {
    case "ref":
      return map(type);
    case "compound":
      return { ...type, base: mapScalarRefs(type.base, map) };
    default:
      return type;
  }
}

/** Copy of `type` with every type reference passed through `map` */
export function mapTypeRefs(type: RawType, map: MapRef): RawType {
  if (type.kind === "array") return { kind: "array", element: mapElementRefs(type.element, map) };
  if (type.kind === "map") {
    return { kind: "map", key: mapScalarRefs(type.key, map), value: mapTypeRefs(type.value, map) };
  }
  return mapElementRefs(type, map);
}

/** Copy of `type` with every referenced type name passed through `rename` */
export function mapTypeNames(type: RawType, rename: Rename): RawType {
  return mapTypeRefs(type, (ref) => ({ ...ref, name: rename(ref.name) }));
}
