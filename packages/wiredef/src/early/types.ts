/**
 * EarlyModel: the mutable per-file representation produced straight from
 * the parse tree and refined in place by the early transform passes.
 *
 * Type names stay as raw strings here; binding them to entities is the
 * model builder's job.
 */

export type PrimitiveName = "string" | "int" | "float" | "bool" | "byte";

const PRIMITIVE_NAMES: ReadonlySet<string> = new Set(["string", "int", "float", "bool", "byte"]);

export function isPrimitiveName(name: string): name is PrimitiveName {
  return PRIMITIVE_NAMES.has(name);
}

/** Where a declaration came from */
export type Provenance = {
  /** Source file (absolute path once loaded through the compiler) */
  file: string;
  /** 1-based line of the declaration's first token */
  line: number;
  /** Name of the innermost enclosing namespace */
  namespace: string;
};

/**
 * `doc` holds `///` lines with the marker stripped, `comment` every
 * attached comment verbatim. Both are "" when absent.
 */
export type Comments = {
  doc: string;
  comment: string;
};

// ── Raw types ─────────────────────────────────────────────────────────────

/** A value inside an inline `enum { ... }` / `options { ... }` */
export type RawValue = Comments & {
  name: string;
  /** Only when written explicitly */
  value?: bigint;
  line: number;
};

export type RawPrimitiveType = { kind: "primitive"; name: PrimitiveName };
export type RawRefType = {
  kind: "ref";
  name: string;
  /** Set once `name` is the QFN of a declaration visible from the reference */
  resolved?: true;
};
export type RawScalarType = RawPrimitiveType | RawRefType;
export type RawInlineEnumType = { kind: "enum"; open: boolean; values: RawValue[] };
export type RawInlineOptionsType = { kind: "options"; values: RawValue[] };
export type RawCompoundType = { kind: "compound"; base: RawScalarType; components: string[] };

export type RawElementType =
  | RawScalarType
  | RawInlineEnumType
  | RawInlineOptionsType
  | RawCompoundType;

export type RawArrayType = { kind: "array"; element: RawElementType };
export type RawMapType = { kind: "map"; key: RawScalarType; value: RawType };

export type RawType = RawElementType | RawArrayType | RawMapType;

// ── Declarations ──────────────────────────────────────────────────────────

export type EarlyField = Provenance &
  Comments & {
    name: string;
    type: RawType;
    /** Leading identifiers before the field name, e.g. `optional` */
    modifiers: string[];
    /** Default expression source text, verbatim */
    defaultRaw?: string;
  };

export type EarlyMessage = Provenance &
  Comments & {
    name: string;
    parentRaw?: string;
    /** `parentRaw` has been resolved to a visible QFN */
    parentResolved?: true;
    fields: EarlyField[];
  };

export type EarlyEnumValue = Provenance &
  Comments & {
    name: string;
    value: bigint;
    /** `false` when the value was numbered automatically */
    explicit: boolean;
  };

export type EarlyEnum = Provenance &
  Comments & {
    name: string;
    parentRaw?: string;
    /** `parentRaw` has been resolved to a visible QFN */
    parentResolved?: true;
    isOpen: boolean;
    /** Bit-flag set (`options`) rather than an enumeration */
    isOptions: boolean;
    values: EarlyEnumValue[];
  };

export type EarlyCompound = Provenance &
  Comments & {
    name: string;
    base: RawPrimitiveType;
    components: string[];
  };

/** Declarations held directly by a file or namespace */
export type EarlyScope = {
  messages: EarlyMessage[];
  enums: EarlyEnum[];
  options: EarlyEnum[];
  compounds: EarlyCompound[];
  /** Arena indices of nested namespaces, in declaration order */
  namespaces: number[];
};

export type EarlyNamespace = EarlyScope &
  Comments & {
    name: string;
    /** Arena index of the enclosing namespace */
    parent?: number;
    /** Fully qualified name, set by the qualified-name pass */
    qfn?: string;
    file: string;
    line: number;
  };

export type EarlyImport = {
  path: string;
  alias?: string;
  line: number;
};

export type EarlyModel = EarlyScope & {
  file: string;
  /** Stem of the file name, e.g. `shapes` for `shapes.def` */
  fileNamespace: string;
  /** Every namespace in the file; parents and children refer to each other by index */
  arena: EarlyNamespace[];
  importsRaw: EarlyImport[];
  /** Attached imported models keyed by alias, or by import path when unaliased */
  imports: Map<string, EarlyModel>;
};
