/**
 * Resolved, immutable schema model.
 *
 * Every type reference is bound: a `TypeRef` names an entity by kind and
 * fully qualified name, and `Model.resolve` turns it into the entity.
 */
import type { PrimitiveName } from "../early/types.js";

export type { PrimitiveName };

export type BitWidth = 8 | 16 | 32 | 64;

/** Shared by every declaration */
export type SourceInfo = {
  readonly file: string;
  readonly line: number;
  /** Name of the innermost enclosing namespace */
  readonly namespace: string;
  readonly doc: string;
  readonly comment: string;
};

export type TypeRefKind = "message" | "enum" | "options" | "compound";

/** Non-owning reference to an entity, resolved through `Model.resolve` */
export type TypeRef = {
  readonly kind: TypeRefKind;
  readonly qfn: string;
};

export type PrimitiveType = { readonly kind: "primitive"; readonly name: PrimitiveName };

export type FieldType =
  | PrimitiveType
  | { readonly kind: "message"; readonly ref: TypeRef }
  | { readonly kind: "enum"; readonly ref: TypeRef }
  | { readonly kind: "options"; readonly ref: TypeRef }
  | {
      readonly kind: "compound";
      readonly base: PrimitiveType;
      readonly components: readonly string[];
      /** Set when the field names a declared compound */
      readonly ref?: TypeRef;
    }
  | { readonly kind: "array"; readonly element: FieldType }
  | { readonly kind: "map"; readonly key: FieldType; readonly value: FieldType };

export type DefaultValue =
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "number"; readonly value: number }
  | { readonly kind: "bool"; readonly value: boolean }
  /** One value of an enum */
  | { readonly kind: "enum"; readonly name: string; readonly value: bigint }
  /** Flags OR-ed together */
  | { readonly kind: "options"; readonly names: readonly string[]; readonly value: bigint }
  /** Anything the builder does not interpret (arrays, maps, compounds, messages) */
  | { readonly kind: "raw"; readonly text: string };

export type Field = SourceInfo & {
  readonly name: string;
  readonly type: FieldType;
  /** Outermost entity the type refers to; absent for primitives and compounds of primitives */
  readonly typeRef?: TypeRef;
  readonly modifiers: readonly string[];
  readonly optional: boolean;
  readonly default?: DefaultValue;
};

export type Message = SourceInfo & {
  readonly kind: "message";
  readonly name: string;
  readonly qfn: string;
  readonly parent?: TypeRef;
  /** Own fields only; inherited fields live on the parent */
  readonly fields: readonly Field[];
};

export type EnumValue = SourceInfo & {
  readonly name: string;
  /** Exact, within the signed and unsigned 64-bit range */
  readonly value: bigint;
  /** Copied from a parent enum */
  readonly inherited: boolean;
};

export type Enum = SourceInfo & {
  readonly kind: "enum";
  readonly name: string;
  readonly qfn: string;
  readonly isOpen: boolean;
  readonly isOptions: boolean;
  readonly bitWidth: BitWidth;
  readonly parent?: TypeRef;
  /** Inherited values first, then the enum's own */
  readonly values: readonly EnumValue[];
};

export type Compound = SourceInfo & {
  readonly kind: "compound";
  readonly name: string;
  readonly qfn: string;
  readonly base: PrimitiveType;
  readonly components: readonly string[];
};

export type Entity = Message | Enum | Compound;

export type Namespace = {
  readonly name: string;
  readonly qfn: string;
  /** Index of the enclosing namespace in `Model.namespaces` */
  readonly parent?: number;
  readonly children: readonly number[];
  readonly messages: readonly Message[];
  readonly enums: readonly Enum[];
  readonly options: readonly Enum[];
  readonly compounds: readonly Compound[];
  readonly file: string;
  readonly line: number;
  readonly doc: string;
  readonly comment: string;
};

export function refKindOf(entity: Entity): TypeRefKind {
  if (entity.kind === "enum") return entity.isOptions ? "options" : "enum";
  return entity.kind;
}
