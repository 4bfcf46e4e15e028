import type { EarlyTransform } from "../pipeline.js";
import type {
  EarlyEnum,
  EarlyField,
  EarlyMessage,
  EarlyModel,
  EarlyScope,
  RawElementType,
  RawType,
} from "../early/types.js";
import { numberEnumValues, numberOptionValues } from "../early/numbering.js";
import { forEachNamespace, joinQfn } from "../early/walk.js";

/** Name given to an inline enum or options set lifted out of `message.field` */
export function inlineEntityName(message: string, field: string): string {
  return `${message}_${field}`;
}

type Site = {
  scope: EarlyScope;
  /** QFN of the namespace holding `scope`, if any */
  qfn: string | undefined;
  message: EarlyMessage;
  field: EarlyField;
};

/**
 * Lifts every inline `enum { }` / `open_enum { }` / `options { }` field type
 * into a named declaration beside the message and points the field at it.
 * Inline types nested in array elements and map values are lifted too.
 */
export class PromoteInlineEnums implements EarlyTransform {
  readonly name = "promote-inline-enums";

  transform(model: EarlyModel): EarlyModel {
    promoteScope(model, undefined);
    forEachNamespace(model, (ns) => promoteScope(ns, ns.qfn));
    return model;
  }
}

function promoteScope(scope: EarlyScope, qfn: string | undefined): void {
  for (const message of scope.messages) {
    for (const field of message.fields) {
      field.type = promote(field.type, { scope, qfn, message, field });
    }
  }
}

function promote(type: RawType, site: Site): RawType {
  if (type.kind === "array") return { kind: "array", element: promoteElement(type.element, site) };
  if (type.kind === "map") return { kind: "map", key: type.key, value: promote(type.value, site) };
  return promoteElement(type, site);
}

function promoteElement(type: RawElementType, site: Site): RawElementType {
  if (type.kind !== "enum" && type.kind !== "options") return type;

  const { field } = site;
  const name = inlineEntityName(site.message.name, field.name);
  const where = { file: field.file, namespace: field.namespace };
  const promoted: EarlyEnum = {
    name,
    isOpen: type.kind === "options" || type.open,
    isOptions: type.kind === "options",
    values: type.kind === "options" ? numberOptionValues(type.values, where) : numberEnumValues(type.values, where),
    ...where,
    line: field.line,
    doc: field.doc,
    comment: field.comment,
  };
  if (promoted.isOptions) site.scope.options.push(promoted);
  else site.scope.enums.push(promoted);
  return { kind: "ref", name: joinQfn(site.qfn, name), resolved: true };
}
