import { MAX_ENUM_VALUE } from "../early/numbering.js";
import type { DefaultValue, EnumValue, FieldType, PrimitiveName } from "./types.js";

const INTEGER = /^-?\d+$/;
const FLOAT = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

/** Thrown by `reduceDefault`; the builder turns it into an `InvalidDefaultError` */
export class DefaultValueError extends Error {}

/**
 * Interpret a default expression against the field's type.
 *
 * `valuesOf` returns the resolved values of the enum or option set the
 * field refers to.
 *
 * @throws DefaultValueError when the text does not fit the type
 */
export function reduceDefault(
  text: string,
  type: FieldType,
  valuesOf: (qfn: string) => readonly EnumValue[] | undefined,
): DefaultValue {
  switch (type.kind) {
    case "primitive":
      return reducePrimitive(text, type.name);
    case "enum": {
      const values = valuesOf(type.ref.qfn) ?? [];
      const name = valueName(text, type.ref.qfn);
      const match = values.find((v) => v.name === name);
      if (!match) throw new DefaultValueError(`"${text}" is not a value of ${type.ref.qfn}`);
      return { kind: "enum", name: match.name, value: match.value };
    }
    case "options": {
      const values = valuesOf(type.ref.qfn) ?? [];
      const names: string[] = [];
      let value = 0n;
      for (const part of text.split("|").map((p) => p.trim())) {
        if (INTEGER.test(part)) {
          const flags = BigInt(part);
          if (flags < 0n || flags > MAX_ENUM_VALUE) {
            throw new DefaultValueError(`Flags ${part} are out of range for ${type.ref.qfn}`);
          }
          value |= flags;
          continue;
        }
        const name = valueName(part, type.ref.qfn);
        const match = values.find((v) => v.name === name);
        if (!match) throw new DefaultValueError(`"${part}" is not a flag of ${type.ref.qfn}`);
        names.push(match.name);
        value |= match.value;
      }
      return { kind: "options", names, value };
    }
  }
  return { kind: "raw", text };
}

function reducePrimitive(text: string, name: PrimitiveName): DefaultValue {
  switch (name) {
    case "int":
      return { kind: "number", value: integer(text) };
    case "byte": {
      const value = integer(text);
      if (value < 0 || value > 255) throw new DefaultValueError(`Default ${text} is out of range for byte`);
      return { kind: "number", value };
    }
    case "float":
      if (!FLOAT.test(text)) throw new DefaultValueError(`Default "${text}" is not a number`);
      return { kind: "number", value: Number(text) };
    case "bool":
      if (text !== "true" && text !== "false") throw new DefaultValueError(`Default "${text}" is not a boolean`);
      return { kind: "bool", value: text === "true" };
    case "string":
      return { kind: "string", value: unquote(text) };
  }
}

function integer(text: string): number {
  if (!INTEGER.test(text)) throw new DefaultValueError(`Default "${text}" is not an integer`);
  return Number(text);
}

function unquote(text: string): string {
  if (text.length < 2 || !text.startsWith('"') || !text.endsWith('"')) {
    throw new DefaultValueError(`String default must be quoted, found ${text}`);
  }
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "string") return parsed;
  } catch {
    // escapes JSON does not know, e.g. \q; keep the text between the quotes
  }
  return text.slice(1, -1);
}

/**
 * `Red`, `Color::Red`, `Color.Red` and `ns::Color::Red` all name `Red` of
 * `ns::Color`. A qualifier naming anything else gives `undefined`.
 */
function valueName(text: string, enumQfn: string): string | undefined {
  const qualifier = text.split(/::|\./).map((s) => s.trim());
  const name = qualifier.pop();
  if (qualifier.length === 0) return name;
  const owner = enumQfn.split("::");
  if (qualifier.length > owner.length) return undefined;
  return owner.slice(owner.length - qualifier.length).join("::") === qualifier.join("::") ? name : undefined;
}
