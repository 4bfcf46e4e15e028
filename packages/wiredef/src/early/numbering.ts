import { SchemaSyntaxError } from "../errors.js";
import type { EarlyEnumValue, Provenance, RawValue } from "./types.js";

/** Smallest value storable in a signed 64-bit integer */
export const MIN_ENUM_VALUE = -(2n ** 63n);
/** Largest value storable in an unsigned 64-bit integer */
export const MAX_ENUM_VALUE = 2n ** 64n - 1n;

export function inEnumRange(value: bigint): boolean {
  return value >= MIN_ENUM_VALUE && value <= MAX_ENUM_VALUE;
}

/**
 * Enumerations: an omitted value is one more than the previous value,
 * starting at 0.
 *
 * @throws SchemaSyntaxError when numbering runs past the 64-bit range
 */
export function numberEnumValues(values: RawValue[], where: Omit<Provenance, "line">): EarlyEnumValue[] {
  let previous: bigint | undefined;
  return values.map((v) => {
    const value = v.value ?? (previous === undefined ? 0n : previous + 1n);
    previous = value;
    return toEnumValue(v, value, where);
  });
}

/**
 * Bit-flag sets: an omitted value is the lowest power of two above the
 * previous value, starting at 1.
 *
 * @throws SchemaSyntaxError when numbering runs past the 64-bit range
 */
export function numberOptionValues(values: RawValue[], where: Omit<Provenance, "line">): EarlyEnumValue[] {
  let previous: bigint | undefined;
  return values.map((v) => {
    const value = v.value ?? nextFlag(previous);
    previous = value;
    return toEnumValue(v, value, where);
  });
}

export function nextFlag(previous: bigint | undefined): bigint {
  if (previous === undefined || previous < 1n) return 1n;
  let flag = 1n;
  while (flag <= previous) flag <<= 1n;
  return flag;
}

function toEnumValue(v: RawValue, value: bigint, where: Omit<Provenance, "line">): EarlyEnumValue {
  if (!inEnumRange(value)) {
    throw new SchemaSyntaxError(
      `Value ${value} of "${v.name}" does not fit in 64 bits`,
      { file: where.file, line: v.line },
      v.name,
    );
  }
  return {
    name: v.name,
    value,
    explicit: v.value !== undefined,
    file: where.file,
    namespace: where.namespace,
    line: v.line,
    doc: v.doc,
    comment: v.comment,
  };
}
