import { inEnumRange } from "../early/numbering.js";
import type { EarlyEnumValue } from "../early/types.js";
import type { BitWidth, EnumValue } from "./types.js";

/**
 * Smallest storage width holding the magnitude of every value.
 * Open enums get at least 32 bits since unknown values may arrive.
 */
export function bitWidthFor(values: readonly bigint[], atLeast32 = false): BitWidth {
  const max = values.reduce((m, v) => {
    const magnitude = v < 0n ? -v : v;
    return magnitude > m ? magnitude : m;
  }, 0n);
  const width: BitWidth = max <= 0xffn ? 8 : max <= 0xffffn ? 16 : max <= 0xffffffffn ? 32 : 64;
  return atLeast32 && width < 32 ? 32 : width;
}

export type MergeResult = {
  values: EnumValue[];
  /** Own values whose name is already taken, with the value that took it */
  duplicates: { value: EarlyEnumValue; inherited: boolean }[];
  /** Own values whose number, continued from the inherited ones, overflows 64 bits */
  overflows: EarlyEnumValue[];
};

/**
 * Inherited values first, in the parent's order, then the enum's own.
 *
 * Own values numbered automatically continue from the previous value of
 * the merged list. With `renumber` off (option sets) the numbers already
 * assigned are kept.
 */
export function mergeEnumValues(
  inherited: readonly EnumValue[],
  own: readonly EarlyEnumValue[],
  renumber = true,
): MergeResult {
  const values: EnumValue[] = inherited.map((v) => ({ ...v, inherited: true }));
  const inheritedNames = new Set(inherited.map((v) => v.name));
  const ownNames = new Set<string>();
  const duplicates: MergeResult["duplicates"] = [];
  const overflows: EarlyEnumValue[] = [];

  let previous = values.at(-1)?.value;
  for (const v of own) {
    if (inheritedNames.has(v.name) || ownNames.has(v.name)) {
      duplicates.push({ value: v, inherited: inheritedNames.has(v.name) });
      continue;
    }
    ownNames.add(v.name);
    const value = v.explicit || !renumber ? v.value : previous === undefined ? 0n : previous + 1n;
    if (!inEnumRange(value)) {
      overflows.push(v);
      continue;
    }
    previous = value;
    values.push({
      name: v.name,
      value,
      inherited: false,
      file: v.file,
      line: v.line,
      namespace: v.namespace,
      doc: v.doc,
      comment: v.comment,
    });
  }
  return { values, duplicates, overflows };
}
