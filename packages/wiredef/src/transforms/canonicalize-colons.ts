import type { EarlyTransform } from "../pipeline.js";
import type { EarlyModel } from "../early/types.js";
import { allScopes, mapTypeNames } from "../early/walk.js";

/** `a.b.C` and `a::b::C` name the same thing; keep only the `::` form. */
export function canonicalName(name: string): string {
  return name.replace(/\s+/g, "").replace(/\./g, "::");
}

/**
 * Rewrites every type reference and parent name in the file to `::`
 * separators.
 */
export class CanonicalizeColons implements EarlyTransform {
  readonly name = "canonicalize-colons";

  transform(model: EarlyModel): EarlyModel {
    for (const scope of allScopes(model)) {
      for (const message of scope.messages) {
        if (message.parentRaw !== undefined) message.parentRaw = canonicalName(message.parentRaw);
        for (const field of message.fields) field.type = mapTypeNames(field.type, canonicalName);
      }
      for (const e of scope.enums) {
        if (e.parentRaw !== undefined) e.parentRaw = canonicalName(e.parentRaw);
      }
    }
    return model;
  }
}
