import { CircularImportError } from "../errors.js";
import type { EarlyModel } from "../early/types.js";
import { DEFAULT_EXTENSION, resolveImportPath } from "../paths.js";

/**
 * Order a set of files so that every file comes after the files it imports.
 *
 * `models` is keyed by absolute path. Imports that point outside the set
 * are ignored here; the loader reports those. Ties keep the map's order.
 *
 * @throws CircularImportError naming the files on the cycle
 */
export function sortByDependencies(
  models: ReadonlyMap<string, EarlyModel>,
  extension = DEFAULT_EXTENSION,
): EarlyModel[] {
  const sorted: EarlyModel[] = [];
  const done = new Set<string>();
  const stack: string[] = [];

  const visit = (key: string, model: EarlyModel) => {
    if (done.has(key)) return;
    stack.push(key);
    for (const imp of model.importsRaw) {
      const target = resolveImportPath(model.file, imp.path, extension);
      const imported = models.get(target);
      if (!imported) continue;
      const onStack = stack.indexOf(target);
      if (onStack !== -1) {
        throw new CircularImportError([...stack.slice(onStack), target], { file: model.file, line: imp.line });
      }
      visit(target, imported);
    }
    stack.pop();
    done.add(key);
    sorted.push(model);
  };

  for (const [key, model] of models) visit(key, model);
  return sorted;
}
