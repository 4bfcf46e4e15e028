import { DuplicateDefinitionError } from "../errors.js";
import type { EarlyTransform } from "../pipeline.js";
import type { EarlyImport, EarlyModel } from "../early/types.js";
import { DEFAULT_EXTENSION, resolveImportPath } from "../paths.js";

/**
 * Links each import to the already-processed model of the imported file,
 * keyed by the import's alias or, when it has none, by its path as written.
 *
 * The registry maps absolute file paths to models. Imports missing from it
 * are skipped.
 *
 * @throws DuplicateDefinitionError when an alias is taken by an earlier import
 */
export class AttachImportedModels implements EarlyTransform {
  readonly name = "attach-imported-models";

  constructor(
    private readonly registry: ReadonlyMap<string, EarlyModel>,
    private readonly extension = DEFAULT_EXTENSION,
  ) {}

  transform(model: EarlyModel): EarlyModel {
    const keys = new Map<string, EarlyImport>();
    for (const imp of model.importsRaw) {
      const key = imp.alias ?? imp.path;
      const first = keys.get(key);
      // the same file imported twice without an alias is harmless
      if (first && (first.alias !== undefined || imp.alias !== undefined)) {
        throw new DuplicateDefinitionError(`Import alias "${key}" is already used by the import at line ${first.line}`, {
          file: model.file,
          line: imp.line,
        });
      }
      keys.set(key, imp);

      const imported = this.registry.get(resolveImportPath(model.file, imp.path, this.extension));
      if (imported) model.imports.set(key, imported);
    }
    return model;
  }
}
