import type { EarlyTransform } from "../pipeline.js";
import type { EarlyModel } from "../early/types.js";

/**
 * Wraps everything a file declares in one namespace named after the file,
 * so every declaration lives under a namespace.
 *
 * A file whose only top-level declaration is already a namespace of that
 * name is left as it is, which also makes the pass idempotent.
 */
export class AddFileLevelNamespace implements EarlyTransform {
  readonly name = "add-file-level-namespace";

  transform(model: EarlyModel): EarlyModel {
    if (isWrapped(model)) return model;

    const index = model.arena.length;
    model.arena.push({
      name: model.fileNamespace,
      file: model.file,
      line: 1,
      doc: "",
      comment: "",
      messages: model.messages,
      enums: model.enums,
      options: model.options,
      compounds: model.compounds,
      namespaces: model.namespaces,
    });
    for (const child of model.namespaces) {
      model.arena[child].parent = index;
    }
    for (const decl of [...model.messages, ...model.enums, ...model.options, ...model.compounds]) {
      decl.namespace = model.fileNamespace;
    }

    model.messages = [];
    model.enums = [];
    model.options = [];
    model.compounds = [];
    model.namespaces = [index];
    return model;
  }
}

function isWrapped(model: EarlyModel): boolean {
  return (
    model.messages.length === 0 &&
    model.enums.length === 0 &&
    model.options.length === 0 &&
    model.compounds.length === 0 &&
    model.namespaces.length === 1 &&
    model.arena[model.namespaces[0]].name === model.fileNamespace
  );
}
