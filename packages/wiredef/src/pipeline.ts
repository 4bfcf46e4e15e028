/**
 * Early transform pipeline.
 *
 * Runs the early passes over one file, or over a set of files in import
 * order so that every file is processed after the files it imports.
 */
import { PipelineError, SchemaError } from "./errors.js";
import { defaultLogger, type Logger } from "./logger.js";
import type { EarlyModel } from "./early/types.js";
import { AddFileLevelNamespace } from "./transforms/add-file-level-namespace.js";
import { AttachImportedModels } from "./transforms/attach-imported-models.js";
import { CanonicalizeColons } from "./transforms/canonicalize-colons.js";
import { sortByDependencies } from "./transforms/dependency-sort.js";
import { PromoteInlineEnums } from "./transforms/promote-inline-enums.js";
import { QfnReference } from "./transforms/qfn-reference.js";
import { DEFAULT_EXTENSION } from "./paths.js";

/** One early pass. Passes mutate the model in place and return it. */
export interface EarlyTransform {
  readonly name: string;
  transform(model: EarlyModel): EarlyModel;
}

export type PipelineOptions = {
  logger?: Logger;
  /** Extension appended to import paths written without one (default `.def`) */
  extension?: string;
};

/** Passes for a file compiled on its own, without imports */
export function singleFileTransforms(): EarlyTransform[] {
  return [new AddFileLevelNamespace(), new CanonicalizeColons(), new QfnReference(), new PromoteInlineEnums()];
}

/** Passes for a file compiled together with the files in `registry` */
export function multiFileTransforms(
  registry: ReadonlyMap<string, EarlyModel>,
  extension = DEFAULT_EXTENSION,
): EarlyTransform[] {
  return [
    new AddFileLevelNamespace(),
    new AttachImportedModels(registry, extension),
    new CanonicalizeColons(),
    new QfnReference(),
    new PromoteInlineEnums(),
  ];
}

export function runEarlyPipeline(
  model: EarlyModel,
  transforms: readonly EarlyTransform[] = singleFileTransforms(),
  options?: PipelineOptions,
): EarlyModel {
  const logger = options?.logger ?? defaultLogger;
  let current = model;
  for (const t of transforms) {
    logger.debug("[wiredef] %s: %s", t.name, current.file);
    try {
      current = t.transform(current);
    } catch (err) {
      if (err instanceof SchemaError) throw err;
      throw new PipelineError(`${t.name} failed: ${err instanceof Error ? err.message : String(err)}`, {
        file: current.file,
        line: 0,
      });
    }
  }
  return current;
}

/**
 * Sort `models` (keyed by absolute path) into import order and run the
 * multi-file passes over each.
 *
 * @throws CircularImportError when the files import each other in a cycle
 */
export function runEarlyPipelineMulti(
  models: ReadonlyMap<string, EarlyModel>,
  options?: PipelineOptions,
): EarlyModel[] {
  const extension = options?.extension ?? DEFAULT_EXTENSION;
  const sorted = sortByDependencies(models, extension);
  const transforms = multiFileTransforms(models, extension);
  for (const model of sorted) runEarlyPipeline(model, transforms, options);
  return sorted;
}
