import { existsSync, readFileSync } from "node:fs";
import { MissingImportError } from "./errors.js";
import { defaultLogger, type Logger } from "./logger.js";
import { buildEarlyModel } from "./early/builder.js";
import type { EarlyModel } from "./early/types.js";
import type { Model } from "./model/model.js";
import { parseSchema } from "./parser/parser.js";
import { DEFAULT_EXTENSION, resolveImportPath } from "./paths.js";

/** Where schema files are read from. Paths are absolute. */
export interface SchemaFileSystem {
  readFile(path: string): string;
  exists(path: string): boolean;
}

export const nodeFileSystem: SchemaFileSystem = {
  readFile: (path) => readFileSync(path, "utf8"),
  exists: (path) => existsSync(path),
};

/**
 * Everything one compilation has loaded and built, keyed by absolute
 * file path. A file imported along several paths is read, parsed and
 * built once.
 */
export class CompilationContext {
  readonly early = new Map<string, EarlyModel>();
  readonly models = new Map<string, Model>();
}

export type LoadOptions = {
  fs?: SchemaFileSystem;
  /** Extension appended to import paths written without one (default `.def`) */
  extension?: string;
  logger?: Logger;
};

/**
 * Parse `file` (whose text is `source`) and, transitively, every file it
 * imports into `context.early`.
 *
 * @returns the EarlyModel of `file`
 * @throws SchemaSyntaxError if any file fails to parse
 * @throws MissingImportError if an imported file does not exist
 */
export function loadSchemaFiles(
  file: string,
  source: string,
  context: CompilationContext,
  options?: LoadOptions,
): EarlyModel {
  const fs = options?.fs ?? nodeFileSystem;
  const extension = options?.extension ?? DEFAULT_EXTENSION;
  const logger = options?.logger ?? defaultLogger;

  const load = (path: string, text: string): EarlyModel => {
    logger.debug("[wiredef] loading %s", path);
    const model = buildEarlyModel(parseSchema(text, path));
    context.early.set(path, model);
    for (const imp of model.importsRaw) {
      const target = resolveImportPath(path, imp.path, extension);
      if (context.early.has(target)) continue;
      if (!fs.exists(target)) {
        throw new MissingImportError(imp.path, target, { file: path, line: imp.line });
      }
      load(target, fs.readFile(target));
    }
    return model;
  };

  return load(file, source);
}
