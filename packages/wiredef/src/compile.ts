import { resolve } from "node:path";
import { CompilationError, SchemaError } from "./errors.js";
import { defaultLogger } from "./logger.js";
import { CompilationContext, loadSchemaFiles, nodeFileSystem, type LoadOptions } from "./loader.js";
import { ModelBuilder } from "./model/builder.js";
import type { Model } from "./model/model.js";
import { runEarlyPipelineMulti } from "./pipeline.js";

export type CompileOptions = LoadOptions;

/**
 * Compile a schema file and everything it imports.
 *
 * @throws CompilationError listing every problem found
 */
export function compileFile(path: string, options?: CompileOptions): Model {
  const file = resolve(path);
  const fs = options?.fs ?? nodeFileSystem;
  return compile(file, fs.readFile(file), options);
}

/**
 * Compile schema text held in memory. Imports are still read through the
 * file system, relative to `file` (default `schema.def` in the working
 * directory), whose stem also names the file-level namespace.
 *
 * @throws CompilationError listing every problem found
 */
export function compileSource(text: string, options?: CompileOptions & { file?: string }): Model {
  return compile(resolve(options?.file ?? "schema.def"), text, options);
}

function compile(file: string, text: string, options?: CompileOptions): Model {
  const logger = options?.logger ?? defaultLogger;
  const context = new CompilationContext();
  try {
    const root = loadSchemaFiles(file, text, context, options);
    runEarlyPipelineMulti(context.early, options);
    const model = new ModelBuilder({ logger, registry: context.models }).build(root);
    logger.info("[wiredef] compiled %s (%d file(s))", file, context.models.size);
    return model;
  } catch (err) {
    if (err instanceof SchemaError) {
      logger.warn("[wiredef] %s", err.format());
      throw new CompilationError([err]);
    }
    throw err;
  }
}
