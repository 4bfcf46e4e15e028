export { parseSchema, parseSchemaDiagnostics, SchemaLexer } from "./parser/index.js";
export type { ParseTree, SchemaParseResult } from "./parser/index.js";
export { buildEarlyModel, fileNamespaceOf } from "./early/builder.js";
export type * from "./early/types.js";
export {
  runEarlyPipeline,
  runEarlyPipelineMulti,
  singleFileTransforms,
  multiFileTransforms,
} from "./pipeline.js";
export type { EarlyTransform, PipelineOptions } from "./pipeline.js";
export { AddFileLevelNamespace } from "./transforms/add-file-level-namespace.js";
export { AttachImportedModels } from "./transforms/attach-imported-models.js";
export { CanonicalizeColons } from "./transforms/canonicalize-colons.js";
export { sortByDependencies } from "./transforms/dependency-sort.js";
export { PromoteInlineEnums } from "./transforms/promote-inline-enums.js";
export { QfnReference } from "./transforms/qfn-reference.js";
export { buildModel, ModelBuilder } from "./model/builder.js";
export type { BuildOptions } from "./model/builder.js";
export { Model } from "./model/model.js";
export type {
  BitWidth,
  Compound,
  DefaultValue,
  Entity,
  Enum,
  EnumValue,
  Field,
  FieldType,
  Message,
  Namespace,
  PrimitiveType,
  SourceInfo,
  TypeRef,
  TypeRefKind,
} from "./model/types.js";
export { compileFile, compileSource } from "./compile.js";
export type { CompileOptions } from "./compile.js";
export { CompilationContext, loadSchemaFiles, nodeFileSystem } from "./loader.js";
export type { LoadOptions, SchemaFileSystem } from "./loader.js";
export {
  SchemaError,
  SchemaSyntaxError,
  UnresolvedReferenceError,
  DuplicateDefinitionError,
  DuplicateEnumValueError,
  CircularImportError,
  CircularInheritanceError,
  MissingImportError,
  InvalidDefaultError,
  InvalidTypeError,
  PipelineError,
  CompilationError,
  toDiagnostic,
} from "./errors.js";
export type { SchemaDiagnostic, SchemaErrorCode, SourceLocation } from "./errors.js";
export type { Logger } from "./logger.js";
