/**
 * Compile errors.
 *
 * Every failure the compiler reports is a `SchemaError` carrying a stable
 * `code` plus the file and 1-based line it refers to. The model builder
 * accumulates them and throws a single `CompilationError` at the end.
 */

export type SchemaErrorCode =
  | "syntax"
  | "unresolved-reference"
  | "duplicate-definition"
  | "duplicate-enum-value"
  | "circular-import"
  | "circular-inheritance"
  | "missing-import"
  | "invalid-default"
  | "invalid-type"
  | "pipeline";

export type SourceLocation = {
  file: string;
  line: number;
  /** 1-based; 0 when unknown */
  column?: number;
};

export abstract class SchemaError extends Error {
  abstract readonly code: SchemaErrorCode;
  readonly file: string;
  readonly line: number;
  readonly column: number;

  constructor(message: string, location: SourceLocation) {
    super(message);
    this.name = new.target.name;
    this.file = location.file;
    this.line = location.line;
    this.column = location.column ?? 0;
  }

  /** `file:line: message` */
  format(): string {
    return `${this.file}:${this.line}: ${this.message}`;
  }
}

export class SchemaSyntaxError extends SchemaError {
  readonly code = "syntax";
  /** Offending token text, when the parser got that far */
  readonly token: string | undefined;

  constructor(message: string, location: SourceLocation, token?: string) {
    super(message, location);
    this.token = token;
  }
}

export class UnresolvedReferenceError extends SchemaError {
  readonly code = "unresolved-reference";
  readonly reference: string;

  constructor(reference: string, context: string, location: SourceLocation) {
    super(`Unresolved reference "${reference}" in ${context}`, location);
    this.reference = reference;
  }
}

export class DuplicateDefinitionError extends SchemaError {
  readonly code = "duplicate-definition";
}

export class DuplicateEnumValueError extends SchemaError {
  readonly code = "duplicate-enum-value";
}

export class CircularImportError extends SchemaError {
  readonly code = "circular-import";
  /** Files on the cycle, first file repeated at the end */
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[], location: SourceLocation) {
    super(`Circular import: ${cycle.join(" -> ")}`, location);
    this.cycle = cycle;
  }
}

export class CircularInheritanceError extends SchemaError {
  readonly code = "circular-inheritance";
  /** QFNs on the cycle, first entity repeated at the end */
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[], location: SourceLocation) {
    super(`Circular inheritance: ${cycle.join(" -> ")}`, location);
    this.cycle = cycle;
  }
}

export class MissingImportError extends SchemaError {
  readonly code = "missing-import";
  readonly importPath: string;

  constructor(importPath: string, resolved: string, location: SourceLocation) {
    super(`Imported file "${importPath}" not found (looked for ${resolved})`, location);
    this.importPath = importPath;
  }
}

export class InvalidDefaultError extends SchemaError {
  readonly code = "invalid-default";
}

export class InvalidTypeError extends SchemaError {
  readonly code = "invalid-type";
}

/** A pass ran against input it does not accept (e.g. out-of-order transforms). */
export class PipelineError extends SchemaError {
  readonly code = "pipeline";
}

/** Aggregate of every error found while compiling one root file. */
export class CompilationError extends Error {
  readonly errors: readonly SchemaError[];

  constructor(errors: readonly SchemaError[]) {
    const head = errors.length === 1 ? "1 error" : `${errors.length} errors`;
    super(`Compilation failed with ${head}:\n${errors.map((e) => `  ${e.format()}`).join("\n")}`);
    this.name = "CompilationError";
    this.errors = errors;
  }
}

// ── Diagnostics ───────────────────────────────────────────────────────────

/** LSP-shaped diagnostic; lines and characters are 0-based. */
export type SchemaDiagnostic = {
  message: string;
  severity: "error" | "warning";
  code: SchemaErrorCode;
  file: string;
  range: {
    start: { line: number; character: number };
    end: { line: number; character: number };
  };
};

export function toDiagnostic(error: SchemaError): SchemaDiagnostic {
  const line = Math.max(error.line - 1, 0);
  const character = Math.max(error.column - 1, 0);
  const width = error instanceof SchemaSyntaxError && error.token ? error.token.length : 0;
  return {
    message: error.message,
    severity: "error",
    code: error.code,
    file: error.file,
    range: {
      start: { line, character },
      end: { line, character: width > 0 ? character + width : 999 },
    },
  };
}
