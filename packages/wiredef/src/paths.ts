import { dirname, extname, resolve } from "node:path";

export const DEFAULT_EXTENSION = ".def";

/**
 * Absolute path of an import, relative to the importing file's directory.
 * Paths written without an extension get `extension` appended.
 */
export function resolveImportPath(fromFile: string, importPath: string, extension = DEFAULT_EXTENSION): string {
  const withExtension = extname(importPath) === "" ? `${importPath}${extension}` : importPath;
  return resolve(dirname(fromFile), withExtension);
}
