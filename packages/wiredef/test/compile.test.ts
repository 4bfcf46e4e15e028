/**
 * End-to-end: files read through an in-memory file system, imports,
 * aliases and the errors only a multi-file compilation can produce.
 */
import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { compileFile, compileSource } from "../src/compile.js";
import {
  CircularImportError,
  CompilationError,
  DuplicateDefinitionError,
  MissingImportError,
  SchemaSyntaxError,
  UnresolvedReferenceError,
  type SchemaError,
} from "../src/errors.js";
import { memoryFs, must } from "./_schema.js";

function failure(run: () => unknown): readonly SchemaError[] {
  try {
    run();
  } catch (err) {
    assert.ok(err instanceof CompilationError, `expected CompilationError, got ${String(err)}`);
    return err.errors;
  }
  assert.fail("compilation succeeded");
}

describe("compileFile — imports", () => {
  const files = {
    "/proj/main.def": `import "shapes.def" as S
import "common"
message Scene {
  shape: S::Shape
  id: Id
}`,
    "/proj/shapes.def": `import "common.def"
message Shape { id: Id }`,
    "/proj/common.def": "message Id { value: int }",
  };

  test("references into aliased and unaliased imports resolve", () => {
    const model = compileFile("/proj/main.def", { fs: memoryFs(files) });
    const [shape, id] = must(model.message("main::Scene"), "Scene").fields;
    assert.deepEqual(shape.typeRef, { kind: "message", qfn: "shapes::Shape" });
    assert.deepEqual(id.typeRef, { kind: "message", qfn: "common::Id" });

    const resolved = model.resolve(must(shape.typeRef, "typeRef"));
    assert.equal(resolved?.kind, "message");
    assert.equal(resolved?.file, "/proj/shapes.def");
    assert.deepEqual(model.message("shapes::Shape")?.fields[0].typeRef, { kind: "message", qfn: "common::Id" });
  });

  test("a file imported twice is read and built once", () => {
    const fs = memoryFs(files);
    const model = compileFile("/proj/main.def", { fs });
    assert.deepEqual(fs.reads, ["/proj/main.def", "/proj/shapes.def", "/proj/common.def"]);
    assert.deepEqual([...model.imports.keys()], ["S", "common"]);
    const shapes = must(model.imports.get("S"), "S");
    assert.equal(shapes.imports.get("common.def"), model.imports.get("common"));
    assert.equal(model.reachable().length, 3);
  });

  test("lookup reaches through imports of imports", () => {
    const model = compileFile("/proj/main.def", { fs: memoryFs(files) });
    assert.equal(model.own("common::Id"), undefined);
    assert.equal(model.lookup("common::Id")?.name, "Id");
    assert.deepEqual(
      model.entities().map((e) => e.qfn),
      ["main::Scene"],
    );
  });

  test("a custom extension applies to bare import paths", () => {
    const fs = memoryFs({
      "/proj/a.schema": `import "b"\nmessage A { b: B }`,
      "/proj/b.schema": "message B {}",
    });
    const model = compileFile("/proj/a.schema", { fs, extension: ".schema" });
    assert.equal(model.fileNamespace, "a");
    assert.deepEqual(must(model.message("a::A"), "A").fields[0].typeRef, { kind: "message", qfn: "b::B" });
  });
});

describe("compileFile — errors", () => {
  test("a missing import names the file and line of the import", () => {
    const errors = failure(() =>
      compileFile("/proj/main.def", {
        fs: memoryFs({ "/proj/main.def": `message A {}\nimport "nope.def"` }),
      }),
    );
    assert.equal(errors.length, 1);
    const [err] = errors;
    assert.ok(err instanceof MissingImportError);
    assert.equal(err.importPath, "nope.def");
    assert.equal(err.file, "/proj/main.def");
    assert.equal(err.line, 2);
    assert.equal(err.message, 'Imported file "nope.def" not found (looked for /proj/nope.def)');
  });

  test("circular imports", () => {
    const errors = failure(() =>
      compileFile("/proj/a.def", {
        fs: memoryFs({
          "/proj/a.def": `import "b.def"`,
          "/proj/b.def": `import "a.def"`,
        }),
      }),
    );
    const [err] = errors;
    assert.ok(err instanceof CircularImportError);
    assert.deepEqual(err.cycle, ["/proj/a.def", "/proj/b.def", "/proj/a.def"]);
  });

  test("a syntax error in an imported file is located in that file", () => {
    const errors = failure(() =>
      compileFile("/proj/a.def", {
        fs: memoryFs({
          "/proj/a.def": `import "b.def"`,
          "/proj/b.def": "message B {\n  x: \n}",
        }),
      }),
    );
    const [err] = errors;
    assert.ok(err instanceof SchemaSyntaxError);
    assert.equal(err.file, "/proj/b.def");
    assert.equal(err.line, 3);
  });

  test("an error in an imported file is reported once", () => {
    const errors = failure(() =>
      compileFile("/proj/a.def", {
        fs: memoryFs({
          "/proj/a.def": `import "b.def"\nimport "c.def"`,
          "/proj/b.def": "message B { x: Nope }",
          "/proj/c.def": `import "b.def"`,
        }),
      }),
    );
    assert.equal(errors.length, 1);
    assert.ok(errors[0] instanceof UnresolvedReferenceError);
    assert.equal(errors[0].file, "/proj/b.def");
  });

  test("two imported files with the same stem collide", () => {
    const errors = failure(() =>
      compileFile("/proj/main.def", {
        fs: memoryFs({
          "/proj/main.def": `import "common.def"\nimport "sub/common.def"\nmessage A {}`,
          "/proj/common.def": "message X {}",
          "/proj/sub/common.def": "message Y {}",
        }),
      }),
    );
    assert.equal(errors.length, 1);
    const [err] = errors;
    assert.ok(err instanceof DuplicateDefinitionError);
    assert.equal(err.message, 'Namespace "common" is declared in both /proj/common.def and /proj/sub/common.def');
    assert.equal(err.file, "/proj/main.def");
    assert.equal(err.line, 2);
  });
});

describe("compileFile — visibility", () => {
  test("an aliased import is reached through its alias only", () => {
    const errors = failure(() =>
      compileFile("/proj/y.def", {
        fs: memoryFs({
          "/proj/y.def": `import "x.def" as L\nmessage U {\n  ok: L::AA\n  a: x::AA\n}`,
          "/proj/x.def": "message AA {}",
        }),
      }),
    );
    assert.equal(errors.length, 1);
    const [err] = errors;
    assert.ok(err instanceof UnresolvedReferenceError);
    assert.equal(err.reference, "x::AA");
    assert.equal(err.line, 4);
    assert.equal(err.message, 'Unresolved reference "x::AA" in field y::U.a');
  });

  test("declarations of an import's imports are not visible", () => {
    const errors = failure(() =>
      compileFile("/proj/a.def", {
        fs: memoryFs({
          "/proj/a.def": `import "b.def"\nmessage A { c: c::CC }`,
          "/proj/b.def": `import "c.def"\nmessage B { c: c::CC }`,
          "/proj/c.def": "message CC {}",
        }),
      }),
    );
    assert.equal(errors.length, 1);
    const [err] = errors;
    assert.ok(err instanceof UnresolvedReferenceError);
    assert.equal(err.file, "/proj/a.def");
    assert.equal(err.line, 2);
    assert.equal(err.message, 'Unresolved reference "c::CC" in field a::A.c');
  });

  test("a parent reached only through an import's import is unresolved", () => {
    const errors = failure(() =>
      compileFile("/proj/a.def", {
        fs: memoryFs({
          "/proj/a.def": `import "b.def"\nmessage A : c::CC {}`,
          "/proj/b.def": `import "c.def"`,
          "/proj/c.def": "message CC {}",
        }),
      }),
    );
    assert.equal(errors.length, 1);
    assert.ok(errors[0] instanceof UnresolvedReferenceError);
    assert.equal(errors[0].message, 'Unresolved reference "c::CC" in parent of message a::A');
  });

  test("two imports may not share an alias", () => {
    const errors = failure(() =>
      compileFile("/proj/m.def", {
        fs: memoryFs({
          "/proj/m.def": `import "x.def" as L\nimport "z.def" as L\nmessage M {}`,
          "/proj/x.def": "message X {}",
          "/proj/z.def": "message Z {}",
        }),
      }),
    );
    assert.equal(errors.length, 1);
    const [err] = errors;
    assert.ok(err instanceof DuplicateDefinitionError);
    assert.equal(err.file, "/proj/m.def");
    assert.equal(err.line, 2);
    assert.equal(err.message, 'Import alias "L" is already used by the import at line 1');
  });
});

describe("compileSource", () => {
  test("compiles text under the given file name", () => {
    const model = compileSource("message A { x: int }", { file: "/proj/inline.def", fs: memoryFs({}) });
    assert.equal(model.file, "/proj/inline.def");
    assert.equal(model.fileNamespace, "inline");
    assert.equal(model.message("inline::A")?.fields[0].name, "x");
  });

  test("imports are read relative to the given file", () => {
    const model = compileSource(`import "lib.def"\nmessage A { l: L }`, {
      file: "/proj/inline.def",
      fs: memoryFs({ "/proj/lib.def": "message L {}" }),
    });
    assert.deepEqual(must(model.message("inline::A"), "A").fields[0].typeRef, { kind: "message", qfn: "lib::L" });
  });

  test("syntax errors are wrapped in a CompilationError", () => {
    const errors = failure(() => compileSource("message {", { file: "/proj/bad.def", fs: memoryFs({}) }));
    assert.ok(errors[0] instanceof SchemaSyntaxError);
    assert.equal(errors[0].file, "/proj/bad.def");
  });
});
