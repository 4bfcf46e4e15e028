/**
 * Parser tests: every construct of the schema language parses, and
 * malformed input fails with a located SchemaSyntaxError.
 */
import { describe, it, test } from "node:test";
import assert from "node:assert/strict";
import { parseSchema } from "../src/parser/parser.js";
import { SchemaSyntaxError } from "../src/errors.js";
import { sub, subs } from "../src/parser/cst.js";

function accepts(label: string, text: string) {
  it(label, () => {
    const tree = parseSchema(text);
    assert.equal(tree.cst.name, "schemaFile");
  });
}

describe("parser — syntax coverage", () => {
  accepts("empty file", "");
  accepts("empty message", "message Empty {}");
  accepts(
    "imports with and without alias",
    `import "base.def" as Base
import "common";
message A {}`,
  );
  accepts(
    "nested namespaces",
    `namespace outer {
  namespace inner {
    message M { id: int }
  }
}`,
  );
  accepts(
    "message with parent and every field shape",
    `message Base {}
message Shape : geo.Base {
  id: int
  optional label: string = "none";
  tags: string[]
  byName: Map<string, Shape>
  grid: Map<int, float[]>
  pos: float { x, y, z }
  color: enum { Red, Green = 4, Blue }
  state: open_enum { Idle }
  flags: options { A, B }
  many: enum { P, Q }[]
  ref: geo::Point
}`,
  );
  accepts(
    "enums, open enums, options and compounds",
    `enum Color : Base { Red = 1, Green; Blue }
open_enum Status { Ok = 0 Fail = -1 }
options Perm { Read, Write, Exec }
float Vec3 { x, y, z }`,
  );
  accepts(
    "keywords used as names",
    `message options {
  enum: int
  map: string
  namespace: bool
}`,
  );
  accepts(
    "default expressions",
    `message D {
  a: int = -3
  b: Color = Color::Red
  c: Perm = Read | Write
  d: int[] = [1, 2, 3]
  e: float { x, y } = { 1.5, 2 }
}`,
  );
});

describe("parser — tree shape", () => {
  test("items and imports are kept in source order", () => {
    const tree = parseSchema(`import "a.def"
message A {}
enum B { X }`);
    assert.equal(subs(tree.cst, "importDecl").length, 1);
    const items = subs(tree.cst, "item");
    assert.equal(items.length, 2);
    assert.ok(sub(items[0], "messageDecl"));
    assert.ok(sub(items[1], "enumDecl"));
  });

  test("comments are collected apart from the significant tokens", () => {
    const tree = parseSchema(`// one
message A { /* two */ }
/// three`);
    assert.deepEqual(
      tree.comments.map((c) => c.image),
      ["// one", "/* two */", "/// three"],
    );
    assert.deepEqual(
      tree.tokens.map((t) => t.image),
      ["message", "A", "{", "}"],
    );
  });

  test("a default expression ends with its line", () => {
    const tree = parseSchema(`message M {
  a: int = 1
  b: int
}`);
    const message = sub(must(subs(tree.cst, "item")[0]), "messageDecl");
    assert.equal(subs(must(message), "fieldDecl").length, 2);
  });
});

describe("parser — errors", () => {
  test("unknown character fails with its position", () => {
    assert.throws(
      () => parseSchema("message A {\n  a: int @\n}", "/s/bad.def"),
      (err: unknown) =>
        err instanceof SchemaSyntaxError &&
        err.message === 'Unexpected character "@"' &&
        err.file === "/s/bad.def" &&
        err.line === 2 &&
        err.column === 10 &&
        err.code === "syntax",
    );
  });

  test("nested array brackets are rejected at the second bracket", () => {
    assert.throws(
      () => parseSchema("message A {\n  a: int[][]\n}"),
      (err: unknown) => err instanceof SchemaSyntaxError && err.line === 2 && err.column === 11 && err.token === "[",
    );
  });

  test("missing closing brace reports the last line", () => {
    assert.throws(
      () => parseSchema("message A {\n  a: int\n"),
      (err: unknown) => err instanceof SchemaSyntaxError && err.line === 2,
    );
  });

  test("a field without a type is rejected", () => {
    assert.throws(() => parseSchema("message A { a: }"), SchemaSyntaxError);
  });

  test("a stray token at top level is rejected", () => {
    assert.throws(
      () => parseSchema("message A {}\n}"),
      (err: unknown) => err instanceof SchemaSyntaxError && err.line === 2 && err.token === "}",
    );
  });

  test("the file name defaults to <input>", () => {
    assert.throws(
      () => parseSchema("message {"),
      (err: unknown) => err instanceof SchemaSyntaxError && err.file === "<input>",
    );
  });
});

function must<T>(value: T | undefined): T {
  assert.ok(value !== undefined);
  return value;
}
