import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { AddFileLevelNamespace } from "../src/transforms/add-file-level-namespace.js";
import { CanonicalizeColons } from "../src/transforms/canonicalize-colons.js";
import { QfnReference } from "../src/transforms/qfn-reference.js";
import { runEarlyPipelineMulti } from "../src/pipeline.js";
import { PipelineError } from "../src/errors.js";
import type { EarlyModel } from "../src/early/types.js";
import { early, fieldType, messageNamed, namespaceNamed, pipeline, resolvedRef } from "./_schema.js";

function resolved(text: string): EarlyModel {
  return pipeline(text, [new AddFileLevelNamespace(), new CanonicalizeColons(), new QfnReference()]);
}

function resolvedFiles(files: Record<string, string>): Map<string, EarlyModel> {
  const models = new Map(Object.entries(files).map(([file, text]) => [file, early(text, file)]));
  runEarlyPipelineMulti(models);
  return models;
}

describe("QfnReference — namespaces", () => {
  test("the file must be wrapped in its file-level namespace first", () => {
    assert.throws(
      () => new QfnReference().transform(early("message A {}")),
      (err: unknown) => err instanceof PipelineError && err.line === 1,
    );
  });

  test("every namespace gets its fully qualified name", () => {
    const model = resolved("namespace N { namespace Inner { message Z {} } }");
    assert.equal(namespaceNamed(model, "file").qfn, "file");
    assert.equal(namespaceNamed(model, "N").qfn, "file::N");
    assert.equal(namespaceNamed(model, "Inner").qfn, "file::N::Inner");
  });
});

describe("QfnReference — lookup", () => {
  test("the innermost enclosing declaration wins", () => {
    const model = resolved(`namespace N {
  message A {}
  message B : A {}
}
message A {}
message C : A {}`);
    const n = namespaceNamed(model, "N");
    assert.equal(messageNamed(n, "B").parentRaw, "file::N::A");
    assert.equal(messageNamed(namespaceNamed(model, "file"), "C").parentRaw, "file::A");
  });

  test("lookup walks outward through enclosing namespaces", () => {
    const model = resolved(`message Top {}
namespace N { namespace M { message X { t: Top } } }`);
    assert.deepEqual(fieldType(messageNamed(namespaceNamed(model, "M"), "X"), "t"), resolvedRef("file::Top"));
  });

  test("members of sibling namespaces are not visible unqualified", () => {
    const model = resolved(`namespace P { message Hidden {} }
namespace Q { message U { h: Hidden } }`);
    assert.deepEqual(fieldType(messageNamed(namespaceNamed(model, "Q"), "U"), "h"), { kind: "ref", name: "Hidden" });
  });

  test("qualified names resolve relative to an enclosing namespace", () => {
    const model = resolved(`namespace N {
  namespace Inner { message Z {} }
  message Y { z: Inner::Z; w: N.Inner.Z; abs: file::N::Inner::Z }
}
namespace P { message Hidden {} }
message S { h: P::Hidden }`);
    const y = messageNamed(namespaceNamed(model, "N"), "Y");
    assert.deepEqual(fieldType(y, "z"), resolvedRef("file::N::Inner::Z"));
    assert.deepEqual(fieldType(y, "w"), resolvedRef("file::N::Inner::Z"));
    assert.deepEqual(fieldType(y, "abs"), resolvedRef("file::N::Inner::Z"));
    assert.deepEqual(fieldType(messageNamed(namespaceNamed(model, "file"), "S"), "h"), resolvedRef("file::P::Hidden"));
  });

  test("array elements and map keys and values are resolved", () => {
    const model = resolved(`message M { f: int[] }
enum K { A }
message N { items: M[]; byKey: Map<K, M> }`);
    const n = messageNamed(namespaceNamed(model, "file"), "N");
    assert.deepEqual(fieldType(n, "items"), {
      kind: "array",
      element: resolvedRef("file::M"),
    });
    assert.deepEqual(fieldType(n, "byKey"), {
      kind: "map",
      key: resolvedRef("file::K"),
      value: resolvedRef("file::M"),
    });
  });

  test("enum parents and compound bases are resolved", () => {
    const model = resolved(`enum Base { A }
enum Child : Base { B }
message M { p: Real { x } }
message Real {}`);
    const ns = namespaceNamed(model, "file");
    assert.equal(ns.enums[1].parentRaw, "file::Base");
    assert.deepEqual(fieldType(messageNamed(ns, "M"), "p"), {
      kind: "compound",
      base: resolvedRef("file::Real"),
      components: ["x"],
    });
  });

  test("inline enums can be referenced by their promoted name", () => {
    const model = resolved("message M { k: enum { A }; other: M_k }");
    assert.deepEqual(fieldType(messageNamed(namespaceNamed(model, "file"), "M"), "other"), resolvedRef("file::M_k"));
  });

  test("names that match nothing are left as written", () => {
    const model = resolved("message M { a: Missing; b: some::Where }");
    const m = messageNamed(namespaceNamed(model, "file"), "M");
    assert.deepEqual(fieldType(m, "a"), { kind: "ref", name: "Missing" });
    assert.deepEqual(fieldType(m, "b"), { kind: "ref", name: "some::Where" });
  });

  test("only resolved parents are marked", () => {
    const model = resolved(`message A {}
message B : A {}
message C : Nowhere {}`);
    const ns = namespaceNamed(model, "file");
    assert.equal(messageNamed(ns, "B").parentResolved, true);
    assert.equal(messageNamed(ns, "C").parentRaw, "Nowhere");
    assert.equal(messageNamed(ns, "C").parentResolved, undefined);
  });

  test("running twice gives the same model", () => {
    const model = resolved(`namespace N { message A {} message B : A { items: A[] } }
message C { n: N::B }`);
    const once = JSON.stringify(model.arena);
    new QfnReference().transform(model);
    assert.equal(JSON.stringify(model.arena), once);
  });
});

describe("QfnReference — imports", () => {
  test("aliased imports are reached through the alias only", () => {
    const models = resolvedFiles({
      "/s/a.def": `import "x.def" as L
message Use { a: L::AA; b: AA; c: L::sub::BB }`,
      "/s/x.def": `message AA {}
namespace sub { message BB {} }`,
    });
    const a = models.get("/s/a.def");
    assert.ok(a);
    const use = messageNamed(namespaceNamed(a, "a"), "Use");
    assert.deepEqual(fieldType(use, "a"), resolvedRef("x::AA"));
    assert.deepEqual(fieldType(use, "b"), { kind: "ref", name: "AA" });
    assert.deepEqual(fieldType(use, "c"), resolvedRef("x::sub::BB"));
  });

  test("unaliased imports expose their top-level names and qualified names", () => {
    const models = resolvedFiles({
      "/s/a.def": `import "x.def"
message Use { a: AA; b: x::AA; c: sub::BB; d: x.sub.BB }`,
      "/s/x.def": `message AA {}
namespace sub { message BB {} }`,
    });
    const a = models.get("/s/a.def");
    assert.ok(a);
    const use = messageNamed(namespaceNamed(a, "a"), "Use");
    assert.deepEqual(fieldType(use, "a"), resolvedRef("x::AA"));
    assert.deepEqual(fieldType(use, "b"), resolvedRef("x::AA"));
    assert.deepEqual(fieldType(use, "c"), resolvedRef("x::sub::BB"));
    assert.deepEqual(fieldType(use, "d"), resolvedRef("x::sub::BB"));
  });

  test("references resolved through an alias survive a second run", () => {
    const models = resolvedFiles({
      "/s/a.def": `import "x.def" as L
message Use { a: L::AA; b: x::AA }`,
      "/s/x.def": "message AA {}",
    });
    const a = models.get("/s/a.def");
    assert.ok(a);
    new QfnReference().transform(a);
    const use = messageNamed(namespaceNamed(a, "a"), "Use");
    assert.deepEqual(fieldType(use, "a"), resolvedRef("x::AA"));
    assert.deepEqual(fieldType(use, "b"), { kind: "ref", name: "x::AA" });
  });

  test("local declarations shadow imported ones", () => {
    const models = resolvedFiles({
      "/s/a.def": `import "x.def"
message AA {}
message Use { a: AA }`,
      "/s/x.def": "message AA {}",
    });
    const a = models.get("/s/a.def");
    assert.ok(a);
    assert.deepEqual(fieldType(messageNamed(namespaceNamed(a, "a"), "Use"), "a"), resolvedRef("a::AA"));
  });
});
