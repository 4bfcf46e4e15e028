import { describe, test } from "node:test";
import assert from "node:assert/strict";
import {
  multiFileTransforms,
  runEarlyPipeline,
  runEarlyPipelineMulti,
  singleFileTransforms,
  type EarlyTransform,
} from "../src/pipeline.js";
import { CircularImportError, PipelineError, UnresolvedReferenceError } from "../src/errors.js";
import type { EarlyModel, RawType } from "../src/early/types.js";
import { allScopes } from "../src/early/walk.js";
import { early } from "./_schema.js";

function referencedNames(type: RawType): string[] {
  switch (type.kind) {
    case "ref":
      return [type.name];
    case "compound":
      return type.base.kind === "ref" ? [type.base.name] : [];
    case "array":
      return referencedNames(type.element);
    case "map":
      return [...referencedNames(type.key), ...referencedNames(type.value)];
    default:
      return [];
  }
}

function allReferences(model: EarlyModel): string[] {
  const names: string[] = [];
  for (const scope of allScopes(model)) {
    for (const m of scope.messages) {
      if (m.parentRaw !== undefined) names.push(m.parentRaw);
      for (const f of m.fields) names.push(...referencedNames(f.type));
    }
    for (const e of scope.enums) if (e.parentRaw !== undefined) names.push(e.parentRaw);
  }
  return names;
}

describe("pipeline — transform lists", () => {
  test("single-file passes run in order", () => {
    assert.deepEqual(
      singleFileTransforms().map((t) => t.name),
      ["add-file-level-namespace", "canonicalize-colons", "qfn-reference", "promote-inline-enums"],
    );
  });

  test("multi-file passes attach imports after wrapping", () => {
    assert.deepEqual(
      multiFileTransforms(new Map()).map((t) => t.name),
      [
        "add-file-level-namespace",
        "attach-imported-models",
        "canonicalize-colons",
        "qfn-reference",
        "promote-inline-enums",
      ],
    );
  });
});

describe("runEarlyPipeline", () => {
  test("every resolvable reference ends up fully qualified", () => {
    const model = runEarlyPipeline(
      early(`enum Base { A }
enum E : Base { B }
namespace n {
  message P {}
  message Q : P { p: P[]; m: Map<E, P>; inline: enum { X }; c: Pt { x } }
}
message Pt {}`),
    );
    const names = allReferences(model);
    assert.equal(names.length, 7);
    for (const name of names) assert.ok(name.includes("::"), `${name} is not qualified`);
    assert.ok(allScopes(model).every((s) => s.messages.every((m) => m.fields.every((f) => f.type.kind !== "enum"))));
  });

  test("a failing pass is reported as a PipelineError", () => {
    const failing: EarlyTransform = {
      name: "boom-pass",
      transform: () => {
        throw new Error("boom");
      },
    };
    assert.throws(
      () => runEarlyPipeline(early("message A {}"), [failing]),
      (err: unknown) =>
        err instanceof PipelineError &&
        err.code === "pipeline" &&
        err.message === "boom-pass failed: boom" &&
        err.file === "/schemas/file.def",
    );
  });

  test("schema errors from a pass pass through unchanged", () => {
    const failing: EarlyTransform = {
      name: "strict-pass",
      transform: (model) => {
        throw new UnresolvedReferenceError("X", "test", { file: model.file, line: 3 });
      },
    };
    assert.throws(() => runEarlyPipeline(early(""), [failing]), UnresolvedReferenceError);
  });
});

describe("runEarlyPipelineMulti", () => {
  test("returns the files in import order with imports attached", () => {
    const a = early(`import "b.def" as B\nmessage A { b: B::Bm }`, "/s/a.def");
    const b = early("message Bm {}", "/s/b.def");
    const sorted = runEarlyPipelineMulti(
      new Map([
        [a.file, a],
        [b.file, b],
      ]),
    );
    assert.deepEqual(sorted, [b, a]);
    assert.equal(a.imports.get("B"), b);
    assert.deepEqual(allReferences(a), ["b::Bm"]);
  });

  test("circular imports are rejected before any pass runs", () => {
    const a = early(`import "b.def"\nmessage A {}`, "/s/a.def");
    const b = early(`import "a.def"`, "/s/b.def");
    assert.throws(
      () =>
        runEarlyPipelineMulti(
          new Map([
            [a.file, a],
            [b.file, b],
          ]),
        ),
      CircularImportError,
    );
    assert.equal(a.arena.length, 0);
  });
});
