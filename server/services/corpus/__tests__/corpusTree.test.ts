import { describe, test } from "node:test";
import assert from "node:assert/strict";

import { TreeIntegrityError } from "../../../errors";
import {
  isEmptyTranslation,
  locationKey,
  locationOrder,
  parseLocationKey,
  resolveField,
  validateTree,
  walkUnits,
} from "../corpusTree";
import { book, chapter, collection, section, text, vaggaTree } from "./corpusFixtures";

describe("location keys", () => {
  test("omits absent levels", () => {
    assert.equal(
      locationKey({
        collectionId: "dn",
        bookId: null,
        chapterId: null,
        sectionNumber: null,
        field: "title",
      }),
      "dn#title",
    );
    assert.equal(
      locationKey({
        collectionId: "dn",
        bookId: "sila",
        chapterId: "dn1",
        sectionNumber: 5,
        field: "body",
      }),
      "dn/sila/dn1/5#body",
    );
  });

  test("parses what it formats", () => {
    assert.deepEqual(parseLocationKey("dn/sila/dn1#footer"), {
      collectionId: "dn",
      bookId: "sila",
      chapterId: "dn1",
      sectionNumber: null,
      field: "footer",
    });
  });

  test("rejects fields that the node kind does not have", () => {
    assert.equal(parseLocationKey("dn#footer"), null);
    assert.equal(parseLocationKey("dn/sila/dn1/5#footer"), null);
    assert.equal(parseLocationKey("dn/sila/dn1/x#body"), null);
    assert.equal(parseLocationKey("dn//dn1#title"), null);
    assert.equal(parseLocationKey("no-field"), null);
  });
});

describe("isEmptyTranslation", () => {
  test("treats placeholders as empty", () => {
    for (const value of ["", "   ", "N/A", "-", " - ", null, undefined]) {
      assert.equal(isEmptyTranslation(value), true, String(value));
    }
    assert.equal(isEmptyTranslation("Thus"), false);
  });
});

describe("walkUnits", () => {
  test("visits fields depth-first in document order", () => {
    const keys = Array.from(walkUnits(vaggaTree()), (occurrence) => occurrence.key);
    assert.deepEqual(keys, [
      "dn#title",
      "dn/sila#title",
      "dn/sila/chapterA#title",
      "dn/sila/chapterA/1#body",
      "dn/sila/chapterA/2#body",
      "dn/sila/chapterA/3#body",
      "dn/sila/chapterB#title",
      "dn/sila/chapterB/1#body",
      "dn/sila/chapterB/2#body",
      "dn/sila/chapterB/3#body",
    ]);
  });

  test("sorts children by declared number and places footers after their content", () => {
    const tree = collection("dn", [
      book(
        "b2",
        2,
        [
          chapter("c2", 2, [section(2, text("two")), section(1, text("one"))], {
            footer: text("c2 footer"),
          }),
          chapter("c1", 1, [section(1, text("first"), { vagga: text("Vaggo") })]),
        ],
        { footer: text("b2 footer") },
      ),
      book("b1", 1, []),
    ]);

    const keys = Array.from(walkUnits(tree), (occurrence) => occurrence.key);
    assert.deepEqual(keys, [
      "dn#title",
      "dn/b1#title",
      "dn/b2#title",
      "dn/b2/c1#title",
      "dn/b2/c1/1#body",
      "dn/b2/c1/1#vagga",
      "dn/b2/c2#title",
      "dn/b2/c2/1#body",
      "dn/b2/c2/2#body",
      "dn/b2/c2#footer",
      "dn/b2#footer",
    ]);
  });

  test("skips fields without Pali text", () => {
    const tree = collection("dn", [
      book("b", 1, [chapter("c", 1, [section(1, text("body"), { title: text("  ") })])]),
    ]);
    const keys = Array.from(walkUnits(tree), (occurrence) => occurrence.key);
    assert.equal(keys.includes("dn/b/c/1#title"), false);
  });

  test("locationOrder numbers every key", () => {
    const order = locationOrder(vaggaTree());
    assert.equal(order.get("dn#title"), 0);
    assert.equal(order.get("dn/sila/chapterB/3#body"), 9);
  });
});

describe("resolveField", () => {
  test("returns the live text and its owning chapter", () => {
    const tree = vaggaTree();
    const resolved = resolveField(tree, "dn/sila/chapterB/2#body");
    assert.ok(resolved);
    assert.equal(resolved.text.english, "Fourth Chapter");
    assert.equal(resolved.chapterId, "chapterB");

    resolved.text.english = "changed";
    assert.equal(tree.books[0].chapters[1].sections[1].body.english, "changed");
  });

  test("manifest-level fields have no chapter", () => {
    assert.equal(resolveField(vaggaTree(), "dn/sila#title")?.chapterId, null);
  });

  test("returns null for missing nodes and absent optional fields", () => {
    const tree = vaggaTree();
    assert.equal(resolveField(tree, "dn/sila/chapterA/9#body"), null);
    assert.equal(resolveField(tree, "dn/sila/chapterA/1#title"), null);
    assert.equal(resolveField(tree, "mn#title"), null);
  });
});

describe("validateTree", () => {
  test("accepts the fixture", () => {
    assert.doesNotThrow(() => validateTree(vaggaTree()));
  });

  test("rejects duplicate section numbers", () => {
    const tree = collection("dn", [
      book("b", 1, [chapter("c", 1, [section(1, text("a")), section(1, text("b"))])]),
    ]);
    assert.throws(() => validateTree(tree), TreeIntegrityError);
  });

  test("rejects chapter ids reused across books", () => {
    const tree = collection("dn", [
      book("b1", 1, [chapter("c", 1, [])]),
      book("b2", 2, [chapter("c", 1, [])]),
    ]);
    assert.throws(() => validateTree(tree), /Duplicate chapter id: c/);
  });

  test("rejects non-positive numbers and ids that break location keys", () => {
    assert.throws(
      () => validateTree(collection("dn", [book("b", 0, [])])),
      TreeIntegrityError,
    );
    assert.throws(
      () => validateTree(collection("dn", [book("a/b", 1, [])])),
      TreeIntegrityError,
    );
  });
});
