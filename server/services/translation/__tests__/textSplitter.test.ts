import { describe, test } from "node:test";
import assert from "node:assert/strict";

import { joinPieces, splitText } from "../textSplitter";

describe("splitText", () => {
  test("keeps short text whole", () => {
    assert.deepEqual(splitText("  Evaṃ me sutaṃ.  ", 100), ["Evaṃ me sutaṃ."]);
    assert.deepEqual(splitText("   ", 100), []);
  });

  test("splits at paragraph breaks and packs what fits", () => {
    assert.deepEqual(splitText("Para one.\n\nPara two.\n\nPara three.", 20), [
      "Para one.\n\nPara two.",
      "Para three.",
    ]);
  });

  test("falls back to sentence boundaries", () => {
    assert.deepEqual(splitText("One two. Three four. Five six.", 12), [
      "One two.",
      "Three four.",
      "Five six.",
    ]);
  });

  test("cuts at the last space, then anywhere", () => {
    assert.deepEqual(splitText("aaaa bbbb cccc", 10), ["aaaa bbbb", "cccc"]);
    assert.deepEqual(splitText("abcdefghijkl", 5), ["abcde", "fghij", "kl"]);
  });

  test("never returns a piece over the limit", () => {
    const text = Array.from({ length: 40 }, (_, index) => `Sentence number ${index} ends here.`).join(" ");
    for (const piece of splitText(text, 120)) {
      assert.ok(piece.length <= 120, piece);
    }
  });
});

describe("joinPieces", () => {
  test("joins trimmed pieces with a blank line", () => {
    assert.equal(joinPieces([" first ", "second\n"]), "first\n\nsecond");
  });
});
