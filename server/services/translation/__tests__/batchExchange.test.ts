import { describe, test } from "node:test";
import assert from "node:assert/strict";

import type { ExchangeRecord, TargetLanguage } from "@pali-corpus/corpus-types";

import { PipelineError } from "../../../errors";
import { vaggaTree } from "../../corpus/__tests__/corpusFixtures";
import {
  applyExchangeRecords,
  exchangeFileName,
  exportBatches,
  parseExchangeFile,
} from "../batchExchange";
import { extract } from "../extractor";

const record = (
  sourceText: string,
  targetFields: Partial<Record<TargetLanguage, string>>,
): ExchangeRecord => ({ sourceText, targetFields, usageCount: 1, sampleContext: "" });

describe("exportBatches", () => {
  test("writes one file per batch with empty slots for missing languages", () => {
    const units = extract(vaggaTree());
    const files = exportBatches(units, 1);

    assert.equal(files.length, 2);
    assert.equal(files[0].fingerprint, files[1].fingerprint);
    assert.deepEqual(
      files.map((file) => [file.batchIndex, file.batchCount]),
      [
        [0, 2],
        [1, 2],
      ],
    );
    assert.deepEqual(files[0].records, [
      {
        sourceText: "Dutiyavaggo",
        targetFields: { english: "", sinhala: "" },
        usageCount: 3,
        sampleContext: "dn/sila/chapterA/2#body",
      },
    ]);
    assert.equal(exchangeFileName(files[0]), "batch_001_of_002.json");
  });
});

describe("parseExchangeFile", () => {
  test("accepts a bare record array", () => {
    const parsed = parseExchangeFile([{ sourceText: "Tatiyavaggo", targetFields: { english: "Third Chapter" } }]);
    assert.deepEqual(parsed, {
      fingerprint: "",
      batchIndex: 0,
      batchCount: 1,
      records: [
        {
          sourceText: "Tatiyavaggo",
          targetFields: { english: "Third Chapter" },
          usageCount: 1,
          sampleContext: "",
        },
      ],
    });
  });

  test("names the offending field", () => {
    assert.throws(
      () => parseExchangeFile({ records: [{ sourceText: "", targetFields: {} }] }, "batch_001.json"),
      (error: unknown) => {
        assert.ok(error instanceof PipelineError);
        assert.equal(error.code, "exchange_invalid");
        assert.match(error.message, /^Invalid batch_001\.json: records\.0\.sourceText: /);
        return true;
      },
    );
  });
});

describe("applyExchangeRecords", () => {
  test("sanitizes, merges and reports each filled slot", () => {
    const tree = vaggaTree();
    const result = applyExchangeRecords(tree, [
      record(" Tatiyavaggo ", { english: "Third Chapter", sinhala: "" }),
      record("Dutiyavaggo", { english: "Another" }),
      record("Dutiyavaggo", { sinhala: "Thus" }),
      record("Unknown text", { english: "x" }),
      record("Catutthavaggo", { english: "Fourth Chapter" }),
    ]);

    assert.deepEqual(result.outcomes, [
      {
        sourceText: "Tatiyavaggo",
        language: "english",
        status: "merged",
        locations: ["dn/sila/chapterA/3#body"],
      },
      {
        sourceText: "Dutiyavaggo",
        language: "english",
        status: "conflict",
        message: "Refusing to overwrite existing english text at dn/sila/chapterA/2#body.",
        locations: ["dn/sila/chapterA/2#body"],
      },
      {
        sourceText: "Dutiyavaggo",
        language: "sinhala",
        status: "flagged",
        message: "Only 0% of letters are in the sinhala script.",
      },
      { sourceText: "Unknown text", language: "english", status: "unknown_source" },
      {
        sourceText: "Catutthavaggo",
        language: "english",
        status: "unchanged",
        locations: ["dn/sila/chapterB/2#body"],
      },
    ]);
    assert.deepEqual(result.changes, { chapterIds: new Set(["chapterA"]), manifest: false });
    assert.equal(tree.books[0].chapters[0].sections[2].body.english, "Third Chapter");
    assert.equal(tree.books[0].chapters[1].sections[0].body.english, "");
  });

  test("force overwrites conflicting values", () => {
    const tree = vaggaTree();
    const result = applyExchangeRecords(tree, [record("Dutiyavaggo", { english: "Another" })], {
      force: true,
    });
    assert.equal(result.outcomes[0].status, "merged");
    assert.deepEqual(result.changes.chapterIds, new Set(["chapterA", "chapterB"]));
    assert.equal(tree.books[0].chapters[0].sections[1].body.english, "Another");
  });

  test("applying the same file twice changes nothing the second time", () => {
    const tree = vaggaTree();
    const records = [record("Tatiyavaggo", { english: "Third Chapter" })];
    applyExchangeRecords(tree, records);
    const again = applyExchangeRecords(tree, records);
    assert.equal(again.outcomes[0].status, "unchanged");
    assert.deepEqual(again.changes, { chapterIds: new Set(), manifest: false });
  });
});
