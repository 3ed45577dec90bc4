import { z } from "zod";

import type {
  CorpusTree,
  ExchangeFile,
  ExchangeRecord,
  TargetLanguage,
  TranslatableUnit,
  TranslationBatch,
} from "@pali-corpus/corpus-types";

import { OverwriteConflictError, PipelineError } from "../../errors";
import type { CorpusChanges } from "../corpus/corpusStore";
import { TARGET_LANGUAGES, isEmptyTranslation } from "../corpus/corpusTree";
import { chunk } from "./chunker";
import { collectUnits, snapshotFingerprint } from "./extractor";
import { DirtyTracker, merge } from "./mergeEngine";
import { sanitize, type SanitizerOptions } from "./sanitizer";

/** Hand-off records for a batch; only the languages still missing get an empty slot. */
export function toExchangeRecords(batch: TranslationBatch): ExchangeRecord[] {
  return batch.units.map((unit) => {
    const targetFields: Partial<Record<TargetLanguage, string>> = {};
    for (const language of unit.missingLanguages) {
      targetFields[language] = "";
    }
    return {
      sourceText: unit.sourceText,
      targetFields,
      usageCount: unit.usageCount,
      sampleContext: unit.location,
    };
  });
}

export function exportBatches(
  units: readonly TranslatableUnit[],
  maxBatchSize: number,
): ExchangeFile[] {
  const fingerprint = snapshotFingerprint(units);
  const batches = chunk(units, maxBatchSize);
  return batches.map((batch) => ({
    fingerprint,
    batchIndex: batch.index,
    batchCount: batches.length,
    records: toExchangeRecords(batch),
  }));
}

export const exchangeFileName = (file: ExchangeFile): string =>
  `batch_${String(file.batchIndex + 1).padStart(3, "0")}_of_${String(file.batchCount).padStart(3, "0")}.json`;

const exchangeRecordSchema = z.object({
  sourceText: z.string().min(1),
  targetFields: z.object({
    english: z.string().optional(),
    sinhala: z.string().optional(),
  }),
  usageCount: z.number().int().nonnegative().default(1),
  sampleContext: z.string().default(""),
});

const exchangeFileSchema = z.object({
  fingerprint: z.string().default(""),
  batchIndex: z.number().int().nonnegative().default(0),
  batchCount: z.number().int().positive().default(1),
  records: z.array(exchangeRecordSchema),
});

/** Accepts a full exchange file or a bare record array. */
export function parseExchangeFile(raw: unknown, source = "exchange file"): ExchangeFile {
  const parsed = exchangeFileSchema.safeParse(Array.isArray(raw) ? { records: raw } : raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PipelineError(
      "exchange_invalid",
      `Invalid ${source}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown"}`,
    );
  }
  return parsed.data;
}

export type ApplyStatus =
  | "merged"
  | "unchanged"
  | "flagged"
  | "conflict"
  | "unknown_source"
  | "integrity_error";

export interface ApplyOutcome {
  sourceText: string;
  language: TargetLanguage;
  status: ApplyStatus;
  message?: string;
  locations?: string[];
}

export interface ApplyOptions {
  force?: boolean;
  sanitizer?: Partial<SanitizerOptions>;
}

export interface ApplyResult {
  outcomes: ApplyOutcome[];
  changes: CorpusChanges;
}

/**
 * Sanitizes and merges filled-in records into the tree. Blank slots are ignored, so a
 * partially completed file can be applied repeatedly.
 */
export function applyExchangeRecords(
  tree: CorpusTree,
  records: readonly ExchangeRecord[],
  options: ApplyOptions = {},
): ApplyResult {
  const units = new Map(collectUnits(tree).map((unit) => [unit.sourceText, unit]));
  const dirty = new DirtyTracker();
  const outcomes: ApplyOutcome[] = [];

  for (const record of records) {
    const sourceText = record.sourceText.trim();
    const unit = units.get(sourceText);

    for (const language of TARGET_LANGUAGES) {
      const value = record.targetFields[language];
      if (value === undefined || isEmptyTranslation(value)) continue;

      if (!unit) {
        outcomes.push({ sourceText, language, status: "unknown_source" });
        continue;
      }

      const cleaned = sanitize(value, language, { sourceText, options: options.sanitizer });
      if (!cleaned.ok) {
        outcomes.push({
          sourceText,
          language,
          status: "flagged",
          message: cleaned.error.message,
        });
        continue;
      }

      const merged = merge(tree, unit, language, cleaned.value.text, { force: options.force });
      if (merged.ok) {
        dirty.record(merged.value);
        outcomes.push({
          sourceText,
          language,
          status: merged.value.written > 0 ? "merged" : "unchanged",
          locations: unit.locations,
        });
      } else if (merged.error instanceof OverwriteConflictError) {
        outcomes.push({
          sourceText,
          language,
          status: "conflict",
          message: merged.error.message,
          locations: merged.error.conflictingLocations,
        });
      } else {
        outcomes.push({
          sourceText,
          language,
          status: "integrity_error",
          message: merged.error.message,
        });
      }
    }
  }

  return { outcomes, changes: dirty.drain() };
}
