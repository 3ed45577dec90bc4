import type { TranslatableUnit, TranslationBatch } from "@pali-corpus/corpus-types";

import { ConfigurationError } from "../../errors";

export function chunk(
  units: readonly TranslatableUnit[],
  maxBatchSize: number,
): TranslationBatch[] {
  if (!Number.isInteger(maxBatchSize) || maxBatchSize < 1) {
    throw new ConfigurationError(`maxBatchSize must be a positive integer, got ${maxBatchSize}`);
  }

  const batches: TranslationBatch[] = [];
  for (let start = 0; start < units.length; start += maxBatchSize) {
    batches.push({
      index: batches.length,
      units: units.slice(start, start + maxBatchSize),
    });
  }
  return batches;
}

/** Batch index holding the unit at `position` of the extraction. */
export const batchIndexOf = (position: number, maxBatchSize: number): number =>
  Math.floor(position / maxBatchSize);
