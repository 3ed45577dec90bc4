import type { CorpusTree } from "@pali-corpus/corpus-types";

import type { CorpusChanges } from "../corpus/corpusStore";
import { TARGET_LANGUAGES, walkUnits } from "../corpus/corpusTree";
import { normalizeJoiners } from "./sanitizer";

export interface JoinerRepairReport {
  repaired: number;
  locations: string[];
  changes: CorpusChanges;
}

/** Rewrites stored translations whose joiners are placeholders, escaped or doubled. */
export function repairCorpusJoiners(tree: CorpusTree): JoinerRepairReport {
  const chapterIds = new Set<string>();
  const locations: string[] = [];
  let manifest = false;
  let repaired = 0;

  for (const occurrence of walkUnits(tree)) {
    let touched = false;
    for (const language of TARGET_LANGUAGES) {
      const current = occurrence.text[language];
      const normalized = normalizeJoiners(current);
      if (normalized === current) continue;
      occurrence.text[language] = normalized;
      repaired += 1;
      touched = true;
    }
    if (!touched) continue;

    locations.push(occurrence.key);
    if (occurrence.chapterId === null) {
      manifest = true;
    } else {
      chapterIds.add(occurrence.chapterId);
    }
  }

  return { repaired, locations, changes: { chapterIds, manifest } };
}
