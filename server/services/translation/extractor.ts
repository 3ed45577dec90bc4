import { createHash } from "node:crypto";

import type {
  CorpusTree,
  TargetLanguage,
  TranslatableUnit,
} from "@pali-corpus/corpus-types";

import { TARGET_LANGUAGES, isEmptyTranslation, walkUnits } from "../corpus/corpusTree";

interface UnitGroup {
  sourceText: string;
  locations: string[];
  known: Record<TargetLanguage, string | null>;
  missing: Set<TargetLanguage>;
}

const emptyKnown = (): Record<TargetLanguage, string | null> => ({
  english: null,
  sinhala: null,
});

function groupOccurrences(
  tree: CorpusTree,
  requiredLanguages: readonly TargetLanguage[],
): UnitGroup[] {
  const groups = new Map<string, UnitGroup>();

  for (const occurrence of walkUnits(tree)) {
    const sourceText = occurrence.text.pali.trim();
    let group = groups.get(sourceText);
    if (!group) {
      group = { sourceText, locations: [], known: emptyKnown(), missing: new Set() };
      groups.set(sourceText, group);
    }
    group.locations.push(occurrence.key);

    for (const language of TARGET_LANGUAGES) {
      const value = occurrence.text[language];
      if (isEmptyTranslation(value)) {
        if (requiredLanguages.includes(language)) group.missing.add(language);
      } else if (group.known[language] === null) {
        group.known[language] = value;
      }
    }
  }

  return Array.from(groups.values());
}

const toUnit = (
  group: UnitGroup,
  requiredLanguages: readonly TargetLanguage[],
): TranslatableUnit => ({
  sourceText: group.sourceText,
  targetFields: group.known,
  missingLanguages: requiredLanguages.filter((language) => group.missing.has(language)),
  location: group.locations[0],
  locations: group.locations,
  usageCount: group.locations.length,
});

/** Every distinct source text in the tree, complete or not. */
export function collectUnits(
  tree: CorpusTree,
  requiredLanguages: readonly TargetLanguage[] = TARGET_LANGUAGES,
): TranslatableUnit[] {
  return groupOccurrences(tree, requiredLanguages).map((group) =>
    toUnit(group, requiredLanguages),
  );
}

/**
 * Units that still lack a required translation somewhere, deduplicated by trimmed
 * Pali source and ordered by first occurrence in traversal order.
 */
export function extract(
  tree: CorpusTree,
  requiredLanguages: readonly TargetLanguage[] = TARGET_LANGUAGES,
): TranslatableUnit[] {
  return groupOccurrences(tree, requiredLanguages)
    .filter((group) => group.missing.size > 0)
    .map((group) => toUnit(group, requiredLanguages));
}

export interface LanguageCoverage {
  translated: number;
  missing: number;
}

export interface CoverageSummary {
  occurrences: number;
  distinctSources: number;
  pendingUnits: number;
  languages: Record<TargetLanguage, LanguageCoverage>;
}

export function summarizeCoverage(
  tree: CorpusTree,
  requiredLanguages: readonly TargetLanguage[] = TARGET_LANGUAGES,
): CoverageSummary {
  const languages: Record<TargetLanguage, LanguageCoverage> = {
    english: { translated: 0, missing: 0 },
    sinhala: { translated: 0, missing: 0 },
  };
  let occurrences = 0;

  for (const occurrence of walkUnits(tree)) {
    occurrences += 1;
    for (const language of TARGET_LANGUAGES) {
      if (isEmptyTranslation(occurrence.text[language])) {
        languages[language].missing += 1;
      } else {
        languages[language].translated += 1;
      }
    }
  }

  const groups = groupOccurrences(tree, requiredLanguages);
  return {
    occurrences,
    distinctSources: groups.length,
    pendingUnits: groups.filter((group) => group.missing.size > 0).length,
    languages,
  };
}

/** Identifies an extraction result. Exchange files carry it so a stale export can be reported. */
export function snapshotFingerprint(units: readonly TranslatableUnit[]): string {
  const hash = createHash("sha256");
  for (const unit of units) {
    hash.update(unit.sourceText);
    hash.update("\u0000");
  }
  return hash.digest("hex");
}
