import type {
  CorpusTree,
  MultilingualText,
  Result,
  TargetLanguage,
  TranslatableUnit,
} from "@pali-corpus/corpus-types";

import { OverwriteConflictError, TreeIntegrityError, type MergeError } from "../../errors";
import type { CorpusChanges } from "../corpus/corpusStore";
import { isEmptyTranslation, resolveField } from "../corpus/corpusTree";

export interface MergeOptions {
  /** Overwrite differing existing values instead of reporting a conflict. */
  force?: boolean;
}

export interface MergeOutcome {
  written: number;
  unchanged: number;
  dirtyChapters: Set<string>;
  /** True when a collection or book field changed, i.e. the manifest needs rewriting. */
  manifestDirty: boolean;
}

interface ResolvedTarget {
  key: string;
  text: MultilingualText;
  chapterId: string | null;
}

/**
 * Writes one translated value to every occurrence of a unit. Either every location
 * is updated or none is: a conflict or a structural problem leaves the tree untouched.
 */
export function merge(
  tree: CorpusTree,
  unit: TranslatableUnit,
  language: TargetLanguage,
  translatedText: string,
  options: MergeOptions = {},
): Result<MergeOutcome, MergeError> {
  const targets: ResolvedTarget[] = [];
  for (const key of unit.locations) {
    const resolved = resolveField(tree, key);
    if (!resolved) {
      return { ok: false, error: new TreeIntegrityError(`Location not found: ${key}`, key) };
    }
    if (resolved.text.pali.trim() !== unit.sourceText) {
      return {
        ok: false,
        error: new TreeIntegrityError(`Source text changed at ${key}`, key),
      };
    }
    targets.push({ key, ...resolved });
  }

  const value = translatedText.trim();
  const conflicts = targets
    .filter(({ text }) => !isEmptyTranslation(text[language]) && text[language].trim() !== value)
    .map(({ key }) => key);

  if (conflicts.length > 0 && !options.force) {
    return { ok: false, error: new OverwriteConflictError(language, conflicts) };
  }

  const outcome: MergeOutcome = {
    written: 0,
    unchanged: 0,
    dirtyChapters: new Set(),
    manifestDirty: false,
  };
  for (const target of targets) {
    if (target.text[language].trim() === value) {
      outcome.unchanged += 1;
      continue;
    }
    target.text[language] = value;
    outcome.written += 1;
    if (target.chapterId === null) {
      outcome.manifestDirty = true;
    } else {
      outcome.dirtyChapters.add(target.chapterId);
    }
  }
  return { ok: true, value: outcome };
}

/** Accumulates merge outcomes until the next save. */
export class DirtyTracker {
  private readonly chapterIds = new Set<string>();
  private manifest = false;

  record(outcome: MergeOutcome): void {
    for (const id of outcome.dirtyChapters) this.chapterIds.add(id);
    if (outcome.manifestDirty) this.manifest = true;
  }

  get isEmpty(): boolean {
    return this.chapterIds.size === 0 && !this.manifest;
  }

  /** Snapshot of pending changes; the tracker is cleared. */
  drain(): CorpusChanges {
    const changes = { chapterIds: new Set(this.chapterIds), manifest: this.manifest };
    this.chapterIds.clear();
    this.manifest = false;
    return changes;
  }
}
