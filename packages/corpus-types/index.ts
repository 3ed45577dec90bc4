/**
 * Shared corpus and translation-pipeline type definitions.
 * The server core, the batch exchange files and the CLI all speak these shapes,
 * so they live apart from any implementation. Types only: nothing here exists at run time.
 */

export type SourceLanguage = "pali";

export type TargetLanguage = "english" | "sinhala";

export type LanguageCode = SourceLanguage | TargetLanguage;

export type MultilingualText = Record<LanguageCode, string>;

export type CorpusNodeKind = "collection" | "book" | "chapter" | "section";

export interface CollectionNode {
  kind: "collection";
  id: string;
  title: MultilingualText;
  books: BookNode[];
  extras: Record<string, unknown>;
}

export interface BookNode {
  kind: "book";
  id: string;
  number: number;
  title: MultilingualText;
  footer: MultilingualText | null;
  chapters: ChapterNode[];
  extras: Record<string, unknown>;
}

export interface ChapterNode {
  kind: "chapter";
  id: string;
  number: number;
  /** Chapter document path, relative to the collection directory. */
  file: string;
  title: MultilingualText;
  footer: MultilingualText | null;
  sections: SectionNode[];
  extras: Record<string, unknown>;
  /** Unknown keys of the chapter's manifest entry, as opposed to its document. */
  entryExtras: Record<string, unknown>;
}

export interface SectionNode {
  kind: "section";
  number: number;
  body: MultilingualText;
  title: MultilingualText | null;
  vagga: MultilingualText | null;
  extras: Record<string, unknown>;
}

export type CorpusNode = CollectionNode | BookNode | ChapterNode | SectionNode;

export type CorpusTree = CollectionNode;

export interface UnitFieldMap {
  collection: "title";
  book: "title" | "footer";
  chapter: "title" | "footer";
  section: "body" | "title" | "vagga";
}

export type UnitField = UnitFieldMap[CorpusNodeKind];

export interface UnitLocation {
  collectionId: string;
  bookId: string | null;
  chapterId: string | null;
  sectionNumber: number | null;
  field: UnitField;
}

export interface TranslatableUnit {
  sourceText: string;
  /** First non-empty value seen across the occurrences, per language. */
  targetFields: Record<TargetLanguage, string | null>;
  missingLanguages: TargetLanguage[];
  /** Representative (first-seen) location key. */
  location: string;
  locations: string[];
  usageCount: number;
}

export interface TranslationBatch {
  index: number;
  units: TranslatableUnit[];
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface SessionLock {
  owner: string;
  pid: number;
  acquiredAt: string;
  heartbeatAt: string;
}

export interface ReviewEntry {
  location: string;
  sourceText: string;
  language: TargetLanguage;
  code: string;
  message: string;
  recordedAt: string;
}

export interface ConflictEntry {
  location: string;
  sourceText: string;
  language: TargetLanguage;
  conflictingLocations: string[];
  proposed: string;
  recordedAt: string;
}

export type CheckpointStatus = "active" | "complete";

export interface SessionCheckpoint {
  version: 1;
  status: CheckpointStatus;
  lastCompletedLocation: string | null;
  lastCompletedBatchIndex: number;
  timestamp: string;
  lock: SessionLock | null;
  review: ReviewEntry[];
  conflicts: ConflictEntry[];
}

export interface ExchangeRecord {
  sourceText: string;
  targetFields: Partial<Record<TargetLanguage, string>>;
  usageCount: number;
  sampleContext: string;
}

export interface ExchangeFile {
  fingerprint: string;
  batchIndex: number;
  batchCount: number;
  records: ExchangeRecord[];
}
