import type {
  BookNode,
  ChapterNode,
  CorpusNode,
  CorpusNodeKind,
  CorpusTree,
  MultilingualText,
  SectionNode,
  TargetLanguage,
  UnitField,
  UnitFieldMap,
  UnitLocation,
} from "@pali-corpus/corpus-types";

import { TreeIntegrityError } from "../../errors";

export const TARGET_LANGUAGES: readonly TargetLanguage[] = ["english", "sinhala"];

export const UNIT_FIELDS = {
  collection: ["title"],
  book: ["title", "footer"],
  chapter: ["title", "footer"],
  section: ["body", "title", "vagga"],
} as const satisfies { [K in CorpusNodeKind]: readonly UnitFieldMap[K][] };

const EMPTY_MARKERS = new Set(["", "N/A", "-"]);

export const isEmptyTranslation = (value: string | null | undefined): boolean =>
  value === null || value === undefined || EMPTY_MARKERS.has(value.trim());

export const emptyText = (pali = ""): MultilingualText => ({
  pali,
  english: "",
  sinhala: "",
});

const TARGET_LANGUAGE_SET: ReadonlySet<string> = new Set(TARGET_LANGUAGES);

export const isTargetLanguage = (value: string): value is TargetLanguage =>
  TARGET_LANGUAGE_SET.has(value);

// ---------------------------------------------------------------------------
// Location keys: collection/book/chapter/section#field
// ---------------------------------------------------------------------------

export function locationKey(location: UnitLocation): string {
  const segments: string[] = [location.collectionId];
  if (location.bookId !== null) segments.push(location.bookId);
  if (location.chapterId !== null) segments.push(location.chapterId);
  if (location.sectionNumber !== null) segments.push(String(location.sectionNumber));
  return `${segments.join("/")}#${location.field}`;
}

const ALL_FIELDS = new Set<string>(["title", "footer", "body", "vagga"]);

const isUnitField = (value: string): value is UnitField => ALL_FIELDS.has(value);

export function parseLocationKey(key: string): UnitLocation | null {
  const hashIndex = key.lastIndexOf("#");
  if (hashIndex <= 0) return null;
  const field = key.slice(hashIndex + 1);
  if (!isUnitField(field)) return null;

  const segments = key.slice(0, hashIndex).split("/");
  if (segments.some((segment) => segment.length === 0) || segments.length > 4) {
    return null;
  }

  let sectionNumber: number | null = null;
  if (segments.length === 4) {
    const parsed = Number(segments[3]);
    if (!Number.isInteger(parsed)) return null;
    sectionNumber = parsed;
  }

  const location: UnitLocation = {
    collectionId: segments[0],
    bookId: segments[1] ?? null,
    chapterId: segments[2] ?? null,
    sectionNumber,
    field,
  };
  const allowed: readonly string[] = UNIT_FIELDS[kindOfLocation(location)];
  return allowed.includes(field) ? location : null;
}

export function kindOfLocation(location: UnitLocation): CorpusNodeKind {
  if (location.sectionNumber !== null) return "section";
  if (location.chapterId !== null) return "chapter";
  if (location.bookId !== null) return "book";
  return "collection";
}

// ---------------------------------------------------------------------------
// Ordering and traversal
// ---------------------------------------------------------------------------

const byNumber = <T extends { number: number }>(items: readonly T[]): T[] =>
  items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => a.item.number - b.item.number || a.index - b.index)
    .map(({ item }) => item);

export const orderedBooks = (tree: CorpusTree): BookNode[] => byNumber(tree.books);

export const orderedChapters = (book: BookNode): ChapterNode[] => byNumber(book.chapters);

export const orderedSections = (chapter: ChapterNode): SectionNode[] =>
  byNumber(chapter.sections);

export function nodeFields(node: CorpusNode): Array<[UnitField, MultilingualText | null]> {
  switch (node.kind) {
    case "collection":
      return [["title", node.title]];
    case "book":
      return [
        ["title", node.title],
        ["footer", node.footer],
      ];
    case "chapter":
      return [
        ["title", node.title],
        ["footer", node.footer],
      ];
    case "section":
      return [
        ["body", node.body],
        ["title", node.title],
        ["vagga", node.vagga],
      ];
  }
}

export interface UnitOccurrence {
  key: string;
  location: UnitLocation;
  text: MultilingualText;
  chapterId: string | null;
}

/**
 * Depth-first walk over every field holding Pali source text.
 * Children are visited by declared number, so the order depends only on tree content.
 * A chapter's title and footer bracket its sections, matching document reading order.
 */
export function* walkUnits(tree: CorpusTree): Generator<UnitOccurrence> {
  const emit = function* (
    location: Omit<UnitLocation, "field">,
    fields: Array<[UnitField, MultilingualText | null]>,
    chapterId: string | null,
  ): Generator<UnitOccurrence> {
    for (const [field, text] of fields) {
      if (!text || !text.pali.trim()) continue;
      const full: UnitLocation = { ...location, field };
      yield { key: locationKey(full), location: full, text, chapterId };
    }
  };

  const base = { collectionId: tree.id, bookId: null, chapterId: null, sectionNumber: null };
  yield* emit(base, nodeFields(tree), null);

  for (const book of orderedBooks(tree)) {
    const bookBase = { ...base, bookId: book.id };
    const [bookTitle, bookFooter] = nodeFields(book);
    yield* emit(bookBase, [bookTitle], null);

    for (const chapter of orderedChapters(book)) {
      const chapterBase = { ...bookBase, chapterId: chapter.id };
      const [chapterTitle, chapterFooter] = nodeFields(chapter);
      yield* emit(chapterBase, [chapterTitle], chapter.id);

      for (const section of orderedSections(chapter)) {
        yield* emit(
          { ...chapterBase, sectionNumber: section.number },
          nodeFields(section),
          chapter.id,
        );
      }

      yield* emit(chapterBase, [chapterFooter], chapter.id);
    }

    yield* emit(bookBase, [bookFooter], null);
  }
}

export function locationOrder(tree: CorpusTree): Map<string, number> {
  const order = new Map<string, number>();
  for (const occurrence of walkUnits(tree)) {
    order.set(occurrence.key, order.size);
  }
  return order;
}

// ---------------------------------------------------------------------------
// Field access by location
// ---------------------------------------------------------------------------

export interface ResolvedField {
  text: MultilingualText;
  /** Chapter document that owns the field, or null for manifest-level fields. */
  chapterId: string | null;
}

function findNode(tree: CorpusTree, location: UnitLocation): CorpusNode | null {
  if (location.collectionId !== tree.id) return null;
  if (location.bookId === null) return tree;

  const book = tree.books.find((entry) => entry.id === location.bookId);
  if (!book) return null;
  if (location.chapterId === null) return book;

  const chapter = book.chapters.find((entry) => entry.id === location.chapterId);
  if (!chapter) return null;
  if (location.sectionNumber === null) return chapter;

  return chapter.sections.find((entry) => entry.number === location.sectionNumber) ?? null;
}

export function resolveField(tree: CorpusTree, key: string): ResolvedField | null {
  const location = parseLocationKey(key);
  if (!location) return null;
  const node = findNode(tree, location);
  if (!node) return null;

  const entry = nodeFields(node).find(([field]) => field === location.field);
  const text = entry?.[1];
  if (!text) return null;
  return { text, chapterId: location.chapterId };
}

// ---------------------------------------------------------------------------
// Structural validation
// ---------------------------------------------------------------------------

const assertPositiveInteger = (value: number, what: string) => {
  if (!Number.isInteger(value) || value < 1) {
    throw new TreeIntegrityError(`${what} has invalid number ${value}`);
  }
};

const assertUnique = (values: Array<string | number>, what: string) => {
  const seen = new Set<string | number>();
  for (const value of values) {
    if (seen.has(value)) {
      throw new TreeIntegrityError(`Duplicate ${what}: ${value}`);
    }
    seen.add(value);
  }
};

const assertSegment = (id: string, what: string) => {
  if (!id || id.includes("/") || id.includes("#")) {
    throw new TreeIntegrityError(`${what} id "${id}" cannot be used in a location key`);
  }
};

export function validateTree(tree: CorpusTree): void {
  assertSegment(tree.id, "Collection");
  assertUnique(
    tree.books.map((book) => book.id),
    `book id in ${tree.id}`,
  );
  const chapterIds: string[] = [];

  for (const book of tree.books) {
    assertSegment(book.id, "Book");
    assertPositiveInteger(book.number, `Book ${book.id}`);

    for (const chapter of book.chapters) {
      assertSegment(chapter.id, "Chapter");
      assertPositiveInteger(chapter.number, `Chapter ${chapter.id}`);
      chapterIds.push(chapter.id);

      assertUnique(
        chapter.sections.map((section) => section.number),
        `section number in ${chapter.id}`,
      );
      for (const section of chapter.sections) {
        assertPositiveInteger(section.number, `Section in ${chapter.id}`);
      }
    }
  }

  // Chapter ids double as document keys, so they are unique across books.
  assertUnique(chapterIds, "chapter id");
}
