import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import type {
  BookNode,
  ChapterNode,
  CorpusTree,
  MultilingualText,
  SectionNode,
} from "@pali-corpus/corpus-types";

import { TreeIntegrityError, errorMessage } from "../../errors";
import { createLogger } from "../../logger";
import { validateTree } from "./corpusTree";

const log = createLogger("corpus-store");

export const MANIFEST_FILE = "collection.json";

// ---------------------------------------------------------------------------
// Persisted shapes
// ---------------------------------------------------------------------------

const multilingualSchema = z.object({
  pali: z.string(),
  english: z.string().default(""),
  sinhala: z.string().default(""),
});

const chapterRefSchema = z
  .object({
    id: z.string().min(1),
    number: z.number().int(),
    file: z.string().min(1),
  })
  .passthrough();

const bookEntrySchema = z
  .object({
    id: z.string().min(1),
    number: z.number().int(),
    title: multilingualSchema,
    footer: multilingualSchema.optional(),
    chapters: z.array(chapterRefSchema),
  })
  .passthrough();

const manifestSchema = z
  .object({
    id: z.string().min(1),
    title: multilingualSchema,
    books: z.array(bookEntrySchema),
  })
  .passthrough();

const sectionSchema = z
  .object({
    number: z.number().int(),
    pali: z.string(),
    english: z.string().default(""),
    sinhala: z.string().default(""),
    paliTitle: z.string().optional(),
    englishTitle: z.string().optional(),
    sinhalaTitle: z.string().optional(),
    vagga: z.string().optional(),
    vaggaEnglish: z.string().optional(),
    vaggaSinhala: z.string().optional(),
  })
  .passthrough();

const chapterDocumentSchema = z
  .object({
    id: z.string().min(1),
    title: multilingualSchema,
    sections: z.array(sectionSchema),
    footer: multilingualSchema.optional(),
  })
  .passthrough();

export type CollectionManifest = z.infer<typeof manifestSchema>;
export type ChapterDocument = z.infer<typeof chapterDocumentSchema>;

const MANIFEST_KEYS = ["id", "title", "books"];
const BOOK_KEYS = ["id", "number", "title", "footer", "chapters"];
const CHAPTER_REF_KEYS = ["id", "number", "file"];
const CHAPTER_KEYS = ["id", "title", "sections", "footer"];
const SECTION_KEYS = [
  "number",
  "pali",
  "english",
  "sinhala",
  "paliTitle",
  "englishTitle",
  "sinhalaTitle",
  "vagga",
  "vaggaEnglish",
  "vaggaSinhala",
];

function pickExtras(value: Record<string, unknown>, known: string[]): Record<string, unknown> {
  const extras: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!known.includes(key)) extras[key] = entry;
  }
  return extras;
}

const copyText = (text: MultilingualText): MultilingualText => ({
  pali: text.pali,
  english: text.english,
  sinhala: text.sinhala,
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

// ---------------------------------------------------------------------------
// Document <-> tree
// ---------------------------------------------------------------------------

export function parseManifest(raw: unknown, source = MANIFEST_FILE): CollectionManifest {
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TreeIntegrityError(`Invalid manifest ${source}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseChapterDocument(raw: unknown, source: string): ChapterDocument {
  const parsed = chapterDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TreeIntegrityError(
      `Invalid chapter document ${source}: ${describeIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}

function sectionFromDocument(section: ChapterDocument["sections"][number]): SectionNode {
  const hasTitle =
    section.paliTitle !== undefined ||
    section.englishTitle !== undefined ||
    section.sinhalaTitle !== undefined;
  const hasVagga =
    section.vagga !== undefined ||
    section.vaggaEnglish !== undefined ||
    section.vaggaSinhala !== undefined;

  return {
    kind: "section",
    number: section.number,
    body: { pali: section.pali, english: section.english, sinhala: section.sinhala },
    title: hasTitle
      ? {
          pali: section.paliTitle ?? "",
          english: section.englishTitle ?? "",
          sinhala: section.sinhalaTitle ?? "",
        }
      : null,
    vagga: hasVagga
      ? {
          pali: section.vagga ?? "",
          english: section.vaggaEnglish ?? "",
          sinhala: section.vaggaSinhala ?? "",
        }
      : null,
    extras: pickExtras(section, SECTION_KEYS),
  };
}

export function chapterFromDocument(
  ref: CollectionManifest["books"][number]["chapters"][number],
  document: ChapterDocument,
): ChapterNode {
  if (document.id !== ref.id) {
    throw new TreeIntegrityError(
      `Chapter document ${ref.file} has id "${document.id}", manifest expects "${ref.id}"`,
    );
  }
  return {
    kind: "chapter",
    id: ref.id,
    number: ref.number,
    file: ref.file,
    title: copyText(document.title),
    footer: document.footer ? copyText(document.footer) : null,
    sections: document.sections.map(sectionFromDocument),
    extras: pickExtras(document, CHAPTER_KEYS),
    entryExtras: pickExtras(ref, CHAPTER_REF_KEYS),
  };
}

export function buildTree(
  manifest: CollectionManifest,
  documents: Map<string, ChapterDocument>,
): CorpusTree {
  const books: BookNode[] = manifest.books.map((book) => ({
    kind: "book",
    id: book.id,
    number: book.number,
    title: copyText(book.title),
    footer: book.footer ? copyText(book.footer) : null,
    chapters: book.chapters.map((ref) => {
      const document = documents.get(ref.id);
      if (!document) {
        throw new TreeIntegrityError(`Missing chapter document for ${ref.id} (${ref.file})`);
      }
      return chapterFromDocument(ref, document);
    }),
    extras: pickExtras(book, BOOK_KEYS),
  }));

  const tree: CorpusTree = {
    kind: "collection",
    id: manifest.id,
    title: copyText(manifest.title),
    books,
    extras: pickExtras(manifest, MANIFEST_KEYS),
  };
  validateTree(tree);
  return tree;
}

export function manifestFromTree(tree: CorpusTree): Record<string, unknown> {
  return {
    id: tree.id,
    title: copyText(tree.title),
    books: tree.books.map((book) => ({
      id: book.id,
      number: book.number,
      title: copyText(book.title),
      ...(book.footer ? { footer: copyText(book.footer) } : {}),
      chapters: book.chapters.map((chapter) => ({
        id: chapter.id,
        number: chapter.number,
        file: chapter.file,
        ...chapter.entryExtras,
      })),
      ...book.extras,
    })),
    ...tree.extras,
  };
}

function sectionToDocument(section: SectionNode): Record<string, unknown> {
  return {
    number: section.number,
    pali: section.body.pali,
    english: section.body.english,
    sinhala: section.body.sinhala,
    ...(section.title
      ? {
          paliTitle: section.title.pali,
          englishTitle: section.title.english,
          sinhalaTitle: section.title.sinhala,
        }
      : {}),
    ...(section.vagga
      ? {
          vagga: section.vagga.pali,
          vaggaEnglish: section.vagga.english,
          vaggaSinhala: section.vagga.sinhala,
        }
      : {}),
    ...section.extras,
  };
}

export function chapterToDocument(chapter: ChapterNode): Record<string, unknown> {
  return {
    id: chapter.id,
    title: copyText(chapter.title),
    sections: chapter.sections.map(sectionToDocument),
    ...(chapter.footer ? { footer: copyText(chapter.footer) } : {}),
    ...chapter.extras,
  };
}

// ---------------------------------------------------------------------------
// Repositories
// ---------------------------------------------------------------------------

export interface CorpusChanges {
  chapterIds: ReadonlySet<string>;
  manifest: boolean;
}

export interface CorpusRepository {
  readonly label: string;
  load(): Promise<CorpusTree>;
  /** Persists the tree; when `changes` is given only the listed documents are rewritten. */
  save(tree: CorpusTree, changes?: CorpusChanges): Promise<void>;
}

const serialize = (value: unknown): string => `${JSON.stringify(value, null, 2)}\n`;

export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await writeFile(tempPath, contents, "utf8");
  await rename(tempPath, filePath);
}

async function readJson(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new TreeIntegrityError(`Cannot read ${filePath}: ${errorMessage(error)}`);
  }
  try {
    return JSON.parse(raw.replace(/^\uFEFF/, ""));
  } catch (error) {
    throw new TreeIntegrityError(`Malformed JSON in ${filePath}: ${errorMessage(error)}`);
  }
}

export class FileCorpusRepository implements CorpusRepository {
  readonly label: string;

  constructor(
    private readonly rootDir: string,
    private readonly manifestFile: string = MANIFEST_FILE,
  ) {
    this.label = path.resolve(rootDir);
  }

  private resolve(relativePath: string): string {
    const resolved = path.resolve(this.rootDir, relativePath);
    const root = path.resolve(this.rootDir);
    if (resolved !== root && !resolved.startsWith(`${root}${path.sep}`)) {
      throw new TreeIntegrityError(`Chapter path escapes the corpus directory: ${relativePath}`);
    }
    return resolved;
  }

  async load(): Promise<CorpusTree> {
    const manifestPath = this.resolve(this.manifestFile);
    const manifest = parseManifest(await readJson(manifestPath), manifestPath);

    const documents = new Map<string, ChapterDocument>();
    for (const book of manifest.books) {
      for (const ref of book.chapters) {
        const chapterPath = this.resolve(ref.file);
        documents.set(ref.id, parseChapterDocument(await readJson(chapterPath), chapterPath));
      }
    }

    const tree = buildTree(manifest, documents);
    log.debug({ corpus: this.label, chapters: documents.size }, "[CORPUS] loaded");
    return tree;
  }

  async save(tree: CorpusTree, changes?: CorpusChanges): Promise<void> {
    const writeManifest = changes ? changes.manifest : true;
    let written = 0;

    for (const book of tree.books) {
      for (const chapter of book.chapters) {
        if (changes && !changes.chapterIds.has(chapter.id)) continue;
        await writeFileAtomic(this.resolve(chapter.file), serialize(chapterToDocument(chapter)));
        written += 1;
      }
    }

    if (writeManifest) {
      await writeFileAtomic(this.resolve(this.manifestFile), serialize(manifestFromTree(tree)));
    }

    log.debug(
      { corpus: this.label, chapters: written, manifest: writeManifest },
      "[CORPUS] saved",
    );
  }
}

/** Keeps the tree as serialized documents, so every load hands out an independent copy. */
export class InMemoryCorpusRepository implements CorpusRepository {
  readonly label = "memory";
  saveCount = 0;
  private manifest: unknown;
  private documents = new Map<string, unknown>();

  constructor(tree: CorpusTree) {
    this.store(tree);
  }

  private store(tree: CorpusTree): void {
    this.manifest = JSON.parse(JSON.stringify(manifestFromTree(tree)));
    this.documents = new Map();
    for (const book of tree.books) {
      for (const chapter of book.chapters) {
        this.documents.set(chapter.id, JSON.parse(JSON.stringify(chapterToDocument(chapter))));
      }
    }
  }

  async load(): Promise<CorpusTree> {
    const manifest = parseManifest(this.manifest);
    const documents = new Map<string, ChapterDocument>();
    for (const [id, raw] of this.documents) {
      documents.set(id, parseChapterDocument(raw, id));
    }
    return buildTree(manifest, documents);
  }

  async save(tree: CorpusTree): Promise<void> {
    this.saveCount += 1;
    this.store(tree);
  }

  snapshot(): unknown {
    return JSON.parse(
      JSON.stringify({ manifest: this.manifest, documents: Object.fromEntries(this.documents) }),
    );
  }
}
