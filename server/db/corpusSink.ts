import { readFileSync } from "node:fs";
import path from "node:path";

import type { CorpusTree, MultilingualText } from "@pali-corpus/corpus-types";

import { getPool } from "../db";
import { createLogger, type Logger } from "../logger";
import { isEmptyTranslation } from "../services/corpus/corpusTree";

const TABLE_MISSING_CODE = "42P01";

export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rowCount: number | null }>;
}

export interface SinkClient extends Queryable {
  release(): void;
}

export interface SinkConnectionSource {
  connect(): Promise<SinkClient>;
}

export interface SinkReport {
  collectionId: string;
  books: number;
  chapters: number;
  sections: number;
  removedSections: number;
}

type PgError = Error & { code?: string };

const isPgError = (error: unknown): error is PgError =>
  error instanceof Error && "code" in error && typeof error.code === "string";

const textOrNull = (value: string): string | null => (isEmptyTranslation(value) ? null : value);

const translations = (text: MultilingualText | null) => [
  text ? text.pali : null,
  text ? textOrNull(text.english) : null,
  text ? textOrNull(text.sinhala) : null,
];

export const SCHEMA_PATH = path.join(__dirname, "schema.sql");

export async function ensureSchema(db: Queryable, schemaPath = SCHEMA_PATH): Promise<void> {
  await db.query(readFileSync(schemaPath, "utf8"));
}

/** Runs a statement that may target a table older databases lack. */
export async function safeQuery(
  db: Queryable,
  sql: string,
  params: unknown[],
  context: string,
  log: Logger,
): Promise<boolean> {
  try {
    await db.query(sql, params);
    return true;
  } catch (error) {
    if (isPgError(error) && error.code === TABLE_MISSING_CODE) {
      log.warn({ context, err: error.message }, "[SINK] Skipping optional step");
      return false;
    }
    throw error;
  }
}

export class CorpusSink {
  private readonly log: Logger;

  constructor(
    private readonly source: SinkConnectionSource = getPool(),
    log?: Logger,
  ) {
    this.log = log ?? createLogger("corpus-sink");
  }

  /** Mirrors the whole tree in one transaction; rows for removed nodes are deleted. */
  async load(tree: CorpusTree): Promise<SinkReport> {
    const client = await this.source.connect();
    const report: SinkReport = {
      collectionId: tree.id,
      books: 0,
      chapters: 0,
      sections: 0,
      removedSections: 0,
    };

    try {
      await client.query("BEGIN");
      await this.writeTree(client, tree, report);
      await client.query("COMMIT");
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } finally {
        client.release();
      }
      throw error;
    }

    try {
      await safeQuery(
        client,
        `INSERT INTO sink_loads (collection_id, books, chapters, sections)
         VALUES ($1,$2,$3,$4)`,
        [tree.id, report.books, report.chapters, report.sections],
        "sink_loads insert",
        this.log,
      );
    } finally {
      client.release();
    }

    this.log.info(report, "[SINK] Corpus loaded");
    return report;
  }

  private async writeTree(db: Queryable, tree: CorpusTree, report: SinkReport): Promise<void> {
    await db.query(
      `INSERT INTO collections (id, title_pali, title_english, title_sinhala)
       VALUES ($1,$2,$3,$4)
       ON CONFLICT (id) DO UPDATE
         SET title_pali = EXCLUDED.title_pali,
             title_english = EXCLUDED.title_english,
             title_sinhala = EXCLUDED.title_sinhala,
             updated_at = NOW()`,
      [tree.id, ...translations(tree.title)],
    );

    for (const book of tree.books) {
      await db.query(
        `INSERT INTO books (id, collection_id, book_number, title_pali, title_english, title_sinhala,
                            footer_pali, footer_english, footer_sinhala, total_chapters)
         VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10)
         ON CONFLICT (id) DO UPDATE
           SET collection_id = EXCLUDED.collection_id,
               book_number = EXCLUDED.book_number,
               title_pali = EXCLUDED.title_pali,
               title_english = EXCLUDED.title_english,
               title_sinhala = EXCLUDED.title_sinhala,
               footer_pali = EXCLUDED.footer_pali,
               footer_english = EXCLUDED.footer_english,
               footer_sinhala = EXCLUDED.footer_sinhala,
               total_chapters = EXCLUDED.total_chapters,
               updated_at = NOW()`,
        [
          book.id,
          tree.id,
          book.number,
          ...translations(book.title),
          ...translations(book.footer),
          book.chapters.length,
        ],
      );
      report.books += 1;

      for (const chapter of book.chapters) {
        await db.query(
          `INSERT INTO chapters (id, book_id, chapter_number, title_pali, title_english, title_sinhala,
                                 footer_pali, footer_english, footer_sinhala)
           VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)
           ON CONFLICT (id) DO UPDATE
             SET book_id = EXCLUDED.book_id,
                 chapter_number = EXCLUDED.chapter_number,
                 title_pali = EXCLUDED.title_pali,
                 title_english = EXCLUDED.title_english,
                 title_sinhala = EXCLUDED.title_sinhala,
                 footer_pali = EXCLUDED.footer_pali,
                 footer_english = EXCLUDED.footer_english,
                 footer_sinhala = EXCLUDED.footer_sinhala,
                 updated_at = NOW()`,
          [
            chapter.id,
            book.id,
            chapter.number,
            ...translations(chapter.title),
            ...translations(chapter.footer),
          ],
        );
        report.chapters += 1;

        for (const section of chapter.sections) {
          await db.query(
            `INSERT INTO sections (chapter_id, section_number, pali, english, sinhala,
                                   pali_title, english_title, sinhala_title,
                                   vagga, vagga_english, vagga_sinhala)
             VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11)
             ON CONFLICT (chapter_id, section_number) DO UPDATE
               SET pali = EXCLUDED.pali,
                   english = EXCLUDED.english,
                   sinhala = EXCLUDED.sinhala,
                   pali_title = EXCLUDED.pali_title,
                   english_title = EXCLUDED.english_title,
                   sinhala_title = EXCLUDED.sinhala_title,
                   vagga = EXCLUDED.vagga,
                   vagga_english = EXCLUDED.vagga_english,
                   vagga_sinhala = EXCLUDED.vagga_sinhala`,
            [
              chapter.id,
              section.number,
              ...translations(section.body),
              ...translations(section.title),
              ...translations(section.vagga),
            ],
          );
          report.sections += 1;
        }

        const removed = await db.query(
          `DELETE FROM sections WHERE chapter_id = $1 AND NOT (section_number = ANY($2::int[]))`,
          [chapter.id, chapter.sections.map((section) => section.number)],
        );
        report.removedSections += removed.rowCount ?? 0;
      }

      await db.query(`DELETE FROM chapters WHERE book_id = $1 AND NOT (id = ANY($2::text[]))`, [
        book.id,
        book.chapters.map((chapter) => chapter.id),
      ]);
    }

    await db.query(`DELETE FROM books WHERE collection_id = $1 AND NOT (id = ANY($2::text[]))`, [
      tree.id,
      tree.books.map((book) => book.id),
    ]);
  }
}
