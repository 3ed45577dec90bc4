import type { Result, TargetLanguage } from "@pali-corpus/corpus-types";

import {
  ArtifactEncodingError,
  EmptyTranslationError,
  ForeignCharacterError,
  OverExpansionError,
  type ForeignCharacterIssue,
  type ValidationError,
} from "../../errors";

export interface SanitizerOptions {
  maxExpansionRatio: number;
  expansionFloorChars: number;
  minScriptRatio: number;
}

export const DEFAULT_SANITIZER_OPTIONS: SanitizerOptions = {
  maxExpansionRatio: 6,
  expansionFloorChars: 120,
  minScriptRatio: 0.6,
};

export type SanitizerFix =
  | "joiner_placeholder"
  | "escape_sequence"
  | "joiner_collapsed"
  | "stray_invisible"
  | "preamble"
  | "page_marker"
  | "leading_number"
  | "blank_lines";

export interface SanitizedText {
  text: string;
  fixes: SanitizerFix[];
}

export interface SanitizeContext {
  sourceText: string;
  options?: Partial<SanitizerOptions>;
}

const ZWJ = "\u200D";

// UTF-8 Sinhala read back as Latin-1 starts with these pairs.
const MOJIBAKE_PATTERN = /à[¶·]/;
const REPLACEMENT_CHAR = "\uFFFD";

const JOINER_PLACEHOLDERS =
  /<ZWJ>|\[ZWJ\]|#zwj;|#ZWJ#|_ZWJ_|&zwj;|&#8205;|&#x200D;|\\u200D|\{U\+200D\}/gi;
const UNICODE_ESCAPE = /\\u([0-9a-fA-F]{4})/g;
const CODEPOINT_ESCAPE = /\{U\+([0-9a-fA-F]{4,6})\}/g;
const STRAY_INVISIBLES = /[\u200B\u200C\u2060\uFEFF]/g;
const JOINER_RUN = /\u200D{2,}/g;

// line-anchored: a preamble can open any piece of a split translation
const PREAMBLES = [
  /^[ \t]*here is the (?:corrected |improved )?(?:english |sinhala )?translation[^\n:]*:?[ \t]*/gim,
  /^[ \t]*\*+[ \t]*translation[ \t]*\*+[: \t]*/gim,
  /^[ \t]*(?:english|sinhala) translation[ \t]*(?::[ \t]*|$)/gim,
  /^[ \t]*translation[ \t]*(?::[ \t]*|$)/gim,
  /^[ \t]*සිංහල පරිවර්තනය[: \t]*/gm,
];
const PAGE_MARKER = /[ \t]*Page\s+\d+\s+(?:sur|of)\s+\d+[ \t]*/gi;
const LEADING_NUMBER = /^\s*(?:\d+\s*[.)]|\[\d+\]|\(\d+\))\s+/;
const EXCESS_BLANK_LINES = /\n[ \t]*(?:\n[ \t]*){2,}/g;

interface ScriptRange {
  script: string;
  from: number;
  to: number;
}

const FOREIGN_SCRIPTS_FOR_SINHALA: ScriptRange[] = [
  { script: "Devanagari", from: 0x0900, to: 0x097f },
  { script: "Bengali", from: 0x0980, to: 0x09ff },
  { script: "Tamil", from: 0x0b80, to: 0x0bff },
  { script: "Telugu", from: 0x0c00, to: 0x0c7f },
  { script: "Kannada", from: 0x0c80, to: 0x0cff },
  { script: "Malayalam", from: 0x0d00, to: 0x0d7f },
  { script: "Thai", from: 0x0e00, to: 0x0e7f },
  { script: "Myanmar", from: 0x1000, to: 0x109f },
  { script: "Khmer", from: 0x1780, to: 0x17ff },
];

const LETTER_OR_MARK = /[\p{L}\p{M}]/u;

const IN_TARGET_SCRIPT: Record<TargetLanguage, (char: string) => boolean> = {
  sinhala: (char) => {
    const code = char.codePointAt(0) ?? 0;
    return code >= 0x0d80 && code <= 0x0dff;
  },
  english: (char) => /[\p{Script=Latin}\p{Script=Inherited}]/u.test(char),
};

const formatCodePoint = (code: number) =>
  `U+${code.toString(16).toUpperCase().padStart(4, "0")}`;

// ---------------------------------------------------------------------------
// Joiner repair
// ---------------------------------------------------------------------------

function dropUnanchoredJoiners(text: string): string {
  const chars = Array.from(text);
  let out = "";
  for (let index = 0; index < chars.length; index += 1) {
    const char = chars[index];
    if (char !== ZWJ) {
      out += char;
      continue;
    }
    const before = chars[index - 1];
    const after = chars[index + 1];
    const anchored =
      before !== undefined && after !== undefined && /\S/.test(before) && /\S/.test(after);
    if (anchored) out += char;
  }
  return out;
}

function repairJoiners(text: string, fixes: Set<SanitizerFix>): string {
  let next = text.replace(JOINER_PLACEHOLDERS, () => {
    fixes.add("joiner_placeholder");
    return ZWJ;
  });
  next = next
    .replace(UNICODE_ESCAPE, (_match, hex: string) => {
      fixes.add("escape_sequence");
      return String.fromCharCode(parseInt(hex, 16));
    })
    .replace(CODEPOINT_ESCAPE, (match, hex: string) => {
      const code = parseInt(hex, 16);
      if (code > 0x10ffff) return match;
      fixes.add("escape_sequence");
      return String.fromCodePoint(code);
    });

  const stripped = next.replace(STRAY_INVISIBLES, "");
  if (stripped !== next) fixes.add("stray_invisible");

  const collapsed = dropUnanchoredJoiners(stripped.replace(JOINER_RUN, ZWJ));
  if (collapsed !== stripped) fixes.add("joiner_collapsed");
  return collapsed;
}

/** Joiner and invisible-character repair only; used on text already stored in a corpus. */
export function normalizeJoiners(text: string): string {
  return repairJoiners(text, new Set());
}

// ---------------------------------------------------------------------------
// Cleanup
// ---------------------------------------------------------------------------

function stripNoise(text: string, fixes: Set<SanitizerFix>): string {
  let next = text;

  let stripped = true;
  while (stripped) {
    stripped = false;
    for (const pattern of PREAMBLES) {
      const candidate = next.replace(pattern, "");
      if (candidate !== next) {
        next = candidate;
        stripped = true;
        fixes.add("preamble");
      }
    }
  }

  const withoutPages = next.replace(PAGE_MARKER, "");
  if (withoutPages !== next) fixes.add("page_marker");
  next = withoutPages;

  const withoutNumber = next.replace(LEADING_NUMBER, "");
  if (withoutNumber !== next) fixes.add("leading_number");
  next = withoutNumber;

  const collapsed = next.replace(EXCESS_BLANK_LINES, "\n\n");
  if (collapsed !== next) fixes.add("blank_lines");
  return collapsed.trim();
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

function findEncodingArtifact(text: string): string | null {
  const mojibake = MOJIBAKE_PATTERN.exec(text);
  if (mojibake) return mojibake[0];
  return text.includes(REPLACEMENT_CHAR) ? REPLACEMENT_CHAR : null;
}

export function findForeignCharacters(text: string): ForeignCharacterIssue[] {
  const issues: ForeignCharacterIssue[] = [];
  let position = 0;
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    const range = FOREIGN_SCRIPTS_FOR_SINHALA.find(
      (entry) => code >= entry.from && code <= entry.to,
    );
    if (range) {
      issues.push({
        char,
        codePoint: formatCodePoint(code),
        script: range.script,
        position,
        context: text.slice(Math.max(0, position - 10), position + 10),
      });
    }
    position += char.length;
  }
  return issues;
}

/** Share of letters and marks that belong to the language's own script. 1 when there are none. */
export function scriptRatio(text: string, language: TargetLanguage): number {
  let letters = 0;
  let inScript = 0;
  for (const char of text) {
    if (!LETTER_OR_MARK.test(char)) continue;
    letters += 1;
    if (IN_TARGET_SCRIPT[language](char)) inScript += 1;
  }
  return letters === 0 ? 1 : inScript / letters;
}

export const expansionLimit = (sourceLength: number, options: SanitizerOptions): number =>
  Math.max(Math.ceil(sourceLength * options.maxExpansionRatio), options.expansionFloorChars);

export function sanitize(
  raw: string,
  language: TargetLanguage,
  context: SanitizeContext,
): Result<SanitizedText, ValidationError> {
  const options = { ...DEFAULT_SANITIZER_OPTIONS, ...(context.options ?? {}) };
  const fixes = new Set<SanitizerFix>();

  const artifact = findEncodingArtifact(raw);
  if (artifact !== null) {
    return {
      ok: false,
      error: new ArtifactEncodingError(
        language,
        artifact,
        `Output contains encoding artifact "${artifact}".`,
      ),
    };
  }

  const text = stripNoise(repairJoiners(raw, fixes), fixes);
  if (!text) {
    return { ok: false, error: new EmptyTranslationError(language) };
  }

  if (language === "sinhala") {
    const issues = findForeignCharacters(text);
    if (issues.length > 0) {
      const scripts = Array.from(new Set(issues.map((issue) => issue.script)));
      return {
        ok: false,
        error: new ForeignCharacterError(
          language,
          `Found ${issues.length} character(s) from ${scripts.join(", ")}.`,
          { issues, scriptRatio: scriptRatio(text, language) },
        ),
      };
    }
  }

  const ratio = scriptRatio(text, language);
  if (ratio < options.minScriptRatio) {
    return {
      ok: false,
      error: new ForeignCharacterError(
        language,
        `Only ${(ratio * 100).toFixed(0)}% of letters are in the ${language} script.`,
        { scriptRatio: ratio },
      ),
    };
  }

  const sourceLength = context.sourceText.trim().length;
  const limit = expansionLimit(sourceLength, options);
  if (text.length > limit) {
    return {
      ok: false,
      error: new OverExpansionError(language, {
        sourceLength,
        outputLength: text.length,
        limit,
      }),
    };
  }

  return { ok: true, value: { text, fixes: Array.from(fixes) } };
}
