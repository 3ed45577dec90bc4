import type { TargetLanguage } from "@pali-corpus/corpus-types";

const LANGUAGE_RULES: Record<TargetLanguage, string> = {
  english: `Write clear, modern English for contemporary readers.
Keep established Buddhist terms (Dhamma, bhikkhu, Sangha, Nibbāna) untranslated.
Keep the paragraph breaks of the source and finish every sentence.`,
  sinhala: `Write in Sinhala script only, never romanized and never in another Indic script.
Use traditional Sinhala Buddhist terminology and keep the doctrinal meaning of Pali terms.
Form conjuncts with the zero-width joiner character itself (for example ශ්\u200Dර), never with a placeholder such as <ZWJ>.
Keep the paragraph breaks of the source and finish every sentence.`,
};

export const translationSystemPrompt = (language: TargetLanguage): string =>
  `You translate canonical Pali Buddhist texts into ${language === "english" ? "English" : "Sinhala"}.
${LANGUAGE_RULES[language]}
Return the translation only: no preamble, no notes, no numbering and no quotation marks around it.`;

export const translationUserPrompt = (text: string, context: string | null): string =>
  context
    ? `Location in the corpus: ${context}\n\nPali text:\n${text}`
    : `Pali text:\n${text}`;
