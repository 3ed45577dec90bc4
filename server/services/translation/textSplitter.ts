const PARAGRAPH_BREAK = /\n\s*\n/;
const SENTENCE_END = /(?<=[.!?।॥])\s+/;

export const PIECE_SEPARATOR = "\n\n";

function packPieces(parts: string[], maxChars: number, joiner: string): string[] {
  const pieces: string[] = [];
  let current = "";
  for (const part of parts) {
    const candidate = current ? `${current}${joiner}${part}` : part;
    if (candidate.length <= maxChars) {
      current = candidate;
      continue;
    }
    if (current) pieces.push(current);
    current = part;
  }
  if (current) pieces.push(current);
  return pieces;
}

function forceSplit(text: string, maxChars: number): string[] {
  const pieces: string[] = [];
  let rest = text;
  while (rest.length > maxChars) {
    // prefer the last space inside the window
    const window = rest.slice(0, maxChars);
    const space = window.lastIndexOf(" ");
    const cut = space > maxChars / 2 ? space : maxChars;
    pieces.push(rest.slice(0, cut).trim());
    rest = rest.slice(cut).trim();
  }
  if (rest) pieces.push(rest);
  return pieces;
}

function splitSentences(paragraph: string, maxChars: number): string[] {
  const sentences = paragraph
    .split(SENTENCE_END)
    .map((sentence) => sentence.trim())
    .filter(Boolean)
    .flatMap((sentence) =>
      sentence.length > maxChars ? forceSplit(sentence, maxChars) : [sentence],
    );
  return packPieces(sentences, maxChars, " ");
}

/**
 * Splits text longer than `maxChars` into provider-sized pieces: at paragraph breaks
 * first, then after sentence enders, then at a space or hard cut.
 */
export function splitText(text: string, maxChars: number): string[] {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) return trimmed ? [trimmed] : [];

  const paragraphs = trimmed
    .split(PARAGRAPH_BREAK)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean)
    .flatMap((paragraph) =>
      paragraph.length > maxChars ? splitSentences(paragraph, maxChars) : [paragraph],
    );
  return packPieces(paragraphs, maxChars, PIECE_SEPARATOR);
}

export const joinPieces = (pieces: readonly string[]): string =>
  pieces.map((piece) => piece.trim()).join(PIECE_SEPARATOR);
