import type { ChapterSegment } from "./types.js";

const PARAGRAPH_BREAK = /\n[ \t]*\n+/;

/** A hard cut prefers to land right after one of these. */
const SOFT_BREAK = /[\s.,!?;:。！？、，；：」』）)]/u;

/** Length in code points, so a surrogate pair counts once. */
function charCount(text: string): number {
  return Array.from(text).length;
}

/**
 * Cuts an over-long line into pieces of at most `size` code points, breaking
 * after the last whitespace or punctuation of each window when there is one.
 */
function cutHard(line: string, size: number): string[] {
  const chars = Array.from(line);
  const pieces: string[] = [];
  let start = 0;

  while (chars.length - start > size) {
    let end = start + size;
    for (let i = end - 1; i > start; i--) {
      if (SOFT_BREAK.test(chars[i] ?? "")) {
        end = i + 1;
        break;
      }
    }
    const piece = chars.slice(start, end).join("").trimEnd();
    if (piece) pieces.push(piece);
    start = end;
    while (start < chars.length && /\s/u.test(chars[start] ?? "")) start++;
  }

  const rest = chars.slice(start).join("");
  if (rest) pieces.push(rest);
  return pieces;
}

/** Splits one oversized paragraph on line breaks, cutting lines that still exceed the size. */
function splitParagraph(paragraph: string, size: number): string[] {
  const pieces: string[] = [];
  let current = "";

  for (const line of paragraph.split("\n")) {
    const parts = charCount(line) > size ? cutHard(line, size) : [line];
    for (const part of parts) {
      if (!current) {
        current = part;
      } else if (charCount(current) + 1 + charCount(part) <= size) {
        current = `${current}\n${part}`;
      } else {
        pieces.push(current);
        current = part;
      }
    }
  }

  if (current) pieces.push(current);
  return pieces;
}

function toSegments(texts: string[]): ChapterSegment[] {
  return texts.map((text, index) => ({
    segmentId: `SEG_${String(index + 1).padStart(4, "0")}`,
    index,
    text,
  }));
}

/**
 * Packs paragraphs greedily into segments of at most `segmentSize` characters
 * (code points). A null or non-positive size keeps the chapter whole.
 *
 * Pieces of a line that had to be cut end up in separate segments, and so
 * come back as separate paragraphs once the translated segments are joined.
 */
export function segmentChapterText(text: string, segmentSize: number | null): ChapterSegment[] {
  const normalized = text.replace(/\r\n/g, "\n");
  if (!normalized.trim()) {
    return [];
  }

  if (segmentSize === null || segmentSize <= 0) {
    return toSegments([text]);
  }

  const size = Math.max(1, Math.floor(segmentSize));
  const paragraphs = normalized
    .split(PARAGRAPH_BREAK)
    .map((paragraph) => paragraph.replace(/^\n+|\n+$/g, ""))
    .filter((paragraph) => paragraph.trim() !== "");

  const packed: string[] = [];
  let current = "";

  for (const paragraph of paragraphs) {
    const pieces = charCount(paragraph) > size ? splitParagraph(paragraph, size) : [paragraph];
    for (const piece of pieces) {
      if (!current) {
        current = piece;
      } else if (charCount(current) + 2 + charCount(piece) <= size) {
        current = `${current}\n\n${piece}`;
      } else {
        packed.push(current);
        current = piece;
      }
    }
  }

  if (current) packed.push(current);
  return toSegments(packed);
}
