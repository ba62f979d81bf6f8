import { expect, test } from "vitest";
import { segmentChapterText } from "../../translate/segmenter.js";

test("without a segment size the chapter stays whole", () => {
  const text = "第一章\r\n\r\n本文\n";
  const segments = segmentChapterText(text, null);

  expect(segments).toEqual([{ segmentId: "SEG_0001", index: 0, text }]);
  expect(segmentChapterText(text, 0)).toEqual(segments);
});

test("blank chapters produce no segments", () => {
  expect(segmentChapterText("  \n\n ", null)).toEqual([]);
  expect(segmentChapterText("", 100)).toEqual([]);
});

test("paragraphs are packed greedily up to the segment size", () => {
  const segments = segmentChapterText("aaaa\n\nbbbb\n\ncccc", 10);

  expect(segments.map((segment) => segment.text)).toEqual(["aaaa\n\nbbbb", "cccc"]);
  expect(segments.map((segment) => segment.segmentId)).toEqual(["SEG_0001", "SEG_0002"]);
});

test("oversized paragraphs split on line breaks", () => {
  const segments = segmentChapterText("line one\nline two", 10);
  expect(segments.map((segment) => segment.text)).toEqual(["line one", "line two"]);
});

test("a single line longer than the segment size is cut hard", () => {
  const segments = segmentChapterText("abcdefghijklmnopqrstuvwxy", 10);

  expect(segments.map((segment) => segment.text)).toEqual(["abcdefghij", "klmnopqrst", "uvwxy"]);
  expect(segments.map((segment) => segment.index)).toEqual([0, 1, 2]);
});

test("segments never exceed the size and rejoin to the paragraph sequence", () => {
  const paragraphs = Array.from({ length: 12 }, (_, index) => `Paragraph ${index} text.`);
  const segments = segmentChapterText(paragraphs.join("\r\n\r\n\r\n"), 60);

  for (const segment of segments) {
    expect(segment.text.length).toBeLessThanOrEqual(60);
  }
  expect(segments.map((segment) => segment.text).join("\n\n")).toBe(paragraphs.join("\n\n"));
});

test("sizes count code points and cuts never split a surrogate pair", () => {
  expect(segmentChapterText("𠀀𠀁𠀂", 3).map((segment) => segment.text)).toEqual(["𠀀𠀁𠀂"]);
  expect(segmentChapterText("𠀀𠀁𠀂", 2).map((segment) => segment.text)).toEqual(["𠀀𠀁", "𠀂"]);
});

test("a hard cut lands after whitespace or punctuation when the window has one", () => {
  expect(segmentChapterText("alpha beta gamma", 10).map((segment) => segment.text)).toEqual([
    "alpha",
    "beta gamma",
  ]);
  expect(segmentChapterText("今日は晴れ。明日は雨。", 8).map((segment) => segment.text)).toEqual([
    "今日は晴れ。",
    "明日は雨。",
  ]);
});
