import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, expect, test } from "vitest";
import {
  buildTerminology,
  formatGlossary,
  loadGlossaryFile,
  normalizeCustomTerms,
  parseCustomTerms,
  toTerminologyText,
} from "../../glossary/glossary.js";

const tempDirs: string[] = [];

afterEach(() => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  }
});

function writeGlossary(content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "glossary-"));
  tempDirs.push(dir);
  const filePath = path.join(dir, "glossary.yml");
  fs.writeFileSync(filePath, content, "utf-8");
  return filePath;
}

test("custom terms parse one pair per line and keep free text", () => {
  const entries = parseCustomTerms(
    "魔王 = Demon King\n# comment\n\n- Ki -> qi\nSect: Heavenly Sword Sect\nkeep honorifics\n= orphan",
  );

  expect(entries).toEqual([
    { source: "魔王", target: "Demon King" },
    { source: "Ki", target: "qi" },
    { source: "Sect", target: "Heavenly Sword Sect" },
    { source: "keep honorifics", target: null },
    { source: "= orphan", target: null },
  ]);
});

test("arrow separators win over later separators on the same line", () => {
  expect(parseCustomTerms("Lord: title → Lord-title")).toEqual([
    { source: "Lord: title", target: "Lord-title" },
  ]);
});

test("glossary entries format as a bulleted list", () => {
  expect(
    formatGlossary([
      { source: "魔王", target: "Demon King", note: "title" },
      { source: "keep honorifics", target: null },
    ]),
  ).toBe("- 魔王 → Demon King (title)\n- keep honorifics");
});

test("custom terms normalization drops blank lines and trailing spaces", () => {
  expect(normalizeCustomTerms("  a = b  \r\n\r\n c = d\n")).toBe("  a = b\n c = d");
  expect(toTerminologyText(undefined)).toBe("");
  expect(toTerminologyText([{ source: "剣", target: "sword" }])).toBe("- 剣 → sword");
});

test("YAML glossary loads terms with optional notes", () => {
  const filePath = writeGlossary(
    "version: 1\nterms:\n  - source: 魔王\n    target: Demon King\n    note: title\n  - source: 気\n    target: qi\n",
  );

  expect(loadGlossaryFile(filePath)).toEqual([
    { source: "魔王", target: "Demon King", note: "title" },
    { source: "気", target: "qi" },
  ]);
});

test("YAML glossary rejects duplicate source terms", () => {
  const filePath = writeGlossary(
    "terms:\n  - source: 魔王\n    target: Demon King\n  - source: 魔王\n    target: Dark Lord\n",
  );

  expect(() => loadGlossaryFile(filePath)).toThrow("duplicate source term '魔王'");
});

test("YAML glossary rejects entries without a target", () => {
  const filePath = writeGlossary("terms:\n  - source: 魔王\n");
  expect(() => loadGlossaryFile(filePath)).toThrow("terms[0].target must be a string");
});

test("YAML glossary requires a terms list", () => {
  const filePath = writeGlossary("version: 1\n");
  expect(() => loadGlossaryFile(filePath)).toThrow("expected a 'terms' list");
});

test("missing glossary file is reported with its path", () => {
  const missing = path.join(os.tmpdir(), "no-such-glossary-file.yml");
  expect(() => loadGlossaryFile(missing)).toThrow(`Glossary file not found: ${missing}`);
});

test("glossary entries and custom terms merge into one bulleted block", () => {
  const terminology = buildTerminology(
    [{ source: "勇者", target: "Hero", note: "title" }],
    "# house style\n魔王 = Demon King\n- keep honorifics\n",
  );

  expect(terminology).toBe("- 勇者 → Hero (title)\n- 魔王 → Demon King\n- keep honorifics");
  expect(buildTerminology(undefined, undefined)).toBe("");
  expect(buildTerminology(undefined, "気 -> qi")).toBe("- 気 → qi");
});
