import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, expect, test } from "vitest";
import {
  MissingValueError,
  TemplateRenderError,
  UnknownPlaceholderError,
} from "../../prompts/errors.js";
import {
  createPromptTemplate,
  loadPromptTemplate,
  parsePlaceholders,
  renderPromptTemplate,
} from "../../prompts/template.js";

const tempDirs: string[] = [];

afterEach(() => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  }
});

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}

const inline = createPromptTemplate({
  id: "inline",
  body: "Translate from {source_lang} to {target_lang}.\n\n{terminology}\nKeep {{braces}}.",
  defaults: { terminology: "" },
});

test("placeholders are listed once, in order of first appearance", () => {
  expect(parsePlaceholders("{b} {a} {b} {{c}} {not valid} {_x1}")).toEqual(["b", "a", "_x1"]);
  expect(inline.placeholders).toEqual(["source_lang", "target_lang", "terminology"]);
});

test("render substitutes every placeholder and collapses escaped braces", () => {
  const rendered = renderPromptTemplate(inline, {
    source_lang: "Japanese",
    target_lang: "English",
    terminology: "- 魔王 → Demon King",
  });

  expect(rendered).toBe("Translate from Japanese to English.\n\n- 魔王 → Demon King\nKeep {braces}.");
});

test("optional placeholders fall back to their default", () => {
  const rendered = renderPromptTemplate(inline, { source_lang: "Japanese", target_lang: "English" });
  expect(rendered).toBe("Translate from Japanese to English.\n\n\nKeep {braces}.");
});

test("rendering is deterministic", () => {
  const values = { source_lang: "Korean", target_lang: "Spanish", terminology: "검 = espada" };
  expect(renderPromptTemplate(inline, values)).toBe(renderPromptTemplate(inline, values));
});

test("missing required values fail with every missing name in template order", () => {
  const err = captureError(() => renderPromptTemplate(inline, { terminology: "x" }));

  expect(err).toBeInstanceOf(MissingValueError);
  expect(err).toBeInstanceOf(TemplateRenderError);
  if (!(err instanceof MissingValueError)) return;
  expect(err.missing).toEqual(["source_lang", "target_lang"]);
  expect(err.templateId).toBe("inline");
  expect(err.message).toBe("Template 'inline' is missing values for: source_lang, target_lang");
});

test("blank and undefined required values count as missing", () => {
  const err = captureError(() =>
    renderPromptTemplate(inline, { source_lang: "   ", target_lang: undefined }),
  );

  expect(err).toBeInstanceOf(MissingValueError);
  if (!(err instanceof MissingValueError)) return;
  expect(err.missing).toEqual(["source_lang", "target_lang"]);
});

test("unknown keys are rejected by default and can be ignored", () => {
  const values = { source_lang: "Japanese", target_lang: "English", chapter: "text" };

  const err = captureError(() => renderPromptTemplate(inline, values));
  expect(err).toBeInstanceOf(UnknownPlaceholderError);
  if (!(err instanceof UnknownPlaceholderError)) return;
  expect(err.unknown).toEqual(["chapter"]);

  expect(renderPromptTemplate(inline, values, { unknownKeys: "ignore" })).toBe(
    "Translate from Japanese to English.\n\n\nKeep {braces}.",
  );
});

test("unknown keys with undefined values are treated as absent", () => {
  const rendered = renderPromptTemplate(inline, {
    source_lang: "Japanese",
    target_lang: "English",
    extra: undefined,
  });
  expect(rendered).toBe("Translate from Japanese to English.\n\n\nKeep {braces}.");
});

test("missing values are reported before unknown keys", () => {
  const err = captureError(() => renderPromptTemplate(inline, { target_lang: "English", extra: "x" }));
  expect(err).toBeInstanceOf(MissingValueError);
});

test("inserted values are not re-expanded", () => {
  const rendered = renderPromptTemplate(inline, { source_lang: "{target_lang}", target_lang: "English" });
  expect(rendered).toBe("Translate from {target_lang} to English.\n\n\nKeep {braces}.");
});

test("whitespace and stray braces outside placeholders are preserved", () => {
  const template = createPromptTemplate({ id: "spacing", body: "  {a}\n\n\t{b}  \na { b } }\n" });
  expect(renderPromptTemplate(template, { a: "1", b: "2" })).toBe("  1\n\n\t2  \na { b } }\n");
});

test("a default for a placeholder the body does not contain is rejected", () => {
  expect(() =>
    createPromptTemplate({ id: "bad", body: "{source_lang}", defaults: { glossary: "" } }),
  ).toThrow("Template 'bad' declares a default for unknown placeholder 'glossary'");
});

test("loading drops a UTF-8 BOM and is repeatable", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "template-load-"));
  tempDirs.push(dir);
  const filePath = path.join(dir, "greeting.txt");
  fs.writeFileSync(filePath, "\uFEFFHello {name}\r\n\r\nBye\n", "utf-8");

  const first = loadPromptTemplate(filePath);
  const second = loadPromptTemplate(filePath);

  expect(first.id).toBe("greeting");
  expect(first.sourcePath).toBe(path.resolve(filePath));
  expect(first.body).toBe("Hello {name}\r\n\r\nBye\n");
  expect(second.body).toBe(first.body);
  expect(renderPromptTemplate(first, { name: "Ren" })).toBe("Hello Ren\r\n\r\nBye\n");
});
