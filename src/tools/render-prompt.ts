/**
 * Prints the rendered chapter translation prompt.
 *
 * Usage:
 *   tsx src/tools/render-prompt.ts --from ja --to en [--terms "魔王 = Demon King"] [--terms-file glossary.yml] [--template path]
 */
import { buildTerminology } from "../glossary/glossary.js";
import { buildChapterTranslationPrompt } from "../prompts/chapterPrompt.js";
import { getNovelChapterTemplate, loadPromptTemplate, NOVEL_CHAPTER_TEMPLATE_ID } from "../prompts/template.js";
import { resolveLanguageName } from "../translate/languages.js";
import { readFlags, readGlossaryFlag, stringFlag } from "./args.js";

function main(): void {
  const flags = readFlags(process.argv.slice(2), []);

  const from = stringFlag(flags, "from");
  const to = stringFlag(flags, "to");
  if (!from || !to) {
    throw new Error("Missing required arguments: --from <language> --to <language>");
  }

  const templatePath = stringFlag(flags, "template");
  const template = templatePath
    ? loadPromptTemplate(templatePath, { id: NOVEL_CHAPTER_TEMPLATE_ID, defaults: { terminology: "" } })
    : getNovelChapterTemplate();

  const terminology = buildTerminology(readGlossaryFlag(flags), stringFlag(flags, "terms"));

  const prompt = buildChapterTranslationPrompt(
    {
      sourceLang: resolveLanguageName(from),
      targetLang: resolveLanguageName(to),
      terminology,
      chapterText: "",
    },
    template,
  );

  process.stdout.write(prompt.systemPrompt);
}

try {
  main();
} catch (err) {
  console.error("❌", err instanceof Error ? err.message : String(err));
  process.exit(1);
}
