import { toTerminologyText } from "../glossary/glossary.js";
import type { ChapterPromptInput, PromptBundle } from "../translate/types.js";
import { getNovelChapterTemplate, renderPromptTemplate, type PromptTemplate } from "./template.js";

export function buildChapterTranslationPrompt(
  input: ChapterPromptInput,
  template: PromptTemplate = getNovelChapterTemplate(),
): PromptBundle {
  const systemPrompt = renderPromptTemplate(template, {
    source_lang: input.sourceLang,
    target_lang: input.targetLang,
    terminology: toTerminologyText(input.terminology),
  });

  return {
    systemPrompt,
    userPrompt: input.chapterText,
  };
}
