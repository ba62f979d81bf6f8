import { buildChapterTranslationPrompt } from "../prompts/chapterPrompt.js";
import type { PromptTemplate } from "../prompts/template.js";
import { log } from "../utils/logger.js";
import { segmentChapterText } from "./segmenter.js";
import type { LlmCall, SegmentCallLog, TranslateTextInput, TranslateTextResult } from "./types.js";

const translateLog = log.withScope("translate");

export async function translateText(
  input: TranslateTextInput,
  deps: { callLlm: LlmCall; template?: PromptTemplate },
): Promise<TranslateTextResult> {
  const segments = segmentChapterText(input.text, input.segmentSize);
  const translatedSegments: string[] = [];
  const segmentLogs: SegmentCallLog[] = [];

  // Render up front so a missing language fails before any request is sent.
  const basePrompt = buildChapterTranslationPrompt(
    {
      sourceLang: input.sourceLang,
      targetLang: input.targetLang,
      terminology: input.terminology,
      chapterText: "",
    },
    deps.template,
  );

  for (const segment of segments) {
    const reqChars = basePrompt.systemPrompt.length + segment.text.length;
    const callStart = Date.now();

    translateLog.debug(
      `${segment.segmentId} ${input.sourceLang}->${input.targetLang} reqChars~${reqChars}`,
    );

    const raw = await deps.callLlm({
      systemPrompt: basePrompt.systemPrompt,
      userPrompt: segment.text,
      model: input.model,
    });

    const translated = raw.trim();
    if (!translated) {
      throw new Error(`Empty translation for ${segment.segmentId}`);
    }

    const durationMs = Date.now() - callStart;
    translatedSegments.push(translated);
    segmentLogs.push({
      segmentId: segment.segmentId,
      reqChars,
      respChars: translated.length,
      durationMs,
    });

    translateLog.debug(`${segment.segmentId} ms=${durationMs} respChars=${translated.length}`);
  }

  return {
    translatedText: translatedSegments.join("\n\n"),
    segmentLogs,
  };
}
