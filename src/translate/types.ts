import type { GlossaryEntry } from "../glossary/glossary.js";

export type PromptBundle = {
  systemPrompt: string;
  userPrompt: string;
};

export type ChapterPromptInput = {
  sourceLang: string;
  targetLang: string;
  terminology?: string | readonly GlossaryEntry[];
  chapterText: string;
};

export type ChapterSegment = {
  segmentId: string;
  index: number;
  text: string;
};

export type LlmCallInput = {
  systemPrompt: string;
  userPrompt: string;
  model: string;
};

export type LlmCall = (input: LlmCallInput) => Promise<string>;

export type SegmentCallLog = {
  segmentId: string;
  reqChars: number;
  respChars: number;
  durationMs: number;
};

export type TranslateTextInput = {
  text: string;
  sourceLang: string;
  targetLang: string;
  terminology?: string | readonly GlossaryEntry[];
  model: string;
  segmentSize: number | null;
};

export type TranslateTextResult = {
  translatedText: string;
  segmentLogs: SegmentCallLog[];
};

export type ChapterFile = {
  name: string;
};

export type TranslationJob = {
  files: ChapterFile[];
  sourceLang: string;
  targetLang: string;
  customTerms?: string;
  glossary?: readonly GlossaryEntry[];
  segmentSize?: number | null;
  delayMs?: number;
};

export type TranslationHooks = {
  onProgress?: (message: string) => void;
  onFileCompleted?: (filename: string, success: boolean) => void;
  onError?: (message: string) => void;
  onAllCompleted?: () => void;
};

export type TranslationRunSummary = {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  stopped: boolean;
  /** The run ended early on an error of its own (not a per-file failure). */
  aborted: boolean;
};

export type TranslationRecord = {
  filename: string;
  sourceLang: string;
  targetLang: string;
  translatedAtMs: number;
};
