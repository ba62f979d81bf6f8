import type Database from "better-sqlite3";
import { cfg } from "../config/env.js";
import type { LlmProvider } from "../config/types.js";
import { getDbForDirectory } from "../db.js";
import { buildTerminology, normalizeCustomTerms } from "../glossary/glossary.js";
import { createChatLlmCall } from "../llm/client.js";
import { buildChapterTranslationPrompt } from "../prompts/chapterPrompt.js";
import type { PromptTemplate } from "../prompts/template.js";
import { log } from "../utils/logger.js";
import { readChapter, writeChapterAtomically } from "./io.js";
import { SUPPORTED_LANGUAGES } from "./languages.js";
import { addTranslationRecord, getCustomTerms, isFileTranslated, saveCustomTerms } from "./translationRepo.js";
import { translateText } from "./translator.js";
import type { LlmCall, TranslationHooks, TranslationJob, TranslationRunSummary } from "./types.js";

const translateLog = log.withScope("translate");

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

type ManagerDeps = {
  /** Injected model call; when absent one is built from config at initialize(). */
  callLlm?: LlmCall;
  sleep?: (ms: number) => Promise<void>;
  template?: PromptTemplate;
};

type RunContext = {
  workingDir: string;
  db: Database.Database;
  callLlm: LlmCall;
  model: string;
  job: TranslationJob;
  terminology: string;
  hooks: TranslationHooks;
};

/** A run succeeded when it was not aborted and no file failed. */
export function isRunSuccessful(summary: TranslationRunSummary): boolean {
  return !summary.aborted && summary.failed === 0;
}

/**
 * Translates chapter files of one working directory in order, one request
 * stream at a time. Files already recorded as translated are skipped, and a
 * stop request takes effect before the next file starts.
 */
export class TranslationManager {
  private workingDir: string | null = null;
  private db: Database.Database | null = null;
  private callLlm: LlmCall | null = null;
  private model: string = cfg.llm.model;
  private running = false;
  private stopRequested = false;
  private activeHooks: TranslationHooks = {};

  constructor(private readonly deps: ManagerDeps = {}) {}

  initialize(directory: string, opts: { provider?: LlmProvider; model?: string } = {}): void {
    this.workingDir = directory;
    this.db = getDbForDirectory(directory);
    this.model = opts.model ?? cfg.llm.model;
    this.callLlm = this.deps.callLlm ?? createChatLlmCall({ provider: opts.provider });
    translateLog.info(`Working directory: ${directory}`, { model: this.model });
  }

  get isRunning(): boolean {
    return this.running;
  }

  async translateFiles(job: TranslationJob, hooks: TranslationHooks = {}): Promise<TranslationRunSummary> {
    const summary: TranslationRunSummary = {
      total: job.files.length,
      succeeded: 0,
      failed: 0,
      skipped: 0,
      stopped: false,
      aborted: false,
    };

    if (!this.workingDir || !this.db || !this.callLlm) {
      hooks.onError?.("Working directory has not been initialized");
      summary.aborted = true;
      return summary;
    }
    if (this.running) {
      throw new Error("A translation run is already in progress");
    }

    const terminology = buildTerminology(job.glossary, job.customTerms);

    this.running = true;
    this.stopRequested = false;
    this.activeHooks = hooks;

    try {
      await this.run(
        {
          workingDir: this.workingDir,
          db: this.db,
          callLlm: this.callLlm,
          model: this.model,
          job,
          terminology,
          hooks,
        },
        summary,
      );
    } catch (err) {
      summary.aborted = true;
      hooks.onError?.(`Error in translation process: ${errorMessage(err)}`);
    } finally {
      summary.stopped = this.stopRequested;
      this.running = false;
      this.activeHooks = {};
      hooks.onAllCompleted?.();
    }

    return summary;
  }

  stopTranslation(): void {
    if (!this.running) return;
    this.stopRequested = true;
    this.activeHooks.onProgress?.("Stopping translation...");
  }

  getSupportedLanguages(): Record<string, string> {
    return { ...SUPPORTED_LANGUAGES };
  }

  getCustomTerms(): string {
    return this.db ? getCustomTerms(this.db) : "";
  }

  private async run(ctx: RunContext, summary: TranslationRunSummary): Promise<void> {
    const { job, hooks } = ctx;
    const total = job.files.length;
    const delayMs = job.delayMs ?? cfg.translate.delayMs;
    const wait = this.deps.sleep ?? sleep;

    // Missing language names abort the run before any file is touched.
    buildChapterTranslationPrompt(
      {
        sourceLang: job.sourceLang,
        targetLang: job.targetLang,
        terminology: ctx.terminology,
        chapterText: "",
      },
      this.deps.template,
    );

    const customTerms = normalizeCustomTerms(job.customTerms ?? "");
    if (customTerms) {
      saveCustomTerms(ctx.db, customTerms);
    }

    for (let i = 1; i <= total; i++) {
      if (this.stopRequested) break;

      const file = job.files[i - 1];
      if (!file) continue;
      const filename = file.name;
      hooks.onProgress?.(`Translating chapter ${i} of ${total}: ${filename}`);

      if (isFileTranslated(ctx.db, filename)) {
        translateLog.debug(`Skipping ${filename}: already translated`);
        summary.skipped++;
        continue;
      }

      const success = await this.translateSingleFile(ctx, filename);
      if (success) {
        summary.succeeded++;
        addTranslationRecord(ctx.db, {
          filename,
          sourceLang: job.sourceLang,
          targetLang: job.targetLang,
        });
      } else {
        summary.failed++;
      }
      hooks.onFileCompleted?.(filename, success);

      if (i < total && !this.stopRequested) {
        await wait(delayMs);
      }
    }

    if (!this.stopRequested) {
      hooks.onProgress?.(
        `Translation completed. ${summary.succeeded} of ${total} files translated successfully.`,
      );
    }
  }

  private async translateSingleFile(ctx: RunContext, filename: string): Promise<boolean> {
    try {
      const text = readChapter(ctx.workingDir, filename);
      const result = await translateText(
        {
          text,
          sourceLang: ctx.job.sourceLang,
          targetLang: ctx.job.targetLang,
          terminology: ctx.terminology,
          model: ctx.model,
          segmentSize: ctx.job.segmentSize === undefined ? cfg.translate.segmentSize : ctx.job.segmentSize,
        },
        { callLlm: ctx.callLlm, template: this.deps.template },
      );

      if (!result.translatedText) {
        ctx.hooks.onError?.(`Error translating ${filename}: no translation returned`);
        return false;
      }

      writeChapterAtomically(ctx.workingDir, filename, result.translatedText);
      translateLog.info(`Translated ${filename}`, { segments: result.segmentLogs.length });
      return true;
    } catch (err) {
      translateLog.warn(`Failed to translate ${filename}: ${errorMessage(err)}`);
      ctx.hooks.onError?.(`Error translating ${filename}: ${errorMessage(err)}`);
      return false;
    }
  }
}
