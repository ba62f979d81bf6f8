/**
 * Translates the chapter files of a working directory in place.
 *
 * Usage:
 *   tsx src/tools/translate-chapters.ts --dir ./novel --from ja --to en [options]
 *
 * Options:
 *   --files <a,b,...>      Chapter files to translate (default: every .txt/.md in --dir)
 *   --terms <text>         Custom terms, one "term = translation" per line
 *   --terms-file <path>    YAML glossary (terms: [{ source, target, note? }])
 *   --segment-size <n>     Characters per request (default: TRANSLATE_SEGMENT_SIZE, 0 = whole chapter)
 *   --model <name>         Chat model (default: LLM_MODEL)
 *   --provider <name>      openai | groq (default: LLM_PROVIDER)
 *   --delay-ms <n>         Pause between chapters (default: TRANSLATE_DELAY_MS)
 *   --list-languages       Print the supported languages and exit
 *   --show-config          Print the resolved config (secrets redacted) and exit
 *   --show-records         Print the chapters of --dir already recorded as translated and exit
 *   --forget <name>        Drop the translation record of one chapter so the next run picks it up again
 *
 * Ctrl+C stops after the chapter in progress.
 */
import { cfg, printConfigSnapshot } from "../config/env.js";
import { closeDbForDirectory, getDbForDirectory } from "../db.js";
import type { LlmProvider } from "../config/types.js";
import { listChapterFiles } from "../translate/io.js";
import { resolveLanguageName, SUPPORTED_LANGUAGES } from "../translate/languages.js";
import { isRunSuccessful, TranslationManager } from "../translate/manager.js";
import { getTranslationRecord, listTranslationRecords, removeTranslationRecord } from "../translate/translationRepo.js";
import { log } from "../utils/logger.js";
import { intFlag, readFlags, readGlossaryFlag, stringFlag } from "./args.js";

const cliLog = log.withScope("cli");

function parseProvider(value: string | undefined): LlmProvider | undefined {
  if (value === undefined) return undefined;
  if (value === "openai" || value === "groq") return value;
  throw new Error(`Invalid --provider '${value}'. Expected openai|groq.`);
}

async function main(): Promise<void> {
  const flags = readFlags(process.argv.slice(2), ["list-languages", "show-config", "show-records"]);

  if (flags.has("list-languages")) {
    for (const [code, name] of Object.entries(SUPPORTED_LANGUAGES)) {
      console.log(`${code}\t${name}`);
    }
    return;
  }

  if (flags.has("show-config")) {
    printConfigSnapshot(cfg);
    return;
  }

  const dir = stringFlag(flags, "dir");
  const forget = stringFlag(flags, "forget");
  if (dir && (flags.has("show-records") || forget)) {
    const db = getDbForDirectory(dir);
    if (forget) {
      const record = getTranslationRecord(db, forget);
      if (record && removeTranslationRecord(db, forget)) {
        console.log(`Forgot ${forget} (${record.sourceLang} -> ${record.targetLang})`);
      } else {
        console.log(`No record for ${forget}`);
      }
    } else {
      for (const record of listTranslationRecords(db)) {
        const when = new Date(record.translatedAtMs).toISOString();
        console.log(`${record.filename}\t${record.sourceLang} -> ${record.targetLang}\t${when}`);
      }
    }
    closeDbForDirectory(dir);
    return;
  }

  const from = stringFlag(flags, "from");
  const to = stringFlag(flags, "to");
  if (!dir || !from || !to) {
    throw new Error("Missing required arguments: --dir <path> --from <language> --to <language>");
  }

  const filesFlag = stringFlag(flags, "files");
  const files = filesFlag
    ? filesFlag.split(",").map((name) => name.trim()).filter((name) => name)
    : listChapterFiles(dir);
  if (files.length === 0) {
    throw new Error(`No chapter files found in ${dir}`);
  }

  const manager = new TranslationManager();
  manager.initialize(dir, {
    provider: parseProvider(stringFlag(flags, "provider")),
    model: stringFlag(flags, "model"),
  });

  process.on("SIGINT", () => {
    manager.stopTranslation();
  });

  const summary = await manager.translateFiles(
    {
      files: files.map((name) => ({ name })),
      sourceLang: resolveLanguageName(from),
      targetLang: resolveLanguageName(to),
      customTerms: stringFlag(flags, "terms"),
      glossary: readGlossaryFlag(flags),
      segmentSize: intFlag(flags, "segment-size"),
      delayMs: intFlag(flags, "delay-ms"),
    },
    {
      onProgress: (message) => cliLog.info(message),
      onFileCompleted: (filename, success) => {
        console.log(`${success ? "✅" : "❌"} ${filename}`);
      },
      onError: (message) => cliLog.error(message),
    },
  );

  closeDbForDirectory(dir);
  cliLog.info("Run finished", summary);

  if (!isRunSuccessful(summary)) {
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error("❌", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
