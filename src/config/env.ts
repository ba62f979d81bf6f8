import "dotenv/config";
import type { Config, LlmProvider, LogFormat, LogLevel } from "./types.js";
import { redactConfigSnapshot } from "./redact.js";

function opt(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optAny(names: string[]): string | undefined {
  for (const name of names) {
    const v = opt(name);
    if (v) return v;
  }
  return undefined;
}

function optInt(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid non-negative integer for ${name}: ${v}`);
  return n;
}

function optFloat(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new Error(`Invalid number for ${name}: ${v}`);
  return n;
}

function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = opt(name);
  if (!v) return def;
  const match = allowed.find((item) => item === v.toLowerCase());
  if (match) return match;
  throw new Error(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
}

function providerApiKey(provider: LlmProvider): string | undefined {
  if (provider === "groq") return optAny(["LLM_API_KEY", "GROQ_API_KEY"]);
  return optAny(["LLM_API_KEY", "OPENAI_API_KEY"]);
}

export function loadConfig(): Config {
  const provider = enumOf<LlmProvider>("LLM_PROVIDER", ["openai", "groq"] as const, "openai");
  const segmentSize = optInt("TRANSLATE_SEGMENT_SIZE", 0);
  const scopes = opt("LOG_SCOPES")
    ?.split(",")
    .map((s) => s.trim())
    .filter((s) => s);

  return {
    llm: {
      provider,
      apiKey: providerApiKey(provider),
      baseUrl: opt("LLM_BASE_URL"),
      model: opt("LLM_MODEL") ?? "gpt-4o-mini",
      temperature: optFloat("LLM_TEMPERATURE", 0.3),
      maxTokens: optInt("LLM_MAX_TOKENS", 8000),
    },

    translate: {
      delayMs: optInt("TRANSLATE_DELAY_MS", 5000),
      segmentSize: segmentSize > 0 ? segmentSize : null,
    },

    prompts: {
      templatePath: opt("PROMPT_TEMPLATE_PATH"),
    },

    db: {
      filename: opt("DATA_DB_FILENAME") ?? ".translations.sqlite",
    },

    logging: {
      level: enumOf<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: scopes && scopes.length > 0 ? scopes : undefined,
      format: enumOf<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };
}

export function printConfigSnapshot(cfg: Config): void {
  const snap = redactConfigSnapshot({
    LLM_PROVIDER: cfg.llm.provider,
    LLM_API_KEY: cfg.llm.apiKey,
    LLM_BASE_URL: cfg.llm.baseUrl,
    LLM_MODEL: cfg.llm.model,
    LLM_TEMPERATURE: cfg.llm.temperature,
    LLM_MAX_TOKENS: cfg.llm.maxTokens,
    TRANSLATE_DELAY_MS: cfg.translate.delayMs,
    TRANSLATE_SEGMENT_SIZE: cfg.translate.segmentSize,
    PROMPT_TEMPLATE_PATH: cfg.prompts.templatePath,
    DATA_DB_FILENAME: cfg.db.filename,
    LOG_LEVEL: cfg.logging.level,
    LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: cfg.logging.format,
  });

  console.log("=== TRANSLATOR CONFIG SNAPSHOT ===");
  console.log(JSON.stringify(snap, null, 2));
  console.log("==================================");
}

export const cfg = loadConfig();
