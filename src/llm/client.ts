import OpenAI from "openai";
import { cfg } from "../config/env.js";
import type { LlmProvider } from "../config/types.js";
import type { LlmCall } from "../translate/types.js";
import { log } from "../utils/logger.js";

const llmLog = log.withScope("llm");

const PROVIDER_BASE_URLS: Record<LlmProvider, string | undefined> = {
  openai: undefined,
  groq: "https://api.groq.com/openai/v1",
};

export type LlmSettings = {
  provider: LlmProvider;
  apiKey?: string;
  baseUrl?: string;
};

const clients = new Map<string, OpenAI>();

export function getLlmClient(settings: LlmSettings = cfg.llm): OpenAI {
  const apiKey = settings.apiKey;
  if (!apiKey) {
    throw new Error(`API key for provider '${settings.provider}' not configured (set LLM_API_KEY in .env)`);
  }

  const baseURL = settings.baseUrl ?? PROVIDER_BASE_URLS[settings.provider];
  const cacheKey = `${baseURL ?? "default"}|${apiKey}`;
  const existing = clients.get(cacheKey);
  if (existing) return existing;

  // retries happen in chat(), never inside the SDK
  const client = new OpenAI({ apiKey, baseURL, maxRetries: 0 });
  clients.set(cacheKey, client);
  return client;
}

/**
 * Retry on: 429 (rate limit), 5xx (server error), or network errors.
 */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof OpenAI.APIConnectionError) return true;
  if (err instanceof OpenAI.APIError) {
    const status = err.status ?? 0;
    if (status === 429 || (status >= 500 && status < 600)) return true;
  }
  if (err instanceof Error && "code" in err) {
    return err.code === "ECONNRESET" || err.code === "ETIMEDOUT";
  }
  return false;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function chat(opts: {
  systemPrompt: string;
  userMessage: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  settings?: LlmSettings;
  retryDelayMs?: number;
}): Promise<string> {
  const client = getLlmClient(opts.settings ?? cfg.llm);

  const model = opts.model ?? cfg.llm.model;
  const temperature = opts.temperature ?? cfg.llm.temperature;
  const maxTokens = opts.maxTokens ?? cfg.llm.maxTokens;

  let lastError: unknown;
  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      const response = await client.chat.completions.create({
        model,
        temperature,
        max_tokens: maxTokens,
        messages: [
          { role: "system", content: opts.systemPrompt },
          { role: "user", content: opts.userMessage },
        ],
      });

      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new Error("Empty response from model");
      }

      return content;
    } catch (err) {
      lastError = err;
      if (attempt === 0 && isRetryableError(err)) {
        llmLog.warn(`Transient LLM error, retrying once: ${errorMessage(err)}`);
        await sleep(opts.retryDelayMs ?? 1500);
        continue;
      }
      break;
    }
  }

  llmLog.error(`LLM API error: ${errorMessage(lastError)}`);
  throw new Error("LLM request failed: " + errorMessage(lastError));
}

/**
 * Adapts `chat` to the injected call used by the translator.
 */
export function createChatLlmCall(overrides: Partial<LlmSettings> = {}): LlmCall {
  const settings: LlmSettings = {
    provider: overrides.provider ?? cfg.llm.provider,
    apiKey: overrides.apiKey ?? cfg.llm.apiKey,
    baseUrl: overrides.baseUrl ?? cfg.llm.baseUrl,
  };

  return (input) =>
    chat({
      systemPrompt: input.systemPrompt,
      userMessage: input.userPrompt,
      model: input.model,
      settings,
    });
}
