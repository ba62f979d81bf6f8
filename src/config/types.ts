export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "pretty" | "json";

export type LlmProvider = "openai" | "groq";

export interface Config {
  llm: {
    provider: LlmProvider;
    apiKey?: string;
    baseUrl?: string;
    model: string;
    temperature: number;
    maxTokens: number;
  };

  translate: {
    delayMs: number;
    segmentSize: number | null; // null => whole chapter per request
  };

  prompts: {
    templatePath?: string;
  };

  db: {
    filename: string;
  };

  logging: {
    level: LogLevel;
    scopes?: string[]; // empty/undefined => all
    format: LogFormat;
  };
}
