import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { cfg } from "../config/env.js";
import { log } from "../utils/logger.js";
import { MissingValueError, UnknownPlaceholderError } from "./errors.js";

const templateLog = log.withScope("template");

/**
 * `{name}` is a placeholder; `{{` and `}}` are escaped braces.
 * Any other brace is plain text.
 */
const TOKEN_PATTERN = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export const NOVEL_CHAPTER_TEMPLATE_ID = "novel-chapter";

const DEFAULT_NOVEL_CHAPTER_PATH = fileURLToPath(
  new URL("../../prompts/novel-chapter.txt", import.meta.url),
);

export type PromptTemplate = {
  id: string;
  sourcePath: string | null;
  body: string;
  /** Placeholder names in order of first appearance, without duplicates. */
  placeholders: readonly string[];
  /** Values for optional placeholders; every other placeholder is required. */
  defaults: Readonly<Record<string, string>>;
};

export type TemplateValues = Readonly<Record<string, string | undefined>>;

/** What to do with a supplied key that names no placeholder. */
export type UnknownKeyPolicy = "reject" | "ignore";

export type RenderOptions = {
  unknownKeys?: UnknownKeyPolicy;
};

function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

export function parsePlaceholders(body: string): string[] {
  const names: string[] = [];
  for (const match of body.matchAll(TOKEN_PATTERN)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

export function createPromptTemplate(args: {
  id: string;
  body: string;
  defaults?: Record<string, string>;
  sourcePath?: string | null;
}): PromptTemplate {
  const placeholders = parsePlaceholders(args.body);
  const defaults = { ...(args.defaults ?? {}) };

  for (const name of Object.keys(defaults)) {
    if (!placeholders.includes(name)) {
      throw new Error(`Template '${args.id}' declares a default for unknown placeholder '${name}'`);
    }
  }

  return Object.freeze({
    id: args.id,
    sourcePath: args.sourcePath ?? null,
    body: args.body,
    placeholders: Object.freeze(placeholders),
    defaults: Object.freeze(defaults),
  });
}

export function loadPromptTemplate(
  filePath: string,
  opts: { id?: string; defaults?: Record<string, string> } = {},
): PromptTemplate {
  const resolved = path.resolve(filePath);
  let body = fs.readFileSync(resolved, "utf-8");
  if (body.charCodeAt(0) === 0xfeff) {
    body = body.slice(1);
  }

  const template = createPromptTemplate({
    id: opts.id ?? path.basename(resolved, path.extname(resolved)),
    body,
    defaults: opts.defaults,
    sourcePath: resolved,
  });

  templateLog.debug(`Loaded template ${template.id} from ${resolved}`, {
    placeholders: template.placeholders,
  });
  return template;
}

/**
 * Substitutes every placeholder in one pass. Inserted values are never
 * re-scanned, so a value containing braces comes out verbatim.
 */
export function renderPromptTemplate(
  template: PromptTemplate,
  values: TemplateValues,
  options: RenderOptions = {},
): string {
  const resolved = new Map<string, string>();
  const missing: string[] = [];

  for (const name of template.placeholders) {
    const supplied = ownValue(values, name);
    const fallback = ownValue(template.defaults, name);

    if (fallback !== undefined) {
      resolved.set(name, supplied ?? fallback);
    } else if (supplied !== undefined && supplied.trim() !== "") {
      resolved.set(name, supplied);
    } else {
      missing.push(name);
    }
  }

  if (missing.length > 0) {
    throw new MissingValueError(template.id, missing);
  }

  if ((options.unknownKeys ?? "reject") === "reject") {
    const unknown = Object.keys(values).filter(
      (key) => values[key] !== undefined && !template.placeholders.includes(key),
    );
    if (unknown.length > 0) {
      throw new UnknownPlaceholderError(template.id, unknown);
    }
  }

  return template.body.replace(TOKEN_PATTERN, (token: string, name: string | undefined) => {
    if (name === undefined) {
      return token === "{{" ? "{" : "}";
    }
    const value = resolved.get(name);
    if (value === undefined) {
      throw new MissingValueError(template.id, [name]);
    }
    return value;
  });
}

let novelChapterTemplate: PromptTemplate | null = null;

export function getNovelChapterTemplate(): PromptTemplate {
  if (!novelChapterTemplate) {
    novelChapterTemplate = loadPromptTemplate(cfg.prompts.templatePath ?? DEFAULT_NOVEL_CHAPTER_PATH, {
      id: NOVEL_CHAPTER_TEMPLATE_ID,
      defaults: { terminology: "" },
    });
  }
  return novelChapterTemplate;
}

export function getDefaultNovelChapterTemplatePath(): string {
  return DEFAULT_NOVEL_CHAPTER_PATH;
}
