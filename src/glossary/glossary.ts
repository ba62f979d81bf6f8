import fs from "node:fs";
import path from "node:path";
import yaml from "yaml";
import { log } from "../utils/logger.js";

const glossaryLog = log.withScope("glossary");

export type GlossaryEntry = {
  source: string;
  /** null for free-text lines that carry no term pair */
  target: string | null;
  note?: string;
};

/** Checked in order; the first separator present on a line wins. */
const SEPARATORS = ["→", "->", "=", ":"] as const;

export function normalizeCustomTerms(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.trim() !== "")
    .join("\n");
}

function parseTermLine(line: string): GlossaryEntry {
  const content = line.replace(/^[-*•]\s+/, "");

  for (const separator of SEPARATORS) {
    const at = content.indexOf(separator);
    if (at < 0) continue;

    const source = content.slice(0, at).trim();
    const target = content.slice(at + separator.length).trim();
    if (source && target) {
      return { source, target };
    }
    break;
  }

  return { source: content.trim(), target: null };
}

/**
 * Parses the free-text custom terms block, one term per line
 * (`魔王 = Demon King`, `Ki -> qi`, ...). Blank lines and `#` comments are skipped.
 */
export function parseCustomTerms(text: string): GlossaryEntry[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"))
    .map(parseTermLine);
}

export function formatGlossary(entries: readonly GlossaryEntry[]): string {
  return entries
    .map((entry) => {
      if (entry.target === null) return `- ${entry.source}`;
      const note = entry.note ? ` (${entry.note})` : "";
      return `- ${entry.source} → ${entry.target}${note}`;
    })
    .join("\n");
}

/**
 * One terminology block from a YAML glossary and a custom terms text, every
 * entry in the `formatGlossary` shape.
 */
export function buildTerminology(
  glossary: readonly GlossaryEntry[] | undefined,
  customTerms: string | undefined,
): string {
  return formatGlossary([...(glossary ?? []), ...parseCustomTerms(customTerms ?? "")]);
}

export function toTerminologyText(terminology: string | readonly GlossaryEntry[] | undefined): string {
  if (terminology === undefined) return "";
  if (typeof terminology === "string") return normalizeCustomTerms(terminology);
  return formatGlossary(terminology);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireText(value: unknown, where: string): string {
  if (typeof value !== "string" && typeof value !== "number") {
    throw new Error(`${where} must be a string`);
  }
  const text = String(value).trim();
  if (!text) throw new Error(`${where} must not be empty`);
  return text;
}

/**
 * Load a YAML glossary:
 *
 *   version: 1
 *   terms:
 *     - source: 魔王
 *       target: Demon King
 *       note: title, never a name
 *
 * Hard fails on schema errors and duplicate source terms.
 */
export function loadGlossaryFile(filePath: string): GlossaryEntry[] {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Glossary file not found: ${resolved}`);
  }

  const raw: unknown = yaml.parse(fs.readFileSync(resolved, "utf-8"));
  if (!isRecord(raw) || !Array.isArray(raw.terms)) {
    throw new Error(`Glossary ${resolved}: expected a 'terms' list`);
  }

  const seen = new Set<string>();
  const entries: GlossaryEntry[] = [];

  raw.terms.forEach((item: unknown, index: number) => {
    const where = `Glossary ${resolved}: terms[${index}]`;
    if (!isRecord(item)) {
      throw new Error(`${where} must be a mapping with source and target`);
    }

    const source = requireText(item.source, `${where}.source`);
    const target = requireText(item.target, `${where}.target`);
    if (seen.has(source)) {
      throw new Error(`${where}: duplicate source term '${source}'`);
    }
    seen.add(source);

    const entry: GlossaryEntry = { source, target };
    if (item.note != null) {
      entry.note = requireText(item.note, `${where}.note`);
    }
    entries.push(entry);
  });

  glossaryLog.debug(`Loaded ${entries.length} terms from ${resolved}`);
  return entries;
}
