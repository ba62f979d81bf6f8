export const SUPPORTED_LANGUAGES: Readonly<Record<string, string>> = Object.freeze({
  ja: "Japanese",
  zh: "Chinese",
  ko: "Korean",
  en: "English",
  es: "Spanish",
  fr: "French",
  de: "German",
  it: "Italian",
  pt: "Portuguese",
  ru: "Russian",
  vi: "Vietnamese",
  th: "Thai",
  id: "Indonesian",
});

/**
 * Accepts an ISO code ("ja") or a display name ("japanese") and returns the
 * display name. Anything else is passed through so callers may name a
 * language that is not in the table.
 */
export function resolveLanguageName(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new Error("Language name must not be empty");
  }

  const lowered = trimmed.toLowerCase();
  for (const [code, name] of Object.entries(SUPPORTED_LANGUAGES)) {
    if (code === lowered || name.toLowerCase() === lowered) {
      return name;
    }
  }
  return trimmed;
}
