import { loadGlossaryFile, type GlossaryEntry } from "../glossary/glossary.js";

/** Reads `--flag value` pairs and bare `--switch` flags. */
export function readFlags(argv: string[], switches: readonly string[]): Map<string, string | true> {
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined || !arg.startsWith("--")) {
      throw new Error(`Unexpected argument: ${arg}`);
    }

    const name = arg.slice(2);
    if (switches.includes(name)) {
      flags.set(name, true);
      continue;
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for --${name}`);
    }
    flags.set(name, value);
    i++;
  }

  return flags;
}

export function stringFlag(flags: Map<string, string | true>, name: string): string | undefined {
  const value = flags.get(name);
  return typeof value === "string" ? value : undefined;
}

export function intFlag(flags: Map<string, string | true>, name: string): number | undefined {
  const value = stringFlag(flags, name);
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid --${name} '${value}'. Expected a non-negative integer.`);
  }
  return n;
}

export function readGlossaryFlag(flags: Map<string, string | true>): GlossaryEntry[] | undefined {
  const termsFile = stringFlag(flags, "terms-file");
  return termsFile ? loadGlossaryFile(termsFile) : undefined;
}
