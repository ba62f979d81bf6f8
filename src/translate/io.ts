import fs from "node:fs";
import path from "node:path";
import { log } from "../utils/logger.js";

const ioLog = log.withScope("translate");

const CHAPTER_EXTENSIONS = new Set([".txt", ".md"]);

export function tempFilename(filename: string): string {
  return `.temp_${filename}`;
}

/** Chapter files in a working directory, sorted by name. Hidden files are never chapters. */
export function listChapterFiles(dir: string): string[] {
  return fs
    .readdirSync(path.resolve(dir), { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => !name.startsWith(".") && CHAPTER_EXTENSIONS.has(path.extname(name).toLowerCase()))
    .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));
}

export function readChapter(dir: string, filename: string): string {
  return fs.readFileSync(path.join(path.resolve(dir), filename), "utf-8");
}

/**
 * Writes to `.temp_<name>` first and renames over the chapter, so a failed
 * write leaves the original untouched.
 */
export function writeChapterAtomically(dir: string, filename: string, text: string): string {
  const root = path.resolve(dir);
  const targetPath = path.join(root, filename);
  const tempPath = path.join(root, tempFilename(filename));

  try {
    fs.writeFileSync(tempPath, text, "utf-8");
    fs.renameSync(tempPath, targetPath);
  } catch (err) {
    try {
      fs.rmSync(tempPath, { force: true });
    } catch (cleanupErr) {
      ioLog.warn(`Could not remove ${tempPath}`, {
        error: cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr),
      });
    }
    throw err;
  }

  return targetPath;
}
