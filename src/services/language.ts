import type { Language } from "../types/patch.js";

/** File extension → language, used to group patches into buckets */
const LANGUAGE_BY_EXTENSION: ReadonlyMap<string, Language> = new Map<string, Language>([
  ["py", "python"],
  ["js", "javascript"],
  ["jsx", "javascript"],
  ["ts", "typescript"],
  ["tsx", "typescript"],
  ["md", "markdown"],
  ["txt", "text"],
]);

/**
 * Detect a file's language from the text after its last dot.
 *
 * Names without a dot (Makefile, LICENSE) and unmapped extensions are
 * "unknown".
 */
export function detectLanguage(filename: string): Language {
  const base = filename.slice(filename.lastIndexOf("/") + 1);
  const dot = base.lastIndexOf(".");
  if (dot === -1) return "unknown";

  return LANGUAGE_BY_EXTENSION.get(base.slice(dot + 1).toLowerCase()) ?? "unknown";
}
