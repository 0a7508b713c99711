import fs from "fs-extra";
import { fileURLToPath } from "node:url";

export interface SignalEmoji {
  emoji: string;
  shortcodes: string[];
}

export const DEFAULT_SIGNAL_CATALOG_PATH = fileURLToPath(new URL("./data/signal-emojis.json", import.meta.url));

export async function loadSignalCatalog(filePath: string = DEFAULT_SIGNAL_CATALOG_PATH): Promise<SignalEmoji[]> {
  const parsed: unknown = await fs.readJson(filePath);
  if (!Array.isArray(parsed)) {
    throw new Error(`Signal emoji catalog must contain a JSON array: ${filePath}`);
  }
  return parsed.map((entry: unknown, index) => {
    if (
      typeof entry !== "object" ||
      entry === null ||
      !("emoji" in entry) ||
      typeof entry.emoji !== "string" ||
      !("shortcodes" in entry) ||
      !Array.isArray(entry.shortcodes)
    ) {
      throw new Error(`Invalid signal emoji entry at index ${index} in ${filePath}`);
    }
    const shortcodes = entry.shortcodes
      .filter((code: unknown): code is string => typeof code === "string")
      .map((code) => code.toLowerCase());
    return { emoji: entry.emoji, shortcodes };
  });
}

/**
 * Catalog emojis present in `text`, either literally or as a markdown
 * shortcode (case-insensitive), in catalog order and without repeats.
 */
export function detectSignalEmojis(text: string | null | undefined, catalog: SignalEmoji[]): string[] {
  if (!text) {
    return [];
  }
  const lowered = text.toLowerCase();
  const found: string[] = [];
  for (const { emoji, shortcodes } of catalog) {
    if (found.includes(emoji)) {
      continue;
    }
    if (text.includes(emoji) || shortcodes.some((code) => lowered.includes(code))) {
      found.push(emoji);
    }
  }
  return found;
}
