import { readFileSync } from "node:fs";

import { ResourceUnavailableError } from "../../domain/errors/index.js";

/**
 * Reads a JSON array of words. Entries are trimmed; anything other than a
 * non-empty list of non-blank strings is rejected.
 */
export function loadWordList(path: string | URL): string[] {
  const resource = String(path);

  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    throw new ResourceUnavailableError(resource, "file cannot be read", { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ResourceUnavailableError(resource, "file is not valid JSON", {
      cause: error,
    });
  }

  if (!Array.isArray(parsed)) {
    throw new ResourceUnavailableError(resource, "expected a JSON array of words");
  }

  const words: string[] = [];
  for (const entry of parsed) {
    if (typeof entry !== "string" || entry.trim().length === 0) {
      throw new ResourceUnavailableError(resource, "every word must be a non-empty string");
    }
    words.push(entry.trim());
  }

  if (words.length === 0) {
    throw new ResourceUnavailableError(resource, "word list is empty");
  }

  return words;
}
