import { FALLBACK_WORDS } from "./fallbackWords.js";
import { loadWordList } from "./loadWordList.js";
import { RandomWordSource } from "./RandomWordSource.js";
import type { RandomNumberGenerator } from "../../domain/entities/random.js";
import { ResourceUnavailableError } from "../../domain/errors/index.js";
import type { Logger } from "../../domain/ports/Logger.js";

export interface CreateWordSourceOptions {
  readonly path: string | URL;
  readonly rng?: RandomNumberGenerator | undefined;
  readonly logger?: Logger | undefined;
}

export function createWordSource({
  path,
  rng,
  logger,
}: CreateWordSourceOptions): RandomWordSource {
  try {
    const words = loadWordList(path);
    logger?.info("Word list loaded", { path: String(path), size: words.length });
    return new RandomWordSource(words, rng);
  } catch (error) {
    if (!(error instanceof ResourceUnavailableError)) {
      throw error;
    }

    logger?.warn("Word list unavailable; using built-in fallback words", {
      path: String(path),
      reason: error.message,
    });
    return new RandomWordSource(FALLBACK_WORDS, rng);
  }
}
