import { InvalidConfigurationError, ROUND_TIME_RANGE } from "./core.js";

export interface BackendConfig {
  readonly port: number;
  readonly wordsFile: string | URL;
  /** Seeds the word draws so a session can be replayed; random when unset */
  readonly wordSeed: number | undefined;
  readonly defaultRoundTimeSeconds: number;
  readonly debug: boolean;
}

export const DEFAULT_WORDS_FILE = new URL("../../../data/words.json", import.meta.url);

type Env = Readonly<Record<string, string | undefined>>;

export function loadBackendConfig(env: Env = process.env): BackendConfig {
  const issues: string[] = [];

  const readInteger = (name: string, fallback: number | undefined): number | undefined => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
      issues.push(`${name} must be a non-negative integer`);
      return fallback;
    }
    return value;
  };

  const port = readInteger("PORT", 8787) ?? 8787;
  const wordSeed = readInteger("WORD_SEED", undefined);
  const defaultRoundTimeSeconds = readInteger("DEFAULT_ROUND_TIME_SECONDS", 60) ?? 60;
  if (
    defaultRoundTimeSeconds < ROUND_TIME_RANGE.min ||
    defaultRoundTimeSeconds > ROUND_TIME_RANGE.max
  ) {
    issues.push(
      `DEFAULT_ROUND_TIME_SECONDS must be between ${ROUND_TIME_RANGE.min} and ${ROUND_TIME_RANGE.max}`,
    );
  }
  const wordsFile = env["WORDS_FILE"]?.trim() || DEFAULT_WORDS_FILE;

  if (issues.length > 0) {
    throw InvalidConfigurationError.because(issues);
  }

  return {
    port,
    wordsFile,
    wordSeed,
    defaultRoundTimeSeconds,
    debug: Boolean(env["DEBUG"]),
  };
}
