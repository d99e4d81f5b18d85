/** Used when the configured word list cannot be loaded. */
export const FALLBACK_WORDS: readonly string[] = Object.freeze([
  "cat",
  "house",
  "tree",
  "moon",
  "music",
  "friend",
  "journey",
  "mystery",
  "harmony",
  "teamwork",
]);
