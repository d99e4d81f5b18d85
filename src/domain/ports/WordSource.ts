/**
 * Supplies the words a team describes. Each call is an independent draw, so
 * the same word may come up again within a round.
 */
export interface WordSource {
  next(): string;
}
