import { ResourceUnavailableError } from "../../domain/errors/index.js";
import {
  randomIndex,
  type RandomNumberGenerator,
} from "../../domain/entities/random.js";
import type { WordSource } from "../../domain/ports/WordSource.js";

export class RandomWordSource implements WordSource {
  readonly #pool: readonly string[];
  readonly #rng: RandomNumberGenerator;

  constructor(pool: readonly string[], rng: RandomNumberGenerator = Math.random) {
    if (pool.length === 0) {
      throw new ResourceUnavailableError("word pool", "pool is empty");
    }

    this.#pool = Object.freeze([...pool]);
    this.#rng = rng;
  }

  get size(): number {
    return this.#pool.length;
  }

  next(): string {
    const word = this.#pool[randomIndex(this.#pool.length, this.#rng)];
    if (word === undefined) {
      throw new ResourceUnavailableError("word pool", "draw fell outside the pool");
    }
    return word;
  }
}
