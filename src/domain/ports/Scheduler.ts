import type { CountdownElapsed } from "../commands/CountdownElapsed.js";

/**
 * Infrastructure abstraction responsible for delivering time-based commands to the domain.
 *
 * Implementations may rely on in-memory timers or real ones. They must keep at most one pending
 * timeout per phase, and the commands they deliver are idempotent: a timeout that fires after the
 * game has moved on is ignored by the command itself.
 */
export interface Scheduler {
  scheduleTimeout(phase: CountdownElapsed["phase"], delayMs: number): Promise<void>;
}
