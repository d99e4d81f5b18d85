export class NoActiveGameError extends Error {
  constructor() {
    super("No game has been initialized");
    this.name = "NoActiveGameError";
  }
}
