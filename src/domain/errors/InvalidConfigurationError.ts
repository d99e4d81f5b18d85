export class InvalidConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "InvalidConfigurationError";
  }

  static because(issues: readonly string[]): InvalidConfigurationError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid game configuration"
        : issues.length === 1
          ? (firstIssue ?? "Invalid game configuration")
          : `Invalid game configuration: ${issues.join("; ")}`;
    return new InvalidConfigurationError(message, issues);
  }
}
