export class ResourceUnavailableError extends Error {
  constructor(
    public readonly resource: string,
    reason: string,
    options?: { readonly cause?: unknown },
  ) {
    super(`Resource unavailable: ${resource} (${reason})`, options);
    this.name = "ResourceUnavailableError";
  }
}
