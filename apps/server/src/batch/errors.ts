import type { UpstreamCategory } from "@core-types";

/** Bad invocation of the runner or service. Fatal for the whole call. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A collaborator (option data, discount curve) failed. */
export class UpstreamError extends Error {
  constructor(
    message: string,
    readonly category: UpstreamCategory = "unknown",
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "UpstreamError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
