/** Raised when guide text cannot be turned into a usable chapter/section tree. */
export class GuideParseError extends Error {
  readonly code = 'GUIDE_PARSE_FAILED';

  constructor(message: string, readonly details?: unknown) {
    super(message);
    this.name = 'GuideParseError';
  }
}

/** Raised at startup when the environment does not satisfy the config schema. */
export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
