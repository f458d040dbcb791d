export class DigestError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "DigestError";
  }
}

export class SessionNotFoundError extends DigestError {
  constructor(
    message: string,
    public projectPath?: string,
    public searchedPath?: string,
  ) {
    super(message, "SESSION_NOT_FOUND", { projectPath, searchedPath });
    this.name = "SessionNotFoundError";
  }
}

export class ConfigurationError extends DigestError {
  constructor(message: string, configKey?: string) {
    super(message, "CONFIGURATION_ERROR", { configKey });
    this.name = "ConfigurationError";
  }
}

export class SummarizerError extends DigestError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "SUMMARIZER_ERROR", context);
    this.name = "SummarizerError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
