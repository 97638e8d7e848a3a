/**
 * Errors callers branch on. Everything else is a plain Error with a message.
 */

/** A transfer could not reach its server: continuing the run is pointless */
export class ConnectionRefusedError extends Error {
  readonly requestId: number;

  constructor(requestId: number, options?: { cause?: unknown }) {
    super(`Request #${requestId}: connection refused`, options);
    this.name = "ConnectionRefusedError";
    this.requestId = requestId;
  }
}

/** The transfer engine's readiness wait failed outright */
export class WaitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WaitError";
  }
}

/** Invalid configuration or command-line input */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
