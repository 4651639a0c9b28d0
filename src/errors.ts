// Typed errors for the conditions that escape the component detecting them.

/** Frame acquisition failed. Fatal for the running loop. */
export class CaptureFailureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CaptureFailureError";
  }
}

/** Missing or malformed stand configuration. Fatal at startup. */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export class InvalidTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Invalid state transition: ${from} → ${to}`);
    this.name = "InvalidTransitionError";
  }
}
