/** Missing API key, bad setting or unusable garment table. Fatal at startup. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/** The language model call failed; the user can try again. */
export class AssistantUnavailableError extends Error {
  constructor(message = 'The assistant is unavailable right now. Please try again.', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssistantUnavailableError';
  }
}
