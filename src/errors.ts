/**
 * Raised when parameters are rejected before any pixel is computed
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
