/**
 * Raised when document classes are declared in a way the compiler cannot map.
 * These are caller defects and are never retried.
 */
export class MappingConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MappingConfigurationError';
    Object.setPrototypeOf(this, MappingConfigurationError.prototype);
  }
}
