/**
 * @module errors
 * Error taxonomy for the cutout pipeline.
 */

/** Bounds detection found no mask pixel at or above the threshold. */
export class NoObjectDetectedError extends Error {
  constructor(message = 'no object detected in image') {
    super(message);
    this.name = 'NoObjectDetectedError';
  }
}

/** A crop received an absent, empty or mis-sized mask. */
export class InvalidMaskError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMaskError';
  }
}

/** The inference engine failed or returned unusable output. */
export class InferenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InferenceError';
  }
}

/** A configuration value is out of range. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A facade method was called before `initialize()` or after `dispose()`. */
export class NotInitializedError extends Error {
  constructor(message = 'Remover not initialized. Call initialize() first.') {
    super(message);
    this.name = 'NotInitializedError';
  }
}
