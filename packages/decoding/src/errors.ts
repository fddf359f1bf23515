// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------
// Models' own failures are never wrapped: whatever a model throws during
// fit/apply/score reaches the caller unchanged.
// ---------------------------------------------------------------------------

import type { Capability } from './types.js';

/** Base class for every error raised by the orchestration engine. */
export class SlicewiseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SlicewiseError';
  }
}

/** Invalid ensemble options, e.g. a non-integer `nJobs`. */
export class ConfigurationError extends SlicewiseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/** Input or result tensors with the wrong rank, length or shape. */
export class ShapeError extends SlicewiseError {
  constructor(message: string) {
    super(message);
    this.name = 'ShapeError';
  }
}

/** The model does not expose a requested operation and no fallback applies. */
export class CapabilityError extends SlicewiseError {
  constructor(public readonly capability: Capability) {
    super(`Base estimator does not implement \`${capability}\``);
    this.name = 'CapabilityError';
  }
}

/** Apply or score called before `fit`. */
export class NotFittedError extends SlicewiseError {
  constructor(operation: string) {
    super(`Ensemble must be fitted before calling \`${operation}\``);
    this.name = 'NotFittedError';
  }
}
