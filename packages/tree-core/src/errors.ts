// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Thrown when an item is asked for an attribute it does not carry. */
export class MissingAttributeError extends Error {
  readonly kind = 'missing-attribute';

  constructor(public readonly attribute: string) {
    super(`Item has no attribute "${attribute}"`);
    this.name = 'MissingAttributeError';
  }
}

/** Thrown when builder or forest options fail validation. */
export class ConfigurationError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * A tree node with a shape the induction algorithm never produces.
 * Indicates a bug, not bad input.
 */
export class TreeInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TreeInvariantError';
  }
}
