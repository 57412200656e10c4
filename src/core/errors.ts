/**
 * Error hierarchy for the conversion pipeline.
 *
 * Setup errors (configuration and registry problems) are fatal and
 * propagate to the caller. {@link RecursionLimitError} is the only error
 * raised while converting content, and the scanner recovers from it.
 *
 * @module core/errors
 */

/** Base class for every error raised by the pipeline. */
export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineError';
  }
}

/** Raised when a plugin receives options it does not recognise or accept. */
export class ConfigurationError extends PipelineError {
  constructor(
    public readonly plugin: string,
    public readonly issues: string[],
  ) {
    super(`Invalid configuration for "${plugin}": ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

/** Raised when a name is registered twice in the same registry. */
export class DuplicateNameError extends PipelineError {
  constructor(
    public readonly registry: string,
    public readonly entry: string,
  ) {
    super(`"${entry}" is already registered in ${registry}`);
    this.name = 'DuplicateNameError';
  }
}

/** Raised when an anchor references a name the registry does not hold. */
export class UnknownAnchorError extends PipelineError {
  constructor(
    public readonly registry: string,
    public readonly anchor: string,
  ) {
    super(`Anchor "${anchor}" is not registered in ${registry}`);
    this.name = 'UnknownAnchorError';
  }
}

/** Raised when anchor constraints cannot be satisfied by any order. */
export class CyclicConstraintError extends PipelineError {
  constructor(
    public readonly registry: string,
    public readonly cycle: string[],
  ) {
    super(`Ordering constraints in ${registry} form a cycle: ${cycle.join(' -> ')}`);
    this.name = 'CyclicConstraintError';
  }
}

/** Raised when a registry is modified after setup has finished. */
export class FrozenRegistryError extends PipelineError {
  constructor(public readonly registry: string) {
    super(`${registry} is frozen; register rules before the first conversion`);
    this.name = 'FrozenRegistryError';
  }
}

/** Raised when nested inline scanning exceeds the configured depth. */
export class RecursionLimitError extends PipelineError {
  constructor(public readonly depth: number) {
    super(`Inline nesting exceeded the maximum depth of ${depth}`);
    this.name = 'RecursionLimitError';
  }
}
