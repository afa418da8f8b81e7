/**
 * Error hierarchy for texscribe
 *
 * Every error carries a short description of the object that raised it, so a
 * message like "Cannot write to closed LaTeXEnvironment(center)" can be traced
 * back to the scope that caused it.
 */

/**
 * Anything that can describe itself in an error message
 */
export interface Describable {
  describe(): string;
}

/**
 * Base class of all errors raised by the document model
 */
export class TeXError extends Error {
  readonly resource?: string;

  constructor(message: string, source?: Describable | string, options?: { cause?: unknown }) {
    const resource = typeof source === 'string' ? source : source?.describe();
    super(resource ? `${message} (raised from ${resource})` : message, options);
    this.name = new.target.name;
    this.resource = resource;
  }
}

/**
 * A resource was used in a state that does not allow the operation
 * (writing while not open, opening twice, closing while not open, ...)
 */
export class LifecycleError extends TeXError {}

/**
 * Scopes were opened or closed out of their stack order
 */
export class NestingError extends LifecycleError {}

/**
 * A value handed to the model is malformed
 */
export class TeXValueError extends TeXError {}

/**
 * Two different objects claim the same name in one picture namespace
 */
export class NameConflictError extends TeXValueError {
  constructor(
    readonly conflictingName: string,
    source?: Describable | string
  ) {
    super(`An object named '${conflictingName}' is already defined in this namespace`, source);
  }
}

/**
 * Output file exists and overwriting is disabled
 */
export class OutputExistsError extends TeXError {
  constructor(
    readonly path: string,
    source?: Describable | string
  ) {
    super(`Output file ${path} already exists, pass overwrite: true to replace it`, source);
  }
}

/**
 * The external compiler did not finish within its time limit
 */
export class CompilerTimeoutError extends TeXError {
  constructor(
    readonly command: string,
    readonly timeoutMs: number,
    source?: Describable | string
  ) {
    super(`${command} did not finish within ${timeoutMs}ms`, source);
  }
}
