/**
 * Harness error taxonomy
 *
 * Session-fatal: ConfigurationError, BootstrapError.
 * Test-fatal: FixtureError, ProvisioningError, TimeoutError, DataFormatError.
 */
export class HarnessError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed or unreadable run configuration, or an invalid test declaration
 */
export class ConfigurationError extends HarnessError {}

/**
 * Required directories could not be created
 */
export class BootstrapError extends HarnessError {}

/**
 * Fixture graph problem: unknown name, cycle or scope violation
 */
export class FixtureError extends HarnessError {}

/**
 * One or more teardowns of a scope failed
 * Every teardown still ran; the failures are collected here.
 */
export class FixtureTeardownError extends HarnessError {
  constructor(
    readonly scopeId: string,
    readonly errors: unknown[]
  ) {
    super(
      `${errors.length} teardown(s) failed in scope ${scopeId}: ${errors
        .map((error) => (error instanceof Error ? error.message : String(error)))
        .join('; ')}`
    );
  }
}

/**
 * A browser (or another external resource) could not be launched
 */
export class ProvisioningError extends HarnessError {}

/**
 * An explicit wait or request exceeded its deadline
 */
export class TimeoutError extends HarnessError {
  constructor(
    message: string,
    readonly timeoutMs: number,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Persisted or received data could not be decoded
 */
export class DataFormatError extends HarnessError {
  constructor(
    message: string,
    readonly source: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Normalise anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
