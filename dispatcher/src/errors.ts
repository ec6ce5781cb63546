/**
 * Error taxonomy
 *
 * NotFoundError and UnknownRunnerError signal misuse and propagate to the
 * caller. The environmental errors (state, probe, compute control) are
 * caught inside the decision façade and reported as degraded notes.
 */

export class GantryError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Query for a runner the ontology does not know
 */
export class NotFoundError extends GantryError {
  constructor(public readonly runnerKey: string) {
    super('NOT_FOUND', `Runner not registered: ${runnerKey}`);
  }
}

/**
 * Runner key that would collide with plain-object built-ins
 */
export class InvalidRunnerKeyError extends GantryError {
  constructor(public readonly runnerKey: string) {
    super('INVALID_RUNNER_KEY', `Runner key is reserved: ${runnerKey}`);
  }
}

/**
 * Outcome reported for a runner the ontology does not know
 */
export class UnknownRunnerError extends GantryError {
  constructor(public readonly runnerKey: string) {
    super('UNKNOWN_RUNNER', `Cannot record outcome for unknown runner: ${runnerKey}`);
  }
}

/**
 * Outcome report with impossible values (negative duration or cost)
 */
export class InvalidObservationError extends GantryError {
  constructor(message: string) {
    super('INVALID_OBSERVATION', message);
  }
}

export class StatePersistenceError extends GantryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STATE_PERSISTENCE', message, options);
  }
}

export class AvailabilityProbeError extends GantryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AVAILABILITY_PROBE', message, options);
  }
}

export class LifecycleControlError extends GantryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LIFECYCLE_CONTROL', message, options);
  }
}

/**
 * Job declaration or CI file that cannot be read
 */
export class InvalidJobError extends GantryError {
  constructor(message: string, public readonly issues: string[] = []) {
    super('INVALID_JOB', message);
  }
}

/**
 * Invalid fleet definition file
 */
export class FleetConfigError extends GantryError {
  constructor(message: string, public readonly issues: string[] = []) {
    super('FLEET_CONFIG', message);
  }
}

/**
 * Environment variable with a value the dispatcher cannot use
 */
export class ConfigurationError extends GantryError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
