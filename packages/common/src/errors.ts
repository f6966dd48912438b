export type ErrorContext = Record<string, string | number | boolean | undefined>;

/**
 * Base class for every fatal simulation error. The context carries the step
 * index and entity ids involved so that an aborted run can be diagnosed from
 * the log line alone.
 */
export class SimulationError extends Error {
  context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'SimulationError';
    this.context = { ...context };
  }

  /**
   * Merges additional context (typically the step index) while the error
   * propagates out of the step loop. Existing keys win.
   */
  addContext(context: ErrorContext): this {
    this.context = { ...context, ...this.context };
    return this;
  }
}

/** Malformed or inconsistent dataset. Raised before the engine starts running. */
export class DatasetError extends SimulationError {
  issues: string[];

  constructor(message: string, context: ErrorContext = {}, issues: string[] = []) {
    super(message, context);
    this.name = 'DatasetError';
    this.issues = issues;
  }
}

/** A relocation would push a server's allocation past its capacity. */
export class CapacityError extends SimulationError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'CapacityError';
  }
}

/** No route can carry a service or its images to the target server. */
export class RoutingError extends SimulationError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'RoutingError';
  }
}

/** Registry miss. */
export class LookupError extends SimulationError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'LookupError';
  }
}

export class DuplicateRegistrationError extends LookupError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'DuplicateRegistrationError';
  }
}

/** Operation attempted in a state that does not allow it. */
export class LifecycleError extends SimulationError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'LifecycleError';
  }
}

export class ConfigError extends SimulationError {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
