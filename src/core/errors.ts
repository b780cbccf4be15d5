export class CapflowError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'CapflowError';
  }
}

export class ConfigError extends CapflowError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ServerRegistrationError extends CapflowError {
  constructor(message: string, public readonly server: string) {
    super(message, 'SERVER_REGISTRATION');
    this.name = 'ServerRegistrationError';
  }
}

export class NoServerAvailableError extends CapflowError {
  constructor(public readonly capability: string) {
    super(`No registered server offers capability "${capability}"`, 'NO_SERVER_AVAILABLE');
    this.name = 'NoServerAvailableError';
  }
}

export class InvalidDependencyGraphError extends CapflowError {
  constructor(message: string, public readonly tasks: string[]) {
    super(message, 'INVALID_DEPENDENCY_GRAPH');
    this.name = 'InvalidDependencyGraphError';
  }
}

export class CapabilityInvocationError extends CapflowError {
  constructor(
    public readonly taskName: string,
    public readonly capability: string,
    cause: Error,
    public readonly server?: string,
  ) {
    super(
      `Task "${taskName}" failed invoking "${capability}"${server ? ` on ${server}` : ''}: ${cause.message}`,
      'CAPABILITY_INVOCATION_FAILED',
      cause,
    );
    this.name = 'CapabilityInvocationError';
  }
}

export class DependencyFailedError extends CapflowError {
  constructor(public readonly taskName: string, public readonly dependency: string) {
    super(`Task "${taskName}" not dispatched: dependency "${dependency}" failed`, 'DEPENDENCY_FAILED');
    this.name = 'DependencyFailedError';
  }
}

export class RunCancelledError extends CapflowError {
  constructor(public readonly taskName: string) {
    super(`Task "${taskName}" not started: run was cancelled`, 'RUN_CANCELLED');
    this.name = 'RunCancelledError';
  }
}

/**
 * Normalize anything thrown by a server into an Error.
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}
