import { ServiceIdentifier, ServiceToken } from './types';

/**
 * Human readable name of service identifier for error messages.
 * @example
 * ```
 * describeIdentifier(ConsoleLogger) // 'ConsoleLogger'
 * describeIdentifier(new ServiceToken('ILogger')) // 'ILogger'
 * describeIdentifier(Symbol('db')) // 'Symbol(db)'
 * ```
 */
export const describeIdentifier = (id: ServiceIdentifier): string => {
  if (typeof id === 'function') {
    return id.name || '<anonymous class>';
  }
  if (id instanceof ServiceToken) {
    return id.description;
  }
  return id.toString();
};

export class InvalidArgumentError extends Error {
  constructor(
    readonly argumentName: string,
    message = `Argument "${argumentName}" is required.`,
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}

export class UnresolvedServiceError extends Error {
  constructor(readonly serviceType: ServiceIdentifier) {
    super(
      `No service registered for "${describeIdentifier(serviceType)}" key.`,
    );
    this.name = 'UnresolvedServiceError';
  }
}

export class CircularDependencyError extends Error {
  constructor(stack: ServiceIdentifier[]) {
    const last = stack[stack.length - 1];
    const circularStackDescription = stack
      .map((k) =>
        k === last ? `*${describeIdentifier(k)}*` : describeIdentifier(k),
      )
      .join(' -> ');
    super(`Circular dependency detected ${circularStackDescription}.`);
    this.name = 'CircularDependencyError';
  }
}
