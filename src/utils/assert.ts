import { InvalidArgumentError, InvalidStateError } from '../errors';
import { IServiceRegistry } from '../types';

/**
 * Throws `InvalidArgumentError` if value is `null` or `undefined`.
 * @param value
 * @param argumentName name reported in error
 */
export function assertArgument<T>(
  value: T,
  argumentName: string,
): asserts value is NonNullable<T> {
  if (value === undefined || value === null) {
    throw new InvalidArgumentError(argumentName);
  }
}

/**
 * Throws `InvalidStateError` if registry rejects mutations.
 */
export function assertWritable(registry: IServiceRegistry) {
  if (registry.isReadOnly) {
    throw new InvalidStateError('Registry is read only.');
  }
}
