import { IServiceRegistry, ServiceDescriptor, ServiceIdentifier } from '../types';
import { InvalidArgumentError } from '../errors';
import { assertArgument, assertWritable } from './assert';
import { runAll } from './each';

/**
 * Removes every record matching `predicate`.
 * Predicate runs over snapshot taken before any removal,
 * survivors keep their relative order.
 * @example ```
 * removeWhere(services, (d) => d.lifetime === Lifetime.Transient);
 * ```
 */
export const removeWhere = <R extends IServiceRegistry>(
  registry: R,
  predicate: (descriptor: ServiceDescriptor) => boolean,
): R => {
  assertArgument(registry, 'registry');
  assertArgument(predicate, 'predicate');
  assertWritable(registry);
  const toRemove = [...registry].filter((d) => predicate(d));
  runAll(toRemove.map((d) => () => registry.remove(d)));
  return registry;
};

/**
 * Removes first record registered for `serviceType`, does nothing if there is none.
 */
export const removeFirst = <R extends IServiceRegistry>(
  registry: R,
  serviceType: ServiceIdentifier,
): R => {
  assertArgument(registry, 'registry');
  assertArgument(serviceType, 'serviceType');
  assertWritable(registry);
  for (const descriptor of registry) {
    if (descriptor.serviceType === serviceType) {
      registry.remove(descriptor);
      break;
    }
  }
  return registry;
};

/**
 * Removes every record registered for any of `serviceTypes`.
 * @example ```
 * removeAll(services, [ILogger, 'metrics']);
 * ```
 */
export const removeAll = <R extends IServiceRegistry>(
  registry: R,
  serviceTypes: readonly ServiceIdentifier[] | ReadonlySet<ServiceIdentifier>,
): R => {
  assertArgument(registry, 'registry');
  assertArgument(serviceTypes, 'serviceTypes');
  // a string is iterable over its characters
  if (typeof serviceTypes === 'string') {
    throw new InvalidArgumentError(
      'serviceTypes',
      'Argument "serviceTypes" must be an array or set of service types.',
    );
  }
  const keys = new Set(serviceTypes);
  return removeWhere(registry, (d) => keys.has(d.serviceType));
};

/**
 * Removes every record registered for `serviceType`.
 */
export const removeAllOf = <R extends IServiceRegistry>(
  registry: R,
  serviceType: ServiceIdentifier,
): R => {
  assertArgument(registry, 'registry');
  assertArgument(serviceType, 'serviceType');
  return removeWhere(registry, (d) => d.serviceType === serviceType);
};
