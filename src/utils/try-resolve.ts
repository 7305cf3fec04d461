import { IServiceRegistry, ServiceIdentifier, TryResult } from '../types';
import { assertArgument } from './assert';

/**
 * Builds new resolver from the whole registry and asks it for `serviceType`.
 *
 * Costly: every call builds resolver from scratch and instantiates
 * the requested service with all its dependencies, singletons included.
 * Build resolver once with `registry.buildResolver()` for repeated lookups.
 *
 * Not found when nothing registered or resolution gives `null` or `undefined`.
 * Errors thrown while constructing registered service are not caught.
 */
export const tryResolveInstance = <T>(
  registry: IServiceRegistry,
  serviceType: ServiceIdentifier<T>,
): TryResult<T> => {
  assertArgument(registry, 'registry');
  assertArgument(serviceType, 'serviceType');
  const value = registry
    .buildResolver()
    .get(serviceType, { allowUnresolved: true });
  if (value === undefined || value === null) {
    return { found: false, value: undefined };
  }
  return { found: true, value };
};
