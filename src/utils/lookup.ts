import {
  Capability,
  IServiceRegistry,
  ServiceDescriptor,
  ServiceIdentifier,
  TryResult,
} from '../types';
import { assertArgument } from './assert';

/**
 * true if at least one record registered for `serviceType`, false otherwise.
 * Lifetime and implementation are not considered.
 * @param registry
 * @param serviceType
 */
export const isRegistered = (
  registry: IServiceRegistry,
  serviceType: ServiceIdentifier,
): boolean => {
  assertArgument(registry, 'registry');
  assertArgument(serviceType, 'serviceType');
  for (const descriptor of registry) {
    if (descriptor.serviceType === serviceType) return true;
  }
  return false;
};

/**
 * First record registered for `serviceType`.
 * @example ```
 * const { found, value } = tryFindDescriptor(services, ILogger);
 * if (found) console.log(value.lifetime);
 * ```
 */
export const tryFindDescriptor = (
  registry: IServiceRegistry,
  serviceType: ServiceIdentifier,
): TryResult<ServiceDescriptor> => {
  assertArgument(registry, 'registry');
  assertArgument(serviceType, 'serviceType');
  for (const descriptor of registry) {
    if (descriptor.serviceType === serviceType) {
      return { found: true, value: descriptor };
    }
  }
  return { found: false, value: undefined };
};

/**
 * true if implementation of some record satisfies `capability`:
 * it is the capability class, extends it, is registered under it or declares it in `provides`.
 * Unlike `isRegistered` factory records are not counted, their type is unknown before resolution.
 * @example ```
 * abstract class Store {}
 * class RedisStore extends Store {}
 * services.addSingleton('cache', RedisStore);
 * hasImplementationOf(services, Store); // true
 * isRegistered(services, Store); // false
 * ```
 */
export const hasImplementationOf = (
  registry: IServiceRegistry,
  capability: Capability,
): boolean => {
  assertArgument(registry, 'registry');
  assertArgument(capability, 'capability');
  for (const descriptor of registry) {
    if (descriptor.capabilities.has(capability)) return true;
  }
  return false;
};
