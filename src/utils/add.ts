import { describeFactory, describeType } from '../descriptor';
import {
  Constructor,
  DescriptorOptions,
  IServiceRegistry,
  ImplementationFactory,
  Lifetime,
  ServiceIdentifier,
} from '../types';
import { assertArgument, assertWritable } from './assert';
import { runAll } from './each';
import { isRegistered } from './lookup';
import { removeFirst } from './remove';

/**
 * Adds record only if nothing registered for `serviceType` yet.
 * @example ```
 * addIfAbsent(services, ILogger, ConsoleLogger, Lifetime.Singleton);
 * addIfAbsent(services, ILogger, FileLogger, Lifetime.Singleton); // ignored
 * ```
 */
export const addIfAbsent = <R extends IServiceRegistry, T>(
  registry: R,
  serviceType: ServiceIdentifier<T>,
  implementationType: Constructor<any[], T>,
  lifetime: Lifetime,
  options?: DescriptorOptions,
): R => {
  assertArgument(registry, 'registry');
  assertWritable(registry);
  const descriptor = describeType(
    serviceType,
    implementationType,
    lifetime,
    options,
  );
  if (!isRegistered(registry, serviceType)) {
    registry.add(descriptor);
  }
  return registry;
};

export const addSingletonIfAbsent = <R extends IServiceRegistry, T>(
  registry: R,
  serviceType: ServiceIdentifier<T>,
  implementationType: Constructor<any[], T>,
  options?: DescriptorOptions,
): R =>
  addIfAbsent(
    registry,
    serviceType,
    implementationType,
    Lifetime.Singleton,
    options,
  );

export const addScopedIfAbsent = <R extends IServiceRegistry, T>(
  registry: R,
  serviceType: ServiceIdentifier<T>,
  implementationType: Constructor<any[], T>,
  options?: DescriptorOptions,
): R =>
  addIfAbsent(registry, serviceType, implementationType, Lifetime.Scoped, options);

export const addTransientIfAbsent = <R extends IServiceRegistry, T>(
  registry: R,
  serviceType: ServiceIdentifier<T>,
  implementationType: Constructor<any[], T>,
  options?: DescriptorOptions,
): R =>
  addIfAbsent(
    registry,
    serviceType,
    implementationType,
    Lifetime.Transient,
    options,
  );

/**
 * Removes first record registered for `serviceType` and appends new one.
 * Other records of the same service, if any, stay untouched.
 */
export const addOrReplace = <R extends IServiceRegistry, T>(
  registry: R,
  serviceType: ServiceIdentifier<T>,
  implementationType: Constructor<any[], T>,
  lifetime: Lifetime,
  options?: DescriptorOptions,
): R => {
  assertArgument(registry, 'registry');
  assertWritable(registry);
  const descriptor = describeType(
    serviceType,
    implementationType,
    lifetime,
    options,
  );
  runAll([
    () => removeFirst(registry, serviceType),
    () => registry.add(descriptor),
  ]);
  return registry;
};

/**
 * Appends factory record if `condition` returns true.
 * Condition is evaluated once, right away.
 * @example ```
 * addWhen(
 *   services,
 *   () => config.metricsEnabled,
 *   'metrics',
 *   (r) => new Metrics(r.get(Config)),
 *   Lifetime.Singleton,
 * );
 * ```
 */
export const addWhen = <R extends IServiceRegistry, T>(
  registry: R,
  condition: () => boolean,
  serviceType: ServiceIdentifier<T>,
  factory: ImplementationFactory<T>,
  lifetime: Lifetime,
): R => {
  assertArgument(registry, 'registry');
  assertArgument(condition, 'condition');
  assertWritable(registry);
  const descriptor = describeFactory(serviceType, factory, lifetime);
  if (condition()) {
    registry.add(descriptor);
  }
  return registry;
};
