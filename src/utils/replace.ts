import { withImplementation } from '../descriptor';
import {
  Constructor,
  DescriptorOptions,
  IServiceRegistry,
  ServiceIdentifier,
} from '../types';
import { assertArgument, assertWritable } from './assert';
import { runAll } from './each';

/**
 * Swaps implementation of every record registered for `serviceType`.
 * Each replacement keeps lifetime of the record it replaces
 * and is appended to the end, replacements keep order of the originals.
 * @example ```
 * services.addSingleton(IClock, SystemClock).addTransient(IClock, SystemClock);
 * replaceAll(services, IClock, FakeClock);
 * // [FakeClock singleton, FakeClock transient]
 * ```
 */
export const replaceAll = <R extends IServiceRegistry, T>(
  registry: R,
  serviceType: ServiceIdentifier<T>,
  implementationType: Constructor<any[], T>,
  options?: DescriptorOptions,
): R => {
  assertArgument(registry, 'registry');
  assertArgument(serviceType, 'serviceType');
  assertArgument(implementationType, 'implementationType');
  assertWritable(registry);
  const replaced = [...registry].filter((d) => d.serviceType === serviceType);
  const replacements = replaced.map((d) =>
    withImplementation(d, implementationType, options),
  );
  runAll(
    replaced.flatMap((d, i): (() => unknown)[] => [
      () => registry.remove(d),
      () => registry.add(replacements[i]),
    ]),
  );
  return registry;
};
