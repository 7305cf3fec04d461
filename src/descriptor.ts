import { InvalidArgumentError } from './errors';
import {
  Capability,
  CapabilityKey,
  CapabilitySet,
  Constructor,
  DescriptorOptions,
  FactoryDescriptor,
  ImplementationFactory,
  InstanceDescriptor,
  Lifetime,
  ServiceDescriptor,
  ServiceIdentifier,
  ServiceToken,
  TypeDescriptor,
} from './types';
import { assertArgument } from './utils/assert';

const lifetimes: readonly unknown[] = Object.values(Lifetime);

export const isLifetime = (l: unknown): l is Lifetime => lifetimes.includes(l);

const isCapability = (id: ServiceIdentifier): id is Capability =>
  typeof id === 'function' || id instanceof ServiceToken;

/**
 * Class itself and all its ancestors up to `Object` (excluded).
 */
const classChain = (type: Function): Function[] => {
  const result: Function[] = [];
  let current: unknown = type;
  while (typeof current === 'function' && current !== Function.prototype) {
    result.push(current);
    current = Object.getPrototypeOf(current);
  }
  return result;
};

class Capabilities implements CapabilitySet {
  readonly #keys: ReadonlySet<CapabilityKey>;

  constructor(keys: Iterable<CapabilityKey>) {
    this.#keys = new Set(keys);
    Object.freeze(this);
  }

  get size() {
    return this.#keys.size;
  }

  has(capability: CapabilityKey) {
    return this.#keys.has(capability);
  }

  [Symbol.iterator]() {
    return this.#keys.values();
  }
}

const collectCapabilities = (
  serviceType: ServiceIdentifier,
  implementation: Function | undefined,
  provides: readonly Capability[] = [],
): CapabilitySet => {
  const keys: CapabilityKey[] = implementation ? classChain(implementation) : [];
  if (isCapability(serviceType)) {
    keys.push(serviceType);
  }
  return new Capabilities([...keys, ...provides]);
};

const assertLifetime = (lifetime: unknown) => {
  if (!isLifetime(lifetime)) {
    throw new InvalidArgumentError(
      'lifetime',
      `Unknown lifetime "${String(lifetime)}".`,
    );
  }
};

/**
 * Record binding `serviceType` to class. Class constructor receives resolved `dependencies`.
 * @example ```
 * describeType(ILogger, FileLogger, Lifetime.Scoped, { dependencies: [Config] })
 * ```
 */
export const describeType = <T>(
  serviceType: ServiceIdentifier<T>,
  implementationType: Constructor<any[], T>,
  lifetime: Lifetime,
  options: DescriptorOptions = {},
): TypeDescriptor<T> => {
  assertArgument(serviceType, 'serviceType');
  assertArgument(implementationType, 'implementationType');
  assertLifetime(lifetime);
  if (typeof implementationType !== 'function') {
    throw new InvalidArgumentError(
      'implementationType',
      'Argument "implementationType" is not a class constructor.',
    );
  }
  const descriptor: TypeDescriptor<T> = {
    kind: 'type',
    serviceType,
    lifetime,
    implementationType,
    dependencies: Object.freeze([...(options.dependencies ?? [])]),
    capabilities: collectCapabilities(
      serviceType,
      implementationType,
      options.provides,
    ),
  };
  return Object.freeze(descriptor);
};

/**
 * Record binding `serviceType` to factory executed with resolver.
 * Concrete type is unknown until resolution so record has no capabilities except `provides`.
 */
export const describeFactory = <T>(
  serviceType: ServiceIdentifier<T>,
  implementationFactory: ImplementationFactory<T>,
  lifetime: Lifetime,
  options: Pick<DescriptorOptions, 'provides'> = {},
): FactoryDescriptor<T> => {
  assertArgument(serviceType, 'serviceType');
  assertArgument(implementationFactory, 'implementationFactory');
  assertLifetime(lifetime);
  if (typeof implementationFactory !== 'function') {
    throw new InvalidArgumentError(
      'implementationFactory',
      'Argument "implementationFactory" is not a function.',
    );
  }
  const descriptor: FactoryDescriptor<T> = {
    kind: 'factory',
    serviceType,
    lifetime,
    implementationFactory,
    capabilities: new Capabilities(options.provides ?? []),
  };
  return Object.freeze(descriptor);
};

/**
 * Record binding `serviceType` to existing instance. Always singleton.
 */
export const describeInstance = <T>(
  serviceType: ServiceIdentifier<T>,
  implementationInstance: T,
  options: Pick<DescriptorOptions, 'provides'> = {},
): InstanceDescriptor<T> => {
  assertArgument(serviceType, 'serviceType');
  assertArgument(implementationInstance, 'implementationInstance');
  const implementation: unknown =
    typeof implementationInstance === 'object'
      ? Object.getPrototypeOf(implementationInstance)?.constructor
      : undefined;
  const descriptor: InstanceDescriptor<T> = {
    kind: 'instance',
    serviceType,
    lifetime: Lifetime.Singleton,
    implementationInstance,
    capabilities: collectCapabilities(
      serviceType,
      typeof implementation === 'function' && implementation !== Object
        ? implementation
        : undefined,
      options.provides,
    ),
  };
  return Object.freeze(descriptor);
};

export const isDescriptor = (d: unknown): d is ServiceDescriptor =>
  !!d &&
  typeof d === 'object' &&
  'kind' in d &&
  'serviceType' in d &&
  'lifetime' in d &&
  'capabilities' in d;

/**
 * New record of the same service and lifetime but other implementation class.
 */
export const withImplementation = <T>(
  descriptor: ServiceDescriptor<T>,
  implementationType: Constructor<any[], T>,
  options?: DescriptorOptions,
): TypeDescriptor<T> =>
  describeType(
    descriptor.serviceType,
    implementationType,
    descriptor.lifetime,
    options,
  );
