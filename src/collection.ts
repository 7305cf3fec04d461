import {
  describeFactory,
  describeInstance,
  describeType,
  isDescriptor,
} from './descriptor';
import { InvalidArgumentError, InvalidStateError } from './errors';
import { ServiceProvider } from './provider';
import {
  BuildResolverOptions,
  Constructor,
  DescriptorOptions,
  IServiceRegistry,
  ImplementationFactory,
  Lifetime,
  RegistryEvents,
  ServiceCollectionOptions,
  ServiceDescriptor,
  ServiceIdentifier,
} from './types';

type Events = RegistryEvents<ServiceCollection>;

type Handlers = {
  [E in keyof Events]: Set<(e: Events[E]) => void>;
};

/**
 * Ordered list of service registrations.
 * Same service type may be registered many times, resolver gives the last one
 * or all of them with `getAll`.
 * @example ```
 * const services = new ServiceCollection()
 *   .addSingleton(Config, Config)
 *   .addScoped(ILogger, FileLogger, { dependencies: [Config] });
 * const resolver = services.buildResolver();
 * resolver.get(ILogger).log('ready');
 * ```
 */
export class ServiceCollection implements IServiceRegistry {
  constructor(options: ServiceCollectionOptions = {}) {
    for (const descriptor of options.descriptors ?? []) {
      this.add(descriptor);
    }
    if (options.readOnly) {
      this.makeReadOnly();
    }
  }

  protected readonly eventHandlers: Handlers = {
    add: new Set(),
    remove: new Set(),
    readonly: new Set(),
  };

  readonly #descriptors: ServiceDescriptor[] = [];
  #readOnly = false;

  get size() {
    return this.#descriptors.length;
  }

  get isReadOnly() {
    return this.#readOnly;
  }

  [Symbol.iterator](): Iterator<ServiceDescriptor> {
    return this.#descriptors[Symbol.iterator]();
  }

  /**
   * Snapshot of records, later mutations of collection are not reflected.
   */
  toArray(): ServiceDescriptor[] {
    return [...this.#descriptors];
  }

  addEventListener<E extends keyof Events>(
    e: E,
    handler: (e: Events[E]) => void,
  ) {
    if (e in this.eventHandlers) {
      this.eventHandlers[e].add(handler);
      return this;
    }
    throw this.eventNotSupported(e);
  }

  removeEventListener<E extends keyof Events>(
    e: E,
    handler: (e: Events[E]) => void,
  ) {
    if (e in this.eventHandlers) {
      this.eventHandlers[e].delete(handler);
      return this;
    }
    throw this.eventNotSupported(e);
  }

  add(descriptor: ServiceDescriptor): this {
    this.assertWritable();
    if (!isDescriptor(descriptor)) {
      throw new InvalidArgumentError(
        'descriptor',
        'Argument "descriptor" is not a service descriptor.',
      );
    }
    this.#descriptors.push(descriptor);
    this.emit('add', { descriptor, registry: this });
    return this;
  }

  remove(descriptor: ServiceDescriptor): boolean {
    this.assertWritable();
    const index = this.#descriptors.indexOf(descriptor);
    if (index === -1) {
      return false;
    }
    this.#descriptors.splice(index, 1);
    this.emit('remove', { descriptor, registry: this });
    return true;
  }

  makeReadOnly(): this {
    if (!this.#readOnly) {
      this.#readOnly = true;
      this.emit('readonly', { registry: this });
    }
    return this;
  }

  /**
   * Once created instance will be returned for each service request
   */
  addSingleton<T>(
    serviceType: ServiceIdentifier<T>,
    implementationType: Constructor<any[], T>,
    options?: DescriptorOptions,
  ): this {
    return this.add(
      describeType(serviceType, implementationType, Lifetime.Singleton, options),
    );
  }

  /**
   * One instance per resolver scope
   */
  addScoped<T>(
    serviceType: ServiceIdentifier<T>,
    implementationType: Constructor<any[], T>,
    options?: DescriptorOptions,
  ): this {
    return this.add(
      describeType(serviceType, implementationType, Lifetime.Scoped, options),
    );
  }

  /**
   * Each time requested transient service - new instance is created.
   */
  addTransient<T>(
    serviceType: ServiceIdentifier<T>,
    implementationType: Constructor<any[], T>,
    options?: DescriptorOptions,
  ): this {
    return this.add(
      describeType(serviceType, implementationType, Lifetime.Transient, options),
    );
  }

  addFactory<T>(
    serviceType: ServiceIdentifier<T>,
    factory: ImplementationFactory<T>,
    lifetime: Lifetime,
  ): this {
    return this.add(describeFactory(serviceType, factory, lifetime));
  }

  /**
   * Adds existing instance to collection
   */
  addInstance<T>(serviceType: ServiceIdentifier<T>, instance: T): this {
    return this.add(describeInstance(serviceType, instance));
  }

  buildResolver(options: BuildResolverOptions = {}): ServiceProvider {
    const { readOnly, ...providerOptions } = options;
    const provider = new ServiceProvider({
      descriptors: this.toArray(),
      options: providerOptions,
    });
    if (readOnly) {
      this.makeReadOnly();
    }
    return provider;
  }

  protected assertWritable() {
    if (this.#readOnly) {
      throw new InvalidStateError('Service collection is read only.');
    }
  }

  private emit<E extends keyof Events>(
    e: E,
    event: Events[E],
  ) {
    for (const handler of this.eventHandlers[e]) {
      handler(event);
    }
  }

  private eventNotSupported(e: string) {
    const supportedEvents = Object.keys(this.eventHandlers)
      .map((k) => `"${k}"`)
      .join(', ');
    return new Error(`Event "${e}" not supported. ${supportedEvents} allowed`);
  }
}
