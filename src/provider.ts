import {
  CircularDependencyError,
  InvalidArgumentError,
  InvalidStateError,
  UnresolvedServiceError,
  describeIdentifier,
} from './errors';
import {
  GetOptions,
  IServiceResolver,
  Lifetime,
  ResolverEvents,
  ServiceDescriptor,
  ServiceIdentifier,
  ServiceProviderOptions,
} from './types';

type Frame = { key: ServiceIdentifier; descriptor: ServiceDescriptor };

type Events = ResolverEvents<ServiceProvider>;

/**
 * Records whose dependency tree `validate` already walked.
 */
type Validated = {
  readonly anywhere: Set<ServiceDescriptor>;
  readonly underSingleton: Set<ServiceDescriptor>;
};

type Handlers = {
  [E in keyof Events]: Set<(e: Events[E]) => void>;
};

export type ServiceProviderConstructorArguments =
  | {
      descriptors: Iterable<ServiceDescriptor>;
      options?: ServiceProviderOptions;
    }
  | {
      parentProvider: ServiceProvider;
    };

/**
 * State shared by root provider and all its scopes.
 */
type RootState = {
  readonly descriptors: readonly ServiceDescriptor[];
  readonly byKey: ReadonlyMap<ServiceIdentifier, readonly ServiceDescriptor[]>;
  readonly singletons: Map<ServiceDescriptor, unknown>;
  readonly options: ServiceProviderOptions;
  // keys currently being produced, used to detect circular dependencies
  readonly stack: Frame[];
};

const capturedScopeError = (scoped: ServiceIdentifier, singleton: Frame) =>
  new InvalidStateError(
    `Scoped service "${describeIdentifier(
      scoped,
    )}" can not be consumed by singleton "${describeIdentifier(
      singleton.key,
    )}".`,
  );

const groupByKey = (descriptors: readonly ServiceDescriptor[]) => {
  const result = new Map<ServiceIdentifier, ServiceDescriptor[]>();
  for (const d of descriptors) {
    const group = result.get(d.serviceType);
    if (group) {
      group.push(d);
    } else {
      result.set(d.serviceType, [d]);
    }
  }
  return result;
};

/**
 * Resolver over fixed snapshot of records.
 *
 * Single service request gives instance of the last record registered for the key.
 * Singletons are shared between root provider and its scopes,
 * scoped instances live in the provider (scope) which created them,
 * transients are created on each request.
 *
 * @example ```
 * const resolver = new ServiceProvider({ descriptors: services });
 * const scope = resolver.createScope();
 * scope.get(RequestContext) === scope.get(RequestContext); // scoped
 * ```
 */
export class ServiceProvider implements IServiceResolver {
  constructor(p: ServiceProviderConstructorArguments) {
    if ('parentProvider' in p) {
      this.#root = p.parentProvider.#root;
      this.#state = p.parentProvider.#state;
      // scope keeps listeners its parent had at the moment of creation
      const { get, produce } = p.parentProvider.eventHandlers;
      get.forEach((h) => this.eventHandlers.get.add(h));
      produce.forEach((h) => this.eventHandlers.produce.add(h));
      return;
    }
    const descriptors = Object.freeze([...p.descriptors]);
    this.#root = this;
    this.#state = {
      descriptors,
      byKey: groupByKey(descriptors),
      singletons: new Map(),
      options: { ...p.options },
      stack: [],
    };
    if (this.#state.options.validateOnBuild) {
      this.validate();
    }
  }

  protected readonly eventHandlers: Handlers = {
    get: new Set(),
    produce: new Set(),
  };

  readonly #root: ServiceProvider;
  readonly #state: RootState;
  readonly #scoped = new Map<ServiceDescriptor, unknown>();

  get isRoot() {
    return this.#root === this;
  }

  get descriptors(): readonly ServiceDescriptor[] {
    return this.#state.descriptors;
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

  has(serviceType: ServiceIdentifier): boolean {
    return !!this.#state.byKey.get(serviceType)?.length;
  }

  /**
   * Get registered service from resolver
   *
   * Returns existing instance if allowed by service lifetime or creates new instance.
   * Throws if nothing registered for the key, unless `allowUnresolved` set.
   *
   * @param serviceType
   * @param options {GetOptions}
   */
  get<T>(
    serviceType: ServiceIdentifier<T>,
    options?: { allowUnresolved?: false },
  ): T;
  get<T>(serviceType: ServiceIdentifier<T>, options: GetOptions): T | undefined;
  get<T>(serviceType: ServiceIdentifier<T>, options?: GetOptions): T | undefined {
    this.assertKey(serviceType);
    const registered = this.#state.byKey.get(serviceType);
    const descriptor = registered?.[registered.length - 1];
    if (!descriptor) {
      if (options?.allowUnresolved) {
        this.onGet(serviceType, undefined);
        return undefined;
      }
      throw new UnresolvedServiceError(serviceType);
    }
    const instance = this.resolveDescriptor(descriptor);
    this.onGet(serviceType, instance);
    // records registered under ServiceIdentifier<T> produce T
    return instance as T;
  }

  getAll<T>(serviceType: ServiceIdentifier<T>): T[] {
    this.assertKey(serviceType);
    const instances = (this.#state.byKey.get(serviceType) ?? []).map((d) =>
      this.resolveDescriptor(d),
    );
    this.onGet(serviceType, instances);
    return instances as T[];
  }

  createScope(): ServiceProvider {
    return new ServiceProvider({ parentProvider: this });
  }

  /**
   * Checks that every class registration dependency is registered,
   * that there are no circular dependencies
   * and, with `validateScopes`, that singletons do not depend on scoped services.
   * Factories are opaque and treated as leaves.
   */
  validate() {
    const validated: Validated = {
      anywhere: new Set(),
      underSingleton: new Set(),
    };
    for (const descriptor of this.#state.descriptors) {
      this.validateDescriptor(descriptor, [], validated);
    }
  }

  protected resolveDescriptor(descriptor: ServiceDescriptor): unknown {
    switch (descriptor.lifetime) {
      case Lifetime.Singleton:
        return this.#root.fromCache(this.#state.singletons, descriptor);
      case Lifetime.Scoped:
        this.assertScopedAllowed(descriptor);
        return this.fromCache(this.#scoped, descriptor);
      default:
        return this.produce(descriptor);
    }
  }

  protected produce(descriptor: ServiceDescriptor): unknown {
    const { stack } = this.#state;
    const key = descriptor.serviceType;
    if (stack.some((f) => f.descriptor === descriptor)) {
      throw new CircularDependencyError([...stack.map((f) => f.key), key]);
    }
    if (descriptor.kind === 'instance') {
      return descriptor.implementationInstance;
    }
    stack.push({ key, descriptor });
    try {
      const instance =
        descriptor.kind === 'factory'
          ? descriptor.implementationFactory(this)
          : new descriptor.implementationType(
              ...descriptor.dependencies.map((d) => this.get(d)),
            );
      this.onProduce(key, instance, descriptor);
      return instance;
    } finally {
      stack.pop();
    }
  }

  private fromCache(
    cache: Map<ServiceDescriptor, unknown>,
    descriptor: ServiceDescriptor,
  ) {
    if (cache.has(descriptor)) {
      return cache.get(descriptor);
    }
    const instance = this.produce(descriptor);
    cache.set(descriptor, instance);
    return instance;
  }

  private assertScopedAllowed(descriptor: ServiceDescriptor) {
    if (!this.#state.options.validateScopes) return;
    const singleton = this.#state.stack.find(
      (f) => f.descriptor.lifetime === Lifetime.Singleton,
    );
    if (singleton) {
      throw capturedScopeError(descriptor.serviceType, singleton);
    }
    if (this.isRoot) {
      throw new InvalidStateError(
        `Scoped service "${describeIdentifier(
          descriptor.serviceType,
        )}" can not be resolved from root provider.`,
      );
    }
  }

  private validateDescriptor(
    descriptor: ServiceDescriptor,
    stack: Frame[],
    validated: Validated,
  ) {
    const key = descriptor.serviceType;
    if (stack.some((f) => f.descriptor === descriptor)) {
      throw new CircularDependencyError([...stack.map((f) => f.key), key]);
    }
    const singleton = stack.find(
      (f) => f.descriptor.lifetime === Lifetime.Singleton,
    );
    // subtree checked below a singleton passes everywhere else too
    if (
      validated.underSingleton.has(descriptor) ||
      (!singleton && validated.anywhere.has(descriptor))
    ) {
      return;
    }
    if (
      singleton &&
      this.#state.options.validateScopes &&
      descriptor.lifetime === Lifetime.Scoped
    ) {
      throw capturedScopeError(key, singleton);
    }
    if (descriptor.kind === 'type') {
      const nextStack = [...stack, { key, descriptor }];
      for (const dependency of descriptor.dependencies) {
        const registered = this.#state.byKey.get(dependency);
        const resolved = registered?.[registered.length - 1];
        if (!resolved) {
          throw new UnresolvedServiceError(dependency);
        }
        this.validateDescriptor(resolved, nextStack, validated);
      }
    }
    (singleton ? validated.underSingleton : validated.anywhere).add(descriptor);
  }

  private assertKey(serviceType: unknown) {
    if (serviceType === undefined || serviceType === null) {
      throw new InvalidArgumentError('serviceType');
    }
  }

  private onGet(key: ServiceIdentifier, value: unknown) {
    for (const handler of this.eventHandlers.get) {
      handler({ key, value, resolver: this });
    }
  }

  private onProduce(
    key: ServiceIdentifier,
    value: unknown,
    descriptor: ServiceDescriptor,
  ) {
    for (const handler of this.eventHandlers.produce) {
      handler({ key, value, descriptor, resolver: this });
    }
  }

  private eventNotSupported(e: string) {
    const supportedEvents = Object.keys(this.eventHandlers)
      .map((k) => `"${k}"`)
      .join(', ');
    return new Error(`Event "${e}" not supported. ${supportedEvents} allowed`);
  }
}
