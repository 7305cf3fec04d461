export type ValueOf<T> = T[keyof T];

export type Constructor<TParams extends readonly any[], TResult> = {
  new (...params: TParams): TResult;
};

export type AbstractConstructor<TResult> = abstract new (
  ...params: any[]
) => TResult;

/**
 * Typed identity key for services which have no runtime representation,
 * interfaces mostly.
 * @example
 * ```
 * interface Logger { log(m: string): void }
 * const ILogger = new ServiceToken<Logger>('ILogger');
 * services.addSingleton(ILogger, ConsoleLogger);
 * ```
 */
export class ServiceToken<T> {
  // phantom field, keeps tokens of different types apart
  declare readonly type?: T;

  constructor(readonly description: string) {}

  toString() {
    return `ServiceToken(${this.description})`;
  }
}

export type ServiceIdentifier<T = unknown> =
  | string
  | symbol
  | AbstractConstructor<T>
  | ServiceToken<T>;

/**
 * Identifier which implementation can satisfy, see `hasImplementationOf`.
 */
export type Capability<T = unknown> = AbstractConstructor<T> | ServiceToken<T>;

/**
 * What capability sets of records hold: classes of implementation chain and tokens.
 */
export type CapabilityKey = Function | ServiceToken<unknown>;

/**
 * Read only view of record capabilities.
 */
export interface CapabilitySet extends Iterable<CapabilityKey> {
  readonly size: number;
  has(capability: CapabilityKey): boolean;
}

export const Lifetime = {
  Singleton: 'singleton',
  Scoped: 'scoped',
  Transient: 'transient',
} as const;
export type Lifetime = ValueOf<typeof Lifetime>;

type DescriptorBase<T> = {
  readonly serviceType: ServiceIdentifier<T>;
  readonly lifetime: Lifetime;
  readonly capabilities: CapabilitySet;
};

export type TypeDescriptor<T = unknown> = DescriptorBase<T> & {
  readonly kind: 'type';
  readonly implementationType: Constructor<any[], T>;
  readonly dependencies: readonly ServiceIdentifier[];
};

export type ImplementationFactory<T> = (resolver: IServiceResolver) => T;

export type FactoryDescriptor<T = unknown> = DescriptorBase<T> & {
  readonly kind: 'factory';
  readonly implementationFactory: ImplementationFactory<T>;
};

export type InstanceDescriptor<T = unknown> = DescriptorBase<T> & {
  readonly kind: 'instance';
  readonly implementationInstance: T;
};

export type ServiceDescriptor<T = unknown> =
  | TypeDescriptor<T>
  | FactoryDescriptor<T>
  | InstanceDescriptor<T>;

export type DescriptorOptions = {
  /**
   * Keys resolved and passed to implementation constructor in the same order.
   */
  dependencies?: readonly ServiceIdentifier[];
  /**
   * Extra capabilities implementation satisfies, tokens of implemented interfaces.
   */
  provides?: readonly Capability[];
};

/**
 * Result of lookups which may find nothing.
 */
export type TryResult<T> =
  | { found: true; value: T }
  | { found: false; value: undefined };

export type GetOptions = { allowUnresolved?: boolean };

export type ServiceProviderOptions = {
  /**
   * Throws when scoped service requested from root provider or captured by singleton.
   */
  validateScopes?: boolean;
  /**
   * Checks dependencies of every type registration while building.
   */
  validateOnBuild?: boolean;
};

export type ServiceCollectionOptions = {
  descriptors?: Iterable<ServiceDescriptor>;
  readOnly?: boolean;
};

export type BuildResolverOptions = ServiceProviderOptions & {
  /**
   * Locks collection after resolver is built.
   */
  readOnly?: boolean;
};

export type RegistryEvents<R extends IServiceRegistry> = {
  add: { descriptor: ServiceDescriptor; registry: R };
  remove: { descriptor: ServiceDescriptor; registry: R };
  readonly: { registry: R };
};

export type ResolverEvents<R extends IServiceResolver> = {
  get: { key: ServiceIdentifier; value: unknown; resolver: R };
  produce: {
    key: ServiceIdentifier;
    value: unknown;
    descriptor: ServiceDescriptor;
    resolver: R;
  };
};

export interface IServiceResolver {
  /**
   * true if at least one record registered for the key, false otherwise
   * @param serviceType
   */
  has(serviceType: ServiceIdentifier): boolean;

  /**
   * Instance of the last record registered for the key.
   * Throws if nothing registered unless `allowUnresolved` set.
   */
  get<T>(
    serviceType: ServiceIdentifier<T>,
    options?: { allowUnresolved?: false },
  ): T;
  get<T>(serviceType: ServiceIdentifier<T>, options: GetOptions): T | undefined;

  /**
   * Instances of every record registered for the key in registration order.
   */
  getAll<T>(serviceType: ServiceIdentifier<T>): T[];

  /**
   * Child resolver sharing singletons and owning its scoped instances.
   */
  createScope(): IServiceResolver;
}

/**
 * Everything helpers need from registry implementation.
 */
export interface IServiceRegistry extends Iterable<ServiceDescriptor> {
  readonly size: number;

  readonly isReadOnly: boolean;

  /**
   * Appends record. Throws when read only.
   */
  add(descriptor: ServiceDescriptor): this;

  /**
   * Removes exactly this record (by identity). Throws when read only.
   * @returns true if record was present
   */
  remove(descriptor: ServiceDescriptor): boolean;

  /**
   * Rejects any following mutation. Can not be undone.
   */
  makeReadOnly(): this;

  /**
   * Creates resolver from current records.
   * Expensive: every call produces new resolver with empty caches.
   */
  buildResolver(options?: BuildResolverOptions): IServiceResolver;
}
