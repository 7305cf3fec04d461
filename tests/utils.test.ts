import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
  InvalidArgumentError,
  InvalidStateError,
  Lifetime,
  ServiceCollection,
  addIfAbsent,
  addOrReplace,
  addScopedIfAbsent,
  addSingletonIfAbsent,
  addTransientIfAbsent,
  addWhen,
  hasImplementationOf,
  isRegistered,
  removeAll,
  removeAllOf,
  removeFirst,
  removeWhere,
  replaceAll,
  tryFindDescriptor,
  tryResolveInstance,
  utils,
} from '../src';
import {
  CachedMemoryStore,
  ConsoleLogger,
  FileLogger,
  IAuditLog,
  ILogger,
  MemoryStore,
  NullLogger,
  Store,
  summary,
} from './fixtures';

describe('registry helpers', () => {
  describe('isRegistered', () => {
    it('is false for empty registry', () => {
      expect(isRegistered(new ServiceCollection(), ILogger)).to.be.false;
    });

    it('matches declared service type only', () => {
      const services = new ServiceCollection().addSingleton(
        ILogger,
        ConsoleLogger,
      );
      expect(isRegistered(services, ILogger)).to.be.true;
      expect(isRegistered(services, ConsoleLogger)).to.be.false;
    });

    it('matches strings and symbols by identity', () => {
      const key = Symbol('db');
      const services = new ServiceCollection()
        .addInstance('config', { url: 'memory' })
        .addInstance(key, 'connection');
      expect(isRegistered(services, 'config')).to.be.true;
      expect(isRegistered(services, key)).to.be.true;
      expect(isRegistered(services, Symbol('db'))).to.be.false;
    });

    it('requires arguments', () => {
      // @ts-expect-error testing
      expect(() => isRegistered(undefined, ILogger)).to.throw(InvalidArgumentError, 'Argument "registry" is required.');
      // @ts-expect-error testing
      expect(() => isRegistered(new ServiceCollection(), null)).to.throw(InvalidArgumentError, 'Argument "serviceType" is required.');
    });
  });

  describe('tryFindDescriptor', () => {
    it('gives the first registered record', () => {
      const services = new ServiceCollection()
        .addTransient(ILogger, FileLogger)
        .addSingleton(ILogger, ConsoleLogger);
      const result = tryFindDescriptor(services, ILogger);
      expect(result.found).to.be.true;
      expect(result.value).to.be.eq(services.toArray()[0]);
    });

    it('reports not found', () => {
      const result = tryFindDescriptor(new ServiceCollection(), ILogger);
      expect(result).to.deep.eq({ found: false, value: undefined });
    });
  });

  describe('tryResolveInstance', () => {
    it('resolves registered service', () => {
      const services = new ServiceCollection().addSingleton(
        ILogger,
        ConsoleLogger,
      );
      const result = tryResolveInstance(services, ILogger);
      expect(result.found).to.be.true;
      expect(result.value).to.be.instanceOf(ConsoleLogger);
      expect(result.value?.log('x')).to.be.eq('console: x');
    });

    it('reports not registered service as not found', () => {
      const result = tryResolveInstance(new ServiceCollection(), ILogger);
      expect(result).to.deep.eq({ found: false, value: undefined });
    });

    it('reports empty resolution as not found', () => {
      const services = new ServiceCollection().addFactory(
        'nothing',
        () => null,
        Lifetime.Transient,
      );
      expect(tryResolveInstance(services, 'nothing').found).to.be.false;
    });

    it('builds new resolver on each call', () => {
      let calls = 0;
      const services = new ServiceCollection().addFactory(
        'counter',
        () => ++calls,
        Lifetime.Singleton,
      );
      expect(tryResolveInstance(services, 'counter').value).to.be.eq(1);
      expect(tryResolveInstance(services, 'counter').value).to.be.eq(2);
    });

    it('does not hide construction errors', () => {
      const services = new ServiceCollection().addFactory(
        'broken',
        () => {
          throw new Error('boom');
        },
        Lifetime.Transient,
      );
      expect(() => tryResolveInstance(services, 'broken')).to.throw('boom');
    });

    it('works on read only registry', () => {
      const services = new ServiceCollection()
        .addSingleton(ILogger, FileLogger)
        .makeReadOnly();
      expect(tryResolveInstance(services, ILogger).value).to.be.instanceOf(
        FileLogger,
      );
    });
  });

  describe('removeFirst', () => {
    it('removes only the first matching record', () => {
      const services = new ServiceCollection()
        .addSingleton(ILogger, ConsoleLogger)
        .addInstance('other', 1)
        .addTransient(ILogger, FileLogger);
      expect(removeFirst(services, ILogger)).to.be.eq(services);
      expect(summary(services)).to.deep.eq([
        'other=instance:singleton',
        'ILogger=FileLogger:transient',
      ]);
    });

    it('does nothing if no record matches', () => {
      const services = new ServiceCollection().addSingleton(
        ILogger,
        ConsoleLogger,
      );
      const before = services.toArray();
      removeFirst(services, IAuditLog);
      expect(services.toArray()).to.have.ordered.members(before);
    });
  });

  describe('removeAll', () => {
    it('removes every record of every listed type', () => {
      const services = new ServiceCollection()
        .addSingleton(ILogger, ConsoleLogger)
        .addSingleton(IAuditLog, FileLogger)
        .addInstance('kept', true)
        .addTransient(ILogger, FileLogger);
      removeAll(services, new Set([ILogger, IAuditLog]));
      expect(summary(services)).to.deep.eq(['kept=instance:singleton']);
    });

    it('accepts any iterable', () => {
      const services = new ServiceCollection()
        .addInstance('a', 1)
        .addInstance('b', 2)
        .addInstance('c', 3);
      removeAll(services, ['a', 'c', 'missing']);
      expect(summary(services)).to.deep.eq(['b=instance:singleton']);
    });

    it('requires service types', () => {
      // @ts-expect-error testing
      expect(() => removeAll(new ServiceCollection(), undefined)).to.throw(InvalidArgumentError, 'Argument "serviceTypes" is required.');
    });

    it('rejects single string key', () => {
      const services = new ServiceCollection()
        .addInstance('config', 1)
        .addInstance('c', 2);
      // @ts-expect-error testing
      expect(() => removeAll(services, 'config')).to.throw(InvalidArgumentError, 'Argument "serviceTypes" must be an array or set of service types.');
      expect(summary(services)).to.deep.eq([
        'config=instance:singleton',
        'c=instance:singleton',
      ]);
    });
  });

  describe('removeAllOf', () => {
    it('removes every record of the type', () => {
      const services = new ServiceCollection()
        .addSingleton(ILogger, ConsoleLogger)
        .addScoped(ILogger, FileLogger)
        .addSingleton(IAuditLog, FileLogger);
      removeAllOf(services, ILogger);
      expect(summary(services)).to.deep.eq(['IAuditLog=FileLogger:singleton']);
    });
  });

  describe('removeWhere', () => {
    it('removes matching records and keeps order of the rest', () => {
      const services = new ServiceCollection()
        .addInstance('a', 1)
        .addTransient('b', NullLogger)
        .addInstance('c', 3)
        .addTransient('d', NullLogger)
        .addScoped('e', NullLogger);
      removeWhere(services, (d) => d.lifetime === Lifetime.Transient);
      expect(summary(services)).to.deep.eq([
        'a=instance:singleton',
        'c=instance:singleton',
        'e=NullLogger:scoped',
      ]);
    });

    it('removes every match when listeners throw', () => {
      const services = new ServiceCollection()
        .addInstance('a', 1)
        .addInstance('b', 2)
        .addInstance('c', 3)
        .addEventListener('remove', ({ descriptor }) => {
          throw new Error(`failed ${String(descriptor.serviceType)}`);
        });
      expect(() => removeWhere(services, (d) => d.serviceType !== 'b'))
        .to.throw(AggregateError, 'Registry listeners failed.')
        .with.property('errors')
        .that.has.lengthOf(2);
      expect(summary(services)).to.deep.eq(['b=instance:singleton']);
    });

    it('evaluates predicate once per record of snapshot', () => {
      const services = new ServiceCollection()
        .addInstance('a', 1)
        .addInstance('b', 2)
        .addInstance('c', 3);
      const visited: unknown[] = [];
      removeWhere(services, (d) => {
        visited.push(d.serviceType);
        return true;
      });
      expect(visited).to.deep.eq(['a', 'b', 'c']);
      expect(services.size).to.be.eq(0);
    });
  });

  describe('addIfAbsent', () => {
    it('adds the first registration and ignores following', () => {
      const services = new ServiceCollection();

      addIfAbsent(services, ILogger, ConsoleLogger, Lifetime.Singleton);
      expect(isRegistered(services, ILogger)).to.be.true;
      expect(services.size).to.be.eq(1);

      addIfAbsent(services, ILogger, FileLogger, Lifetime.Singleton);
      expect(summary(services)).to.deep.eq([
        'ILogger=ConsoleLogger:singleton',
      ]);

      addOrReplace(services, ILogger, FileLogger, Lifetime.Scoped);
      expect(summary(services)).to.deep.eq(['ILogger=FileLogger:scoped']);
    });

    it('has shorthands for each lifetime', () => {
      const services = new ServiceCollection();
      addSingletonIfAbsent(services, 'a', NullLogger);
      addScopedIfAbsent(services, 'b', NullLogger);
      addTransientIfAbsent(services, 'c', NullLogger);
      addTransientIfAbsent(services, 'a', FileLogger);
      expect(summary(services)).to.deep.eq([
        'a=NullLogger:singleton',
        'b=NullLogger:scoped',
        'c=NullLogger:transient',
      ]);
    });

    it('passes dependencies to the record', () => {
      const services = new ServiceCollection();
      addIfAbsent(services, 'store', MemoryStore, Lifetime.Singleton, {
        dependencies: ['config'],
      });
      const { value } = tryFindDescriptor(services, 'store');
      expect(value?.kind === 'type' && value.dependencies).to.deep.eq([
        'config',
      ]);
    });

    it('validates arguments even if service is registered', () => {
      const services = new ServiceCollection().addSingleton(
        ILogger,
        ConsoleLogger,
      );
      // @ts-expect-error testing
      expect(() => addIfAbsent(services, ILogger, undefined, Lifetime.Singleton)).to.throw(InvalidArgumentError, 'Argument "implementationType" is required.');
    });
  });

  describe('addOrReplace', () => {
    it('keeps one record with the latest implementation', () => {
      const services = new ServiceCollection();
      addOrReplace(services, ILogger, ConsoleLogger, Lifetime.Singleton);
      addOrReplace(services, ILogger, FileLogger, Lifetime.Transient);
      expect(summary(services)).to.deep.eq(['ILogger=FileLogger:transient']);
    });

    it('replaces only the first record and appends the new one', () => {
      const services = new ServiceCollection()
        .addSingleton(ILogger, ConsoleLogger)
        .addInstance('other', 1)
        .addTransient(ILogger, FileLogger);
      addOrReplace(services, ILogger, NullLogger, Lifetime.Scoped);
      expect(summary(services)).to.deep.eq([
        'other=instance:singleton',
        'ILogger=FileLogger:transient',
        'ILogger=NullLogger:scoped',
      ]);
    });
  });

  describe('addWhen', () => {
    it('adds factory record when condition holds', () => {
      const services = new ServiceCollection();
      addWhen(
        services,
        () => true,
        ILogger,
        () => new ConsoleLogger(),
        Lifetime.Scoped,
      );
      expect(summary(services)).to.deep.eq(['ILogger=factory:scoped']);
    });

    it('skips record when condition fails', () => {
      const services = new ServiceCollection();
      addWhen(
        services,
        () => false,
        ILogger,
        () => new ConsoleLogger(),
        Lifetime.Scoped,
      );
      expect(services.size).to.be.eq(0);
    });

    it('evaluates condition once and eagerly', () => {
      let calls = 0;
      const services = new ServiceCollection();
      addWhen(
        services,
        () => ++calls > 0,
        ILogger,
        () => new ConsoleLogger(),
        Lifetime.Singleton,
      );
      expect(calls).to.be.eq(1);
      services.buildResolver().get(ILogger);
      expect(calls).to.be.eq(1);
    });
  });

  describe('replaceAll', () => {
    it('swaps implementation and keeps lifetime of each record', () => {
      const services = new ServiceCollection()
        .addSingleton(ILogger, ConsoleLogger)
        .addInstance('x', 1)
        .addTransient(ILogger, FileLogger);
      const original = services.toArray()[0];
      replaceAll(services, ILogger, NullLogger);
      expect(summary(services)).to.deep.eq([
        'x=instance:singleton',
        'ILogger=NullLogger:singleton',
        'ILogger=NullLogger:transient',
      ]);
      expect(summary([original])).to.deep.eq([
        'ILogger=ConsoleLogger:singleton',
      ]);
    });

    it('replaces factory and instance records as well', () => {
      const services = new ServiceCollection()
        .addFactory(ILogger, () => new ConsoleLogger(), Lifetime.Scoped)
        .addInstance(ILogger, new FileLogger());
      replaceAll(services, ILogger, NullLogger);
      expect(summary(services)).to.deep.eq([
        'ILogger=NullLogger:scoped',
        'ILogger=NullLogger:singleton',
      ]);
    });

    it('completes replacement when remove listener throws', () => {
      let failed = false;
      const services = new ServiceCollection()
        .addSingleton(ILogger, ConsoleLogger)
        .addTransient(ILogger, FileLogger)
        .addEventListener('remove', () => {
          if (!failed) {
            failed = true;
            throw new Error('listener failed');
          }
        });
      expect(() => replaceAll(services, ILogger, NullLogger)).to.throw(
        'listener failed',
      );
      expect(summary(services)).to.deep.eq([
        'ILogger=NullLogger:singleton',
        'ILogger=NullLogger:transient',
      ]);
    });

    it('does nothing without matching records', () => {
      const services = new ServiceCollection().addInstance('x', 1);
      replaceAll(services, ILogger, NullLogger);
      expect(summary(services)).to.deep.eq(['x=instance:singleton']);
    });
  });

  describe('hasImplementationOf', () => {
    it('matches implementation class ancestors', () => {
      const services = new ServiceCollection().addSingleton(
        'store',
        CachedMemoryStore,
      );
      expect(hasImplementationOf(services, Store)).to.be.true;
      expect(hasImplementationOf(services, MemoryStore)).to.be.true;
      expect(hasImplementationOf(services, CachedMemoryStore)).to.be.true;
      expect(isRegistered(services, Store)).to.be.false;
    });

    it('matches service token implementation is registered under', () => {
      const services = new ServiceCollection().addSingleton(
        ILogger,
        ConsoleLogger,
      );
      expect(hasImplementationOf(services, ILogger)).to.be.true;
      expect(hasImplementationOf(services, IAuditLog)).to.be.false;
      expect(hasImplementationOf(services, FileLogger)).to.be.false;
    });

    it('matches declared capabilities', () => {
      const services = new ServiceCollection().addSingleton(
        'logger',
        ConsoleLogger,
        { provides: [IAuditLog] },
      );
      expect(hasImplementationOf(services, IAuditLog)).to.be.true;
    });

    it('matches class of registered instance', () => {
      const services = new ServiceCollection().addInstance(
        'store',
        new MemoryStore(),
      );
      expect(hasImplementationOf(services, Store)).to.be.true;
    });

    it('ignores factory records', () => {
      const services = new ServiceCollection().addFactory(
        ILogger,
        () => new ConsoleLogger(),
        Lifetime.Singleton,
      );
      expect(hasImplementationOf(services, ILogger)).to.be.false;
      expect(hasImplementationOf(services, ConsoleLogger)).to.be.false;
    });
  });

  describe('read only registry', () => {
    const mutations: [string, (r: ServiceCollection) => unknown][] = [
      ['removeFirst', (r) => removeFirst(r, ILogger)],
      ['removeAll', (r) => removeAll(r, [ILogger])],
      ['removeAllOf', (r) => removeAllOf(r, ILogger)],
      ['removeWhere', (r) => removeWhere(r, () => false)],
      [
        'addIfAbsent',
        (r) => addIfAbsent(r, IAuditLog, FileLogger, Lifetime.Singleton),
      ],
      [
        'addOrReplace',
        (r) => addOrReplace(r, ILogger, FileLogger, Lifetime.Singleton),
      ],
      [
        'addWhen',
        (r) =>
          addWhen(r, () => false, ILogger, () => new FileLogger(), 'singleton'),
      ],
      ['replaceAll', (r) => replaceAll(r, ILogger, FileLogger)],
    ];

    mutations.forEach(([name, mutate]) => {
      it(`${name} throws and leaves registry untouched`, () => {
        const services = new ServiceCollection()
          .addSingleton(ILogger, ConsoleLogger)
          .makeReadOnly();
        expect(() => mutate(services)).to.throw(
          InvalidStateError,
          'Registry is read only.',
        );
        expect(summary(services)).to.deep.eq([
          'ILogger=ConsoleLogger:singleton',
        ]);
      });
    });

    it('addWhen does not evaluate condition', () => {
      let called = false;
      const services = new ServiceCollection().makeReadOnly();
      expect(() =>
        addWhen(
          services,
          () => (called = true),
          ILogger,
          () => new FileLogger(),
          Lifetime.Singleton,
        ),
      ).to.throw(InvalidStateError);
      expect(called).to.be.false;
    });
  });

  it('groups helpers in utils object', () => {
    const services = new ServiceCollection();
    utils.addSingletonIfAbsent(services, ILogger, ConsoleLogger);
    expect(utils.isRegistered(services, ILogger)).to.be.true;
    utils.removeAllOf(services, ILogger);
    expect(services.size).to.be.eq(0);
  });
});
