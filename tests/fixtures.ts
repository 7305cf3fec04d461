import {
  ServiceDescriptor,
  ServiceToken,
  describeIdentifier,
} from '../src';

export interface Logger {
  log(message: string): string;
}

export const ILogger = new ServiceToken<Logger>('ILogger');
export const IAuditLog = new ServiceToken<Logger>('IAuditLog');

export class ConsoleLogger implements Logger {
  log(message: string) {
    return `console: ${message}`;
  }
}

export class FileLogger implements Logger {
  log(message: string) {
    return `file: ${message}`;
  }
}

export class NullLogger implements Logger {
  log() {
    return '';
  }
}

export abstract class Store {
  abstract read(key: string): string | undefined;
}

export class MemoryStore extends Store {
  readonly entries = new Map<string, string>();

  read(key: string) {
    return this.entries.get(key);
  }
}

export class CachedMemoryStore extends MemoryStore {}

export class Greeter {
  constructor(readonly logger: Logger) {}

  greet(name: string) {
    return this.logger.log(`hello ${name}`);
  }
}

/**
 * `key=Implementation:lifetime` per record, in registry order
 */
export const summary = (descriptors: Iterable<ServiceDescriptor>) =>
  [...descriptors].map((d) => {
    const implementation =
      d.kind === 'type' ? d.implementationType.name : d.kind;
    return `${describeIdentifier(d.serviceType)}=${implementation}:${
      d.lifetime
    }`;
  });
