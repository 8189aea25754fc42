/**
 * @fileoverview Unit tests for ServiceRegistry
 */

import 'reflect-metadata';

import {
  Container,
  InjectionToken,
  Injectable,
  Lifetime,
  ServiceRegistry,
  UnregisteredCapabilityError,
  useFactory,
} from '../../../src';
import { captureError, createMockLogger } from '../../helpers';

class Foo {}

class Bar {}

@Injectable({ lifetime: Lifetime.Scoped })
class ScopedByDefault {}

interface IMailer {
  send(to: string): void;
}

const IMailer = new InjectionToken<IMailer>('IMailer');

class SmtpMailer implements IMailer {
  readonly sent: string[] = [];

  send(to: string): void {
    this.sent.push(to);
  }
}

describe('ServiceRegistry', () => {
  let registry: ServiceRegistry;

  beforeEach(() => {
    registry = new ServiceRegistry();
  });

  describe('register', () => {
    it('should default to PerRequest', () => {
      registry.register(Foo, useFactory(() => new Foo()));

      expect(registry.lookup(Foo).lifetime).toBe(Lifetime.PerRequest);
    });

    it('should default to the lifetime declared with @Injectable', () => {
      registry.register(Foo, { kind: 'class', implementation: ScopedByDefault });
      registry.register(ScopedByDefault, useFactory(() => new ScopedByDefault()));

      expect(registry.lookup(Foo).lifetime).toBe(Lifetime.Scoped);
      expect(registry.lookup(ScopedByDefault).lifetime).toBe(Lifetime.PerRequest);
    });

    it('should keep the last registration for an identifier', () => {
      registry.addSingleton(Foo).addPerRequest(Foo);

      expect(registry.lookup(Foo).lifetime).toBe(Lifetime.PerRequest);
      expect(registry.entries()).toHaveLength(1);
    });

    it('should copy fixed parameters', () => {
      const fixed: Record<string, unknown> = { retries: 3 };
      registry.addPerRequest(Foo, fixed);
      fixed.retries = 5;

      expect(registry.lookup(Foo).fixedParams).toEqual({ retries: 3 });
    });

    it('should store an empty fixed parameter map when none is given', () => {
      registry.addPerRequest(Foo);

      expect(registry.lookup(Foo).fixedParams).toEqual({});
    });
  });

  describe('shorthands', () => {
    it('should register a class as its own implementation', () => {
      registry.addSingleton(Foo);

      expect(registry.lookup(Foo)).toEqual({
        identifier: Foo,
        producer: { kind: 'class', implementation: Foo },
        lifetime: Lifetime.Singleton,
        fixedParams: {},
      });
    });

    it('should bind a token to an implementation', () => {
      registry.addScoped(IMailer, SmtpMailer, { host: 'localhost' });

      expect(registry.lookup(IMailer)).toEqual({
        identifier: IMailer,
        producer: { kind: 'class', implementation: SmtpMailer },
        lifetime: Lifetime.Scoped,
        fixedParams: { host: 'localhost' },
      });
    });

    it('should require an implementation for a token', () => {
      expect(() => registry.addClass(Lifetime.Singleton, IMailer)).toThrow(
        new TypeError("An implementation class is required to register 'IMailer'"),
      );
    });

    it('should register factories as PerRequest unless told otherwise', () => {
      registry.addFactory(IMailer, () => new SmtpMailer());
      registry.addFactory(Foo, () => new Foo(), Lifetime.Singleton);

      expect(registry.lookup(IMailer).lifetime).toBe(Lifetime.PerRequest);
      expect(registry.lookup(IMailer).producer.kind).toBe('factory');
      expect(registry.lookup(Foo).lifetime).toBe(Lifetime.Singleton);
    });

    it('should register instances as singletons returning the value', () => {
      const mailer = new SmtpMailer();
      registry.addInstance(IMailer, mailer);

      const { producer, lifetime } = registry.lookup(IMailer);

      expect(lifetime).toBe(Lifetime.Singleton);
      expect(producer.kind === 'factory' && producer.factory()).toBe(mailer);
    });
  });

  describe('lookup', () => {
    it('should report unregistered identifiers', () => {
      const error = captureError(() => registry.lookup(Bar));

      expect(error).toBeInstanceOf(UnregisteredCapabilityError);
      expect(error).toMatchObject({
        code: 'UNREGISTERED_CAPABILITY',
        serviceName: 'Bar',
        message: "Service 'Bar' is not registered in the container",
      });
    });

    it('should answer isRegistered without throwing', () => {
      registry.addPerRequest(Foo);

      expect(registry.isRegistered(Foo)).toBe(true);
      expect(registry.isRegistered(Bar)).toBe(false);
      expect(registry.isRegistered(IMailer)).toBe(false);
    });

    it('should list entries in registration order', () => {
      registry.addPerRequest(Foo).addSingleton(Bar).addScoped(IMailer, SmtpMailer);

      expect(registry.entries().map((entry) => entry.identifier)).toEqual([
        Foo,
        Bar,
        IMailer,
      ]);
    });
  });

  describe('logging', () => {
    it('should log registrations and replacements', () => {
      const logger = createMockLogger();
      const logged = new ServiceRegistry(logger);

      logged.addPerRequest(Foo);
      logged.addFactory(Foo, () => new Foo(), Lifetime.Singleton);

      expect(logger.debug.mock.calls).toEqual([
        ['Registered Foo (per-request, class)'],
        ['Replaced Foo (singleton, factory)'],
      ]);
    });
  });

  describe('sharing with a container', () => {
    it('should serve registrations made before the container was built', () => {
      registry.addSingleton(IMailer, SmtpMailer);
      const container = new Container({}, registry);

      container.resolve(IMailer).send('ops@example.test');

      expect(container.registry).toBe(registry);
      expect(container.resolve(IMailer)).toBeInstanceOf(SmtpMailer);
    });
  });
});
