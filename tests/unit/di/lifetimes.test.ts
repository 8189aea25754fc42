/**
 * @fileoverview Unit tests for lifetime policies
 *
 * PerRequest never caches, Singleton caches for the container's life and
 * Scoped caches once per active scope.
 */

import 'reflect-metadata';

import {
  Container,
  InjectionToken,
  Injectable,
  Lifetime,
  NoActiveScopeError,
} from '../../../src';
import { captureError } from '../../helpers';

// ============================================================================
// Test Services
// ============================================================================

class Command {
  readonly issuedAt = Date.now();
}

@Injectable({ lifetime: Lifetime.Singleton })
class AppConfig {
  readonly environment = 'test';
}

@Injectable({ lifetime: Lifetime.Scoped })
class Session {
  readonly items: string[] = [];
}

interface Counter {
  readonly serial: number;
}

const COUNTER = new InjectionToken<Counter>('Counter');

// ============================================================================
// Tests
// ============================================================================

describe('Lifetimes', () => {
  let container: Container;

  beforeEach(() => {
    container = new Container();
  });

  describe('PerRequest', () => {
    it('should construct a new instance on every resolve', () => {
      container.addPerRequest(Command);

      const first = container.resolve(Command);
      const second = container.resolve(Command);

      expect(first).toBeInstanceOf(Command);
      expect(second).toBeInstanceOf(Command);
      expect(first).not.toBe(second);
    });

    it('should invoke a factory on every resolve', () => {
      let serial = 0;
      container.addFactory(COUNTER, () => ({ serial: ++serial }));

      expect(container.resolve(COUNTER).serial).toBe(1);
      expect(container.resolve(COUNTER).serial).toBe(2);
      expect(serial).toBe(2);
    });

    it('should not cache inside a scope either', () => {
      container.addPerRequest(Command);

      container.runInScope((scope) => {
        expect(scope.resolve(Command)).not.toBe(scope.resolve(Command));
      });
    });
  });

  describe('Singleton', () => {
    it('should return the identical instance on every resolve', () => {
      container.addSingleton(AppConfig);

      const first = container.resolve(AppConfig);
      const second = container.resolve(AppConfig);

      expect(first).toBe(second);
      expect(first.environment).toBe('test');
    });

    it('should invoke the producer at most once', () => {
      let calls = 0;
      container.addFactory(
        COUNTER,
        () => ({ serial: ++calls }),
        Lifetime.Singleton,
      );

      for (let i = 0; i < 5; i++) {
        container.resolve(COUNTER);
      }

      expect(calls).toBe(1);
    });

    it('should share the instance between the container and every scope', () => {
      container.addSingleton(AppConfig);
      const outside = container.resolve(AppConfig);

      const fromScopes = [1, 2].map(() =>
        container.runInScope((scope) => scope.resolve(AppConfig)),
      );

      expect(fromScopes).toEqual([outside, outside]);
      expect(fromScopes[0]).toBe(outside);
    });

    it('should resolve outside of any scope', () => {
      container.addSingleton(AppConfig);

      expect(container.hasActiveScope).toBe(false);
      expect(() => container.resolve(AppConfig)).not.toThrow();
    });

    it('should treat addInstance values as singletons', () => {
      const counter: Counter = { serial: 42 };
      container.addInstance(COUNTER, counter);

      expect(container.resolve(COUNTER)).toBe(counter);
      expect(container.lookup(COUNTER).lifetime).toBe(Lifetime.Singleton);
    });
  });

  describe('Scoped', () => {
    it('should return the identical instance within one scope', () => {
      container.addScoped(Session);

      container.runInScope(() => {
        const first = container.resolve(Session);
        const second = container.resolve(Session);
        expect(first).toBe(second);
      });
    });

    it('should return a new instance in a later scope', () => {
      container.addScoped(Session);

      const first = container.runInScope(() => container.resolve(Session));
      const second = container.runInScope(() => container.resolve(Session));

      expect(first).toBeInstanceOf(Session);
      expect(second).toBeInstanceOf(Session);
      expect(first).not.toBe(second);
    });

    it('should fail with NoActiveScopeError outside of a scope', () => {
      container.addScoped(Session);

      expect(() => container.resolve(Session)).toThrow(NoActiveScopeError);
      expect(() => container.resolve(Session)).toThrow(
        "Scoped service 'Session' cannot be resolved outside of a scope",
      );
    });

    it('should expose the failing service and error code', () => {
      container.addScoped(Session);

      const error = captureError(() => container.resolve(Session));

      expect(error).toBeInstanceOf(NoActiveScopeError);
      expect(error).toMatchObject({
        code: 'NO_ACTIVE_SCOPE',
        serviceName: 'Session',
        dependencyGraph: '└─ Session (NO ACTIVE SCOPE)',
      });
    });

    it('should fail again once the scope has been left', () => {
      container.addScoped(Session);

      container.runInScope(() => container.resolve(Session));

      expect(() => container.resolve(Session)).toThrow(NoActiveScopeError);
    });
  });
});
