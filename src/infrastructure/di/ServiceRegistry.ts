/**
 * scopewire - Service Registry
 *
 * Maps capability identifiers to registration entries. Pure storage: the
 * registry never constructs anything.
 */

import type {
  Constructor,
  FixedParams,
  IServiceRegistry,
  Producer,
  RegistrationEntry,
  ServiceIdentifier,
} from '../../application/di';
import {
  describeIdentifier,
  getInjectableLifetime,
  isClassIdentifier,
  useClass,
  useFactory,
  useValue,
} from '../../application/di';
import type { ILogger } from '../../application/logging';
import { silentLogger } from '../../application/logging';
import { UnregisteredCapabilityError } from '../../domain/exceptions';
import { Lifetime } from '../../domain/lifetime';

function isEntryFor<T>(
  entry: RegistrationEntry,
  identifier: ServiceIdentifier<T>,
): entry is RegistrationEntry<T> {
  return entry.identifier === identifier;
}

function isImplementation<T>(
  value: Constructor<T> | FixedParams | undefined,
): value is Constructor<T> {
  return typeof value === 'function';
}

/**
 * Default lifetime of a producer: the one declared with `@Injectable`, or
 * `PerRequest`.
 */
function defaultLifetime(producer: Producer<unknown>): Lifetime {
  if (producer.kind === 'class') {
    return getInjectableLifetime(producer.implementation) ?? Lifetime.PerRequest;
  }
  return Lifetime.PerRequest;
}

/**
 * ServiceRegistry - one registration per capability
 *
 * @example
 * ```typescript
 * const registry = new ServiceRegistry()
 *   .addSingleton(AppConfig)
 *   .addScoped(IUnitOfWork, SqlUnitOfWork)
 *   .addFactory(IClock, () => systemClock, Lifetime.Singleton);
 *
 * const container = new Container({}, registry);
 * ```
 */
export class ServiceRegistry implements IServiceRegistry {
  private readonly registrations = new Map<ServiceIdentifier, RegistrationEntry>();

  constructor(private readonly logger: ILogger = silentLogger) {}

  register<T>(
    identifier: ServiceIdentifier<T>,
    producer: Producer<T>,
    lifetime?: Lifetime,
    fixedParams: FixedParams = {},
  ): this {
    const entry: RegistrationEntry<T> = {
      identifier,
      producer,
      lifetime: lifetime ?? defaultLifetime(producer),
      fixedParams: { ...fixedParams },
    };
    const replaced = this.registrations.has(identifier);
    this.registrations.set(identifier, entry);

    this.logger.debug(
      `${replaced ? 'Replaced' : 'Registered'} ${describeIdentifier(identifier)} (${entry.lifetime}, ${producer.kind})`,
    );
    return this;
  }

  lookup<T>(identifier: ServiceIdentifier<T>): RegistrationEntry<T> {
    const entry = this.registrations.get(identifier);
    if (entry === undefined || !isEntryFor(entry, identifier)) {
      throw new UnregisteredCapabilityError(describeIdentifier(identifier));
    }
    return entry;
  }

  isRegistered(identifier: ServiceIdentifier): boolean {
    return this.registrations.has(identifier);
  }

  entries(): readonly RegistrationEntry[] {
    return [...this.registrations.values()];
  }

  addSingleton<T>(implementation: Constructor<T>, fixedParams?: FixedParams): this;
  addSingleton<T>(
    identifier: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    fixedParams?: FixedParams,
  ): this;
  addSingleton<T>(
    identifier: ServiceIdentifier<T>,
    implementation?: Constructor<T> | FixedParams,
    fixedParams?: FixedParams,
  ): this {
    return this.addClass(Lifetime.Singleton, identifier, implementation, fixedParams);
  }

  addScoped<T>(implementation: Constructor<T>, fixedParams?: FixedParams): this;
  addScoped<T>(
    identifier: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    fixedParams?: FixedParams,
  ): this;
  addScoped<T>(
    identifier: ServiceIdentifier<T>,
    implementation?: Constructor<T> | FixedParams,
    fixedParams?: FixedParams,
  ): this {
    return this.addClass(Lifetime.Scoped, identifier, implementation, fixedParams);
  }

  addPerRequest<T>(implementation: Constructor<T>, fixedParams?: FixedParams): this;
  addPerRequest<T>(
    identifier: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    fixedParams?: FixedParams,
  ): this;
  addPerRequest<T>(
    identifier: ServiceIdentifier<T>,
    implementation?: Constructor<T> | FixedParams,
    fixedParams?: FixedParams,
  ): this {
    return this.addClass(Lifetime.PerRequest, identifier, implementation, fixedParams);
  }

  addFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: () => T,
    lifetime: Lifetime = Lifetime.PerRequest,
  ): this {
    return this.register(identifier, useFactory(factory), lifetime);
  }

  addInstance<T>(identifier: ServiceIdentifier<T>, value: T): this {
    return this.register(identifier, useValue(value), Lifetime.Singleton);
  }

  /**
   * Shared body of the class registration shorthands: either
   * `(implementation, fixedParams?)` or
   * `(identifier, implementation, fixedParams?)`.
   */
  addClass<T>(
    lifetime: Lifetime,
    identifier: ServiceIdentifier<T>,
    implementation?: Constructor<T> | FixedParams,
    fixedParams?: FixedParams,
  ): this {
    if (isImplementation(implementation)) {
      return this.register(identifier, useClass(implementation), lifetime, fixedParams);
    }
    if (!isClassIdentifier(identifier)) {
      throw new TypeError(
        `An implementation class is required to register '${describeIdentifier(identifier)}'`,
      );
    }
    return this.register(identifier, useClass(identifier), lifetime, implementation);
  }
}
