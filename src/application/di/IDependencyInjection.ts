/**
 * @fileoverview Dependency Injection Container Interfaces
 *
 * @packageDocumentation
 * @module scopewire/application/di
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * This file defines the contracts of the container: how capabilities are
 * identified, how producers are described, and how registration,
 * resolution and scopes are exposed. Implementations live in the
 * infrastructure layer.
 *
 * ## Why Dependency Injection?
 *
 * **The Problem Without DI:**
 *
 * ```typescript
 * // ❌ Tightly coupled - hard to test, hard to change
 * class UserService {
 *   private db = new PostgresDatabase();   // Hard-coded dependency
 *   private logger = new ConsoleLogger();  // Hard-coded dependency
 * }
 * ```
 *
 * **The Solution With DI:**
 *
 * ```typescript
 * // ✅ Loosely coupled - the container supplies the collaborators
 * @Injectable({ lifetime: Lifetime.Scoped })
 * class UserService {
 *   constructor(
 *     @Inject(IDatabase) private db: IDatabase,
 *     private logger: AppLogger,   // class type, picked up from metadata
 *   ) {}
 * }
 * ```
 *
 * ## Producers
 *
 * A capability is produced either by a class, whose constructor
 * parameters are resolved from the container, or by a zero-argument
 * factory that captures whatever it needs when it is registered:
 *
 * ```typescript
 * container.register(IRepository, useClass(SqlRepository), Lifetime.Scoped);
 * container.register(IClock, useFactory(() => systemClock), Lifetime.Singleton);
 * ```
 *
 * Factories are opaque to the container: fixed parameters and automatic
 * injection only apply to class producers.
 */

import type { Lifetime } from '../../domain/lifetime';
import type { InjectionToken } from './InjectionToken';

// ============================================================================
// Identifiers
// ============================================================================

/**
 * A concrete, constructible class.
 */
export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * Any class, including abstract classes used as capability contracts.
 */
export type AbstractConstructor<T = unknown> = abstract new (...args: any[]) => T;

/**
 * Opaque key identifying a capability.
 *
 * @remarks
 * Identifiers are compared by identity, so a class or a token object can
 * be used directly as a `Map` key. Use an abstract class or an
 * {@link InjectionToken} for capabilities described by an interface.
 */
export type ServiceIdentifier<T = unknown> =
  | AbstractConstructor<T>
  | InjectionToken<T>;

// ============================================================================
// Producers
// ============================================================================

/**
 * Declared constructor parameter of a class producer.
 */
export interface ParameterDeclaration {
  /** Name matched against fixed parameters */
  readonly name: string;

  /** Capability injected into this position when registered */
  readonly token?: ServiceIdentifier;

  /** Pass `undefined` instead of failing when nothing can be supplied */
  readonly optional?: boolean;
}

/**
 * Class producer: constructed with injected arguments.
 *
 * @remarks
 * When `parameters` is omitted the declarations are read from the
 * decorator metadata of `implementation` (see `@Injectable`).
 */
export interface ClassProducer<T> {
  readonly kind: 'class';
  readonly implementation: Constructor<T>;
  readonly parameters?: readonly ParameterDeclaration[];
}

/**
 * Factory producer: invoked with no arguments.
 */
export interface FactoryProducer<T> {
  readonly kind: 'factory';
  readonly factory: () => T;
}

export type Producer<T> = ClassProducer<T> | FactoryProducer<T>;

/**
 * Literal constructor arguments by parameter name. They take precedence
 * over injected dependencies of the same name.
 */
export type FixedParams = Readonly<Record<string, unknown>>;

// ============================================================================
// Registrations
// ============================================================================

/**
 * Registration entry stored by the registry.
 */
export interface RegistrationEntry<T = unknown> {
  readonly identifier: ServiceIdentifier<T>;
  readonly producer: Producer<T>;
  readonly lifetime: Lifetime;
  readonly fixedParams: FixedParams;
}

/**
 * Registry of capabilities: one producer per identifier.
 *
 * @example Fluent registration
 * ```typescript
 * registry
 *   .addSingleton(AppConfig)
 *   .addScoped(IUnitOfWork, SqlUnitOfWork)
 *   .addPerRequest(CreateUserHandler)
 *   .addInstance(IClock, fixedClock);
 * ```
 */
export interface IServiceRegistry {
  /**
   * Inserts or replaces the entry for `identifier` (last write wins).
   *
   * @remarks
   * Dependencies of the producer are not checked here; a missing
   * dependency surfaces when the capability is resolved.
   *
   * When `lifetime` is omitted it defaults to the lifetime declared with
   * `@Injectable` on the producer's class, or `PerRequest`.
   */
  register<T>(
    identifier: ServiceIdentifier<T>,
    producer: Producer<T>,
    lifetime?: Lifetime,
    fixedParams?: FixedParams,
  ): this;

  /**
   * @throws {UnregisteredCapabilityError} if `identifier` was never registered
   */
  lookup<T>(identifier: ServiceIdentifier<T>): RegistrationEntry<T>;

  isRegistered(identifier: ServiceIdentifier): boolean;

  entries(): readonly RegistrationEntry[];

  addSingleton<T>(implementation: Constructor<T>, fixedParams?: FixedParams): this;
  addSingleton<T>(
    identifier: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    fixedParams?: FixedParams,
  ): this;

  addScoped<T>(implementation: Constructor<T>, fixedParams?: FixedParams): this;
  addScoped<T>(
    identifier: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    fixedParams?: FixedParams,
  ): this;

  addPerRequest<T>(implementation: Constructor<T>, fixedParams?: FixedParams): this;
  addPerRequest<T>(
    identifier: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    fixedParams?: FixedParams,
  ): this;

  addFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: () => T,
    lifetime?: Lifetime,
  ): this;

  /**
   * Registers an already built value as a singleton.
   */
  addInstance<T>(identifier: ServiceIdentifier<T>, value: T): this;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Anything services can be resolved from.
 */
export interface IServiceResolver {
  /**
   * Resolves a capability according to its lifetime.
   *
   * @throws {UnregisteredCapabilityError} capability never registered
   * @throws {NoActiveScopeError} scoped capability outside a scope
   * @throws {ConstructionFailedError} the producer threw or a parameter is missing
   * @throws {CyclicDependencyError} the capability depends on itself
   */
  resolve<T>(identifier: ServiceIdentifier<T>): T;

  isRegistered(identifier: ServiceIdentifier): boolean;
}

/**
 * Handle of an entered scope.
 *
 * @remarks
 * Resolving through the handle uses this scope's instances even when a
 * nested scope is currently active on the container, so a scope can be
 * passed explicitly through async code paths.
 *
 * @example
 * ```typescript
 * const scope = container.enterScope();
 * try {
 *   const uow = scope.resolve(IUnitOfWork);
 *   await uow.commit();
 * } finally {
 *   scope.dispose();
 * }
 * ```
 */
export interface IServiceScope extends IServiceResolver {
  /** Sequence number, unique per container */
  readonly id: number;

  readonly isDisposed: boolean;

  /**
   * Leaves the scope, restoring the enclosing one, then disposes the
   * scoped instances that expose `dispose()`, newest first.
   *
   * @throws {ScopeStateError} if a scope nested inside this one is still active
   */
  dispose(): void;
}

/**
 * The container: registry, singleton owner and scope stack.
 *
 * @remarks
 * Registration methods delegate to {@link IContainer.registry} and return
 * the container for chaining.
 */
export interface IContainer extends IServiceRegistry, IServiceResolver {
  readonly registry: IServiceRegistry;

  /** True while at least one scope is active */
  readonly hasActiveScope: boolean;

  /** Number of nested active scopes */
  readonly scopeDepth: number;

  /**
   * Enters a new, empty scope nested in the active one.
   */
  enterScope(): IServiceScope;

  /**
   * Alias of {@link IContainer.enterScope}.
   */
  createScope(): IServiceScope;

  /**
   * Runs `body` inside a new scope; the scope is disposed on every exit
   * path.
   */
  runInScope<R>(body: (scope: IServiceScope) => R): R;

  /**
   * Async variant of {@link IContainer.runInScope}: the scope is disposed
   * once the returned promise settles.
   */
  runInScopeAsync<R>(body: (scope: IServiceScope) => Promise<R>): Promise<R>;
}

/**
 * Instances exposing `dispose()` are released when their scope exits.
 */
export interface IDisposable {
  dispose(): void;
}
