/**
 * @fileoverview Dependency resolution and lifecycle container
 *
 * @packageDocumentation
 * @module scopewire/infrastructure/di
 *
 * ## Resolution
 *
 * ```
 * resolve(C)
 *   └─ lookup C ─────────────── UnregisteredCapabilityError
 *   └─ lifetime?
 *        Singleton  → cached for the container's life
 *        Scoped     → cached in the scope table ─ NoActiveScopeError
 *        PerRequest → always constructed
 *   └─ construct
 *        factory → factory()
 *        class   → new Impl(...resolved or fixed arguments)
 * ```
 *
 * ## Scopes
 *
 * Scopes form a stack. `enterScope()` pushes an empty scope table;
 * disposing the returned handle pops it, along with any scope left open
 * inside it, and the enclosing table becomes active again. `container.resolve` always uses the innermost scope,
 * while `scope.resolve` uses that scope's own table.
 *
 * The active scope is container-wide state: async flows that overlap in
 * time should resolve through the scope handle they were given, not
 * through the container.
 */

import type {
  Constructor,
  FixedParams,
  IContainer,
  ParameterDeclaration,
  Producer,
  RegistrationEntry,
  ServiceIdentifier,
} from '../../application/di';
import {
  describeIdentifier,
  getParameterDeclarations,
  resolveContainerOptions,
} from '../../application/di';
import type { ContainerOptions, ResolvedContainerOptions } from '../../application/di';
import type { ILogger } from '../../application/logging';
import {
  ConstructionFailedError,
  CyclicDependencyError,
  DependencyResolutionError,
  NoActiveScopeError,
  ScopeMismatchError,
  ScopeStateError,
  UnregisteredCapabilityError,
} from '../../domain/exceptions';
import { Lifetime } from '../../domain/lifetime';
import { ContainerScope } from './ContainerScope';
import type { ScopeHost } from './ContainerScope';
import { renderDependencyGraph } from './dependency-graph';
import { InstanceTable } from './InstanceTable';
import { ServiceRegistry } from './ServiceRegistry';

/**
 * State threaded through one top-level resolution.
 */
interface ResolutionContext {
  /** Scope serving `Scoped` capabilities, if any */
  readonly scope: ContainerScope | undefined;

  /** Capabilities currently under construction, outermost first */
  readonly path: readonly ServiceIdentifier[];

  /** Nearest singleton on the path, for lifetime validation */
  readonly singleton: ServiceIdentifier | undefined;
}

/**
 * Container - registry, singleton owner and scope stack
 *
 * @example End-to-end
 * ```typescript
 * const container = new Container({ logger: consoleLogger });
 *
 * container
 *   .addPerRequest(Repository)
 *   .addScoped(UnitOfWork)      // constructor(repository: Repository)
 *   .addSingleton(Dispatcher);  // constructor(uow: UnitOfWork)
 *
 * container.runInScope((scope) => {
 *   const dispatcher = scope.resolve(Dispatcher);
 *   dispatcher.dispatch(command);
 * });
 * ```
 */
export class Container implements IContainer, ScopeHost {
  readonly registry: ServiceRegistry;

  private readonly options: ResolvedContainerOptions;
  private readonly logger: ILogger;
  private readonly singletons = new InstanceTable();
  private readonly scopes: ContainerScope[] = [];
  private scopeSequence = 0;

  constructor(options: ContainerOptions = {}, registry?: ServiceRegistry) {
    this.options = resolveContainerOptions(options);
    this.logger = this.options.logger;
    this.registry = registry ?? new ServiceRegistry(this.logger);
  }

  get name(): string {
    return this.options.name;
  }

  get hasActiveScope(): boolean {
    return this.scopes.length > 0;
  }

  get scopeDepth(): number {
    return this.scopes.length;
  }

  // ==================== Registration ====================

  register<T>(
    identifier: ServiceIdentifier<T>,
    producer: Producer<T>,
    lifetime?: Lifetime,
    fixedParams?: FixedParams,
  ): this {
    this.registry.register(identifier, producer, lifetime, fixedParams);
    return this;
  }

  lookup<T>(identifier: ServiceIdentifier<T>): RegistrationEntry<T> {
    return this.registry.lookup(identifier);
  }

  isRegistered(identifier: ServiceIdentifier): boolean {
    return this.registry.isRegistered(identifier);
  }

  entries(): readonly RegistrationEntry[] {
    return this.registry.entries();
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
    this.registry.addClass(Lifetime.Singleton, identifier, implementation, fixedParams);
    return this;
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
    this.registry.addClass(Lifetime.Scoped, identifier, implementation, fixedParams);
    return this;
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
    this.registry.addClass(Lifetime.PerRequest, identifier, implementation, fixedParams);
    return this;
  }

  addFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: () => T,
    lifetime?: Lifetime,
  ): this {
    this.registry.addFactory(identifier, factory, lifetime);
    return this;
  }

  addInstance<T>(identifier: ServiceIdentifier<T>, value: T): this {
    this.registry.addInstance(identifier, value);
    return this;
  }

  // ==================== Resolution ====================

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    return this.resolveIn(identifier, {
      scope: this.scopes[this.scopes.length - 1],
      path: [],
      singleton: undefined,
    });
  }

  /**
   * @internal Resolution on behalf of a scope handle.
   */
  resolveWithin<T>(identifier: ServiceIdentifier<T>, scope: ContainerScope): T {
    return this.resolveIn(identifier, { scope, path: [], singleton: undefined });
  }

  private resolveIn<T>(identifier: ServiceIdentifier<T>, context: ResolutionContext): T {
    const { path } = context;

    if (!this.registry.isRegistered(identifier)) {
      throw new UnregisteredCapabilityError(
        describeIdentifier(identifier),
        renderDependencyGraph(path, identifier, 'UNREGISTERED'),
      );
    }
    const entry = this.registry.lookup(identifier);

    if (this.options.detectCycles && path.includes(identifier)) {
      const cycle = [...path.slice(path.indexOf(identifier)), identifier];
      throw new CyclicDependencyError(
        cycle.map(describeIdentifier),
        renderDependencyGraph(path, identifier, 'CIRCULAR!'),
      );
    }

    const inner: ResolutionContext = {
      scope: context.scope,
      path: [...path, identifier],
      singleton: entry.lifetime === Lifetime.Singleton ? identifier : context.singleton,
    };

    switch (entry.lifetime) {
      case Lifetime.Singleton: {
        const cached = this.singletons.get(identifier);
        if (cached) {
          return cached.value;
        }
        return this.singletons.add(identifier, this.construct(entry, inner));
      }

      case Lifetime.Scoped: {
        const { scope, singleton } = context;
        if (scope === undefined) {
          throw new NoActiveScopeError(
            describeIdentifier(identifier),
            renderDependencyGraph(path, identifier, 'NO ACTIVE SCOPE'),
          );
        }
        if (this.options.validateLifetimes && singleton !== undefined) {
          throw new ScopeMismatchError(
            describeIdentifier(singleton),
            describeIdentifier(identifier),
            renderDependencyGraph(path, identifier, 'SCOPE MISMATCH'),
          );
        }
        const cached = scope.instances.get(identifier);
        if (cached) {
          return cached.value;
        }
        return scope.instances.add(identifier, this.construct(entry, inner));
      }

      case Lifetime.PerRequest:
        return this.construct(entry, inner);
    }
  }

  /**
   * Builds one instance. `context.path` ends with the entry's identifier.
   */
  private construct<T>(entry: RegistrationEntry<T>, context: ResolutionContext): T {
    const { producer } = entry;
    this.logger.debug(
      `[${this.options.name}] Constructing ${describeIdentifier(entry.identifier)} (${entry.lifetime})`,
    );

    if (producer.kind === 'factory') {
      return this.invoke(entry, context, () => producer.factory());
    }

    const { implementation } = producer;
    const parameters = producer.parameters ?? getParameterDeclarations(implementation);
    if (implementation.length > parameters.length) {
      throw new ConstructionFailedError(
        describeIdentifier(entry.identifier),
        `no value for parameter 'arg${parameters.length}': declare constructor parameters ` +
          'with @Injectable() or useClass(implementation, parameters)',
        this.failureGraph(context),
      );
    }
    const args = parameters.map((parameter) => this.resolveArgument(entry, parameter, context));

    return this.invoke(entry, context, () => new implementation(...args));
  }

  /**
   * Fixed parameters win over injection; the overridden dependency is not
   * resolved at all.
   */
  private resolveArgument(
    entry: RegistrationEntry,
    parameter: ParameterDeclaration,
    context: ResolutionContext,
  ): unknown {
    if (Object.hasOwn(entry.fixedParams, parameter.name)) {
      return entry.fixedParams[parameter.name];
    }

    const { token } = parameter;
    if (token !== undefined && this.registry.isRegistered(token)) {
      return this.resolveIn(token, context);
    }
    if (parameter.optional) {
      return undefined;
    }

    const reason =
      token === undefined
        ? `no value for parameter '${parameter.name}'`
        : `no value for parameter '${parameter.name}': '${describeIdentifier(token)}' is not registered`;
    throw new ConstructionFailedError(
      describeIdentifier(entry.identifier),
      reason,
      this.failureGraph(context),
    );
  }

  private invoke<T>(
    entry: RegistrationEntry<T>,
    context: ResolutionContext,
    produce: () => T,
  ): T {
    try {
      return produce();
    } catch (error) {
      if (error instanceof DependencyResolutionError) {
        throw error;
      }
      throw new ConstructionFailedError(
        describeIdentifier(entry.identifier),
        error instanceof Error ? error.message : String(error),
        this.failureGraph(context),
        error,
      );
    }
  }

  private failureGraph(context: ResolutionContext): string {
    const { path } = context;
    return renderDependencyGraph(path.slice(0, -1), path[path.length - 1], 'FAILED');
  }

  // ==================== Scopes ====================

  enterScope(): ContainerScope {
    const scope = new ContainerScope(this, ++this.scopeSequence, this.logger);
    this.scopes.push(scope);
    this.logger.debug(
      `[${this.options.name}] Entered scope #${scope.id} (depth ${this.scopes.length})`,
    );
    return scope;
  }

  createScope(): ContainerScope {
    return this.enterScope();
  }

  runInScope<R>(body: (scope: ContainerScope) => R): R {
    const scope = this.enterScope();
    try {
      return body(scope);
    } finally {
      scope.dispose();
    }
  }

  async runInScopeAsync<R>(body: (scope: ContainerScope) => Promise<R>): Promise<R> {
    const scope = this.enterScope();
    try {
      return await body(scope);
    } finally {
      scope.dispose();
    }
  }

  /**
   * @internal Pops `scope` off the stack. Scopes still open above it are
   * disposed first, innermost first.
   */
  release(scope: ContainerScope): void {
    const index = this.scopes.indexOf(scope);
    if (index === -1) {
      throw new ScopeStateError(`Scope #${scope.id} is not active`);
    }

    for (let nested = this.scopes.length - 1; nested > index; nested--) {
      const leaked = this.scopes[nested];
      this.logger.warn(
        `[${this.options.name}] Scope #${leaked.id} was still open when scope #${scope.id} exited`,
      );
      leaked.dispose();
    }

    this.scopes.pop();
    this.logger.debug(
      `[${this.options.name}] Exited scope #${scope.id} (depth ${this.scopes.length})`,
    );
  }
}
