/**
 * scopewire - Resolution Exceptions
 *
 * Error taxonomy raised by the container. Every error carries the
 * dependency graph leading to the failure so that a deep resolution
 * failure can be traced back to the service that was requested.
 *
 * @example
 * ```typescript
 * try {
 *   const service = container.resolve(UserService);
 * } catch (error) {
 *   if (error instanceof DependencyResolutionError) {
 *     logger.error('DI resolution failed', {
 *       code: error.code,
 *       graph: error.dependencyGraph,
 *     });
 *   }
 *   throw error;
 * }
 * ```
 */

/**
 * Machine-readable error codes
 */
export type ResolutionErrorCode =
  | 'UNREGISTERED_CAPABILITY'
  | 'NO_ACTIVE_SCOPE'
  | 'CONSTRUCTION_FAILED'
  | 'CYCLIC_DEPENDENCY'
  | 'SCOPE_MISMATCH'
  | 'SCOPE_STATE';

/**
 * Base class of every error raised while resolving a service.
 *
 * @remarks
 * The graph is rendered from the resolution path, e.g.
 *
 * ```
 * └─ UserController
 *   └─ UserService
 *     └─ IConfig (UNREGISTERED)
 * ```
 */
export class DependencyResolutionError extends Error {
  /**
   * A string representation of the dependency graph leading to the failure.
   */
  public readonly dependencyGraph: string;

  constructor(
    public readonly code: ResolutionErrorCode,
    message: string,
    dependencyGraph: string = '',
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'DependencyResolutionError';
    this.dependencyGraph = dependencyGraph;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The requested service was never registered
 */
export class UnregisteredCapabilityError extends DependencyResolutionError {
  constructor(
    public readonly serviceName: string,
    dependencyGraph?: string,
  ) {
    super(
      'UNREGISTERED_CAPABILITY',
      `Service '${serviceName}' is not registered in the container`,
      dependencyGraph,
    );
    this.name = 'UnregisteredCapabilityError';
  }
}

/**
 * A scoped service was requested while no scope is active
 */
export class NoActiveScopeError extends DependencyResolutionError {
  constructor(
    public readonly serviceName: string,
    dependencyGraph?: string,
  ) {
    super(
      'NO_ACTIVE_SCOPE',
      `Scoped service '${serviceName}' cannot be resolved outside of a scope`,
      dependencyGraph,
    );
    this.name = 'NoActiveScopeError';
  }
}

/**
 * The producer threw, or a required constructor parameter could not be
 * supplied. The original error is available as `cause`.
 */
export class ConstructionFailedError extends DependencyResolutionError {
  constructor(
    public readonly serviceName: string,
    reason: string,
    dependencyGraph?: string,
    cause?: unknown,
  ) {
    super(
      'CONSTRUCTION_FAILED',
      `Failed to construct '${serviceName}': ${reason}`,
      dependencyGraph,
      cause === undefined ? undefined : { cause },
    );
    this.name = 'ConstructionFailedError';
  }
}

/**
 * A service was requested again while it was still being constructed
 */
export class CyclicDependencyError extends DependencyResolutionError {
  constructor(
    public readonly cycle: readonly string[],
    dependencyGraph?: string,
  ) {
    super(
      'CYCLIC_DEPENDENCY',
      `Circular dependency detected: ${cycle.join(' → ')}`,
      dependencyGraph,
    );
    this.name = 'CyclicDependencyError';
  }
}

/**
 * A singleton depends on a scoped service (only raised when lifetime
 * validation is enabled)
 */
export class ScopeMismatchError extends DependencyResolutionError {
  constructor(
    public readonly singletonName: string,
    public readonly scopedName: string,
    dependencyGraph?: string,
  ) {
    super(
      'SCOPE_MISMATCH',
      `Scope mismatch: Singleton '${singletonName}' cannot depend on Scoped '${scopedName}'`,
      dependencyGraph,
    );
    this.name = 'ScopeMismatchError';
  }
}

/**
 * A scope was disposed out of order, or used after disposal
 */
export class ScopeStateError extends DependencyResolutionError {
  constructor(message: string) {
    super('SCOPE_STATE', message);
    this.name = 'ScopeStateError';
  }
}
