/**
 * @fileoverview Service lifetime policies
 *
 * @packageDocumentation
 * @module scopewire/domain/lifetime
 *
 * ## Lifetimes Explained
 *
 * ### 1. Singleton (Container-Wide)
 *
 * ```
 * resolve(Config) → Config (instance-1)
 * resolve(Config) → Config (instance-1)  ← Same instance!
 * ```
 *
 * ### 2. PerRequest (Always New)
 *
 * ```
 * resolve(Command) → Command (instance-1)
 * resolve(Command) → Command (instance-2)  ← New instance each resolve!
 * ```
 *
 * ### 3. Scoped (One Per Active Scope)
 *
 * ```
 * Scope 1 → UnitOfWork (instance-1)
 *         → UnitOfWork (instance-1)  ← Same instance within scope
 *
 * Scope 2 → UnitOfWork (instance-2)  ← New instance for new scope
 * ```
 *
 * A scoped capability has no default scope: resolving it while no scope
 * is active is an error.
 */
export enum Lifetime {
  /**
   * A fresh instance on every resolution. Never cached.
   */
  PerRequest = 'per-request',

  /**
   * One instance per active scope. Scopes nest; leaving a nested scope
   * restores the enclosing scope's instances.
   */
  Scoped = 'scoped',

  /**
   * One instance for the container's whole life, created lazily on the
   * first resolution and never replaced.
   *
   * @remarks
   * Never store scope-specific state in singletons. A singleton that
   * captures a scoped dependency keeps the instance of the scope it was
   * first resolved in.
   */
  Singleton = 'singleton',
}

