/**
 * @module scopewire/application/di
 * @description Dependency Injection contracts, decorators and options
 */

// ============================================================================
// Core Interfaces
// ============================================================================

export type {
  Constructor,
  AbstractConstructor,
  ServiceIdentifier,
  ParameterDeclaration,
  ClassProducer,
  FactoryProducer,
  Producer,
  FixedParams,
  RegistrationEntry,
  IServiceRegistry,
  IServiceResolver,
  IServiceScope,
  IContainer,
  IDisposable,
} from './IDependencyInjection';

// ============================================================================
// Identifiers and Producers
// ============================================================================

export { InjectionToken } from './InjectionToken';
export {
  useClass,
  useFactory,
  useValue,
  describeIdentifier,
  isClassIdentifier,
} from './producers';

// ============================================================================
// Decorators
// ============================================================================

/**
 * @example
 * ```typescript
 * import { Injectable, Inject, Lifetime } from 'scopewire';
 *
 * @Injectable({ lifetime: Lifetime.Singleton })
 * class ReportService {
 *   constructor(@Inject(IClock) private readonly clock: IClock) {}
 * }
 * ```
 */
export {
  Injectable,
  Inject,
  Named,
  Optional,
  getInjectableLifetime,
  getParameterDeclarations,
} from './decorators';
export type { InjectableOptions } from './decorators';

// ============================================================================
// Configuration
// ============================================================================

export {
  DEFAULT_CONTAINER_OPTIONS,
  resolveContainerOptions,
} from './options';
export type { ContainerOptions, ResolvedContainerOptions } from './options';
