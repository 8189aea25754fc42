/**
 * @fileoverview scopewire - dependency resolution and lifecycle container
 * @description
 * Maps capabilities to producers and controls how many instances exist and
 * for how long: per request, per scope, or for the container's life.
 *
 * ## Architecture Layers
 *
 * - **domain**: lifetimes and the resolution error taxonomy
 * - **application**: identifiers, producers, contracts, decorators, options
 * - **infrastructure**: `ServiceRegistry`, `Container`, `ContainerScope`
 *
 * @example
 * ```typescript
 * import 'reflect-metadata';
 * import { Container, Injectable, Lifetime } from 'scopewire';
 *
 * @Injectable({ lifetime: Lifetime.Scoped })
 * class UnitOfWork {}
 *
 * const container = new Container().addScoped(UnitOfWork);
 * container.runInScope((scope) => scope.resolve(UnitOfWork));
 * ```
 *
 * @packageDocumentation
 * @module scopewire
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';
