/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Implementations of the application-layer contracts: the registry, the
 * container and its scope handles.
 *
 * @packageDocumentation
 * @module scopewire/infrastructure
 */

// Dependency injection container
export * from './di';
