/**
 * @module scopewire/application
 * @description Application layer exports
 */

// ============================================================================
// Dependency Injection
// ============================================================================

export * from './di';

// ============================================================================
// Logging
// ============================================================================

export * from './logging';
