/**
 * @module scopewire/domain
 * @description Domain layer exports
 */

// ============================================================================
// Lifetimes
// ============================================================================

export * from './lifetime';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
