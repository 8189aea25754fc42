/**
 * @module scopewire/infrastructure/di
 * @description Container implementation
 */

export { Container } from './Container';
export { ContainerScope } from './ContainerScope';
export { ServiceRegistry } from './ServiceRegistry';
export { InstanceTable } from './InstanceTable';
export type { CachedInstance } from './InstanceTable';
export { renderDependencyGraph } from './dependency-graph';
