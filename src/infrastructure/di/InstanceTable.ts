/**
 * scopewire - Instance tables
 *
 * Backing store of the singleton table and of every scope table.
 */

import type { ServiceIdentifier } from '../../application/di';

export interface CachedInstance<T> {
  readonly identifier: ServiceIdentifier<T>;
  readonly value: T;
}

function isCachedFor<T>(
  cached: CachedInstance<unknown>,
  identifier: ServiceIdentifier<T>,
): cached is CachedInstance<T> {
  return cached.identifier === identifier;
}

/**
 * Identifier → instance map. An entry is written once and never
 * overwritten; iteration follows creation order.
 */
export class InstanceTable {
  private readonly instances = new Map<ServiceIdentifier, CachedInstance<unknown>>();

  get size(): number {
    return this.instances.size;
  }

  has(identifier: ServiceIdentifier): boolean {
    return this.instances.has(identifier);
  }

  get<T>(identifier: ServiceIdentifier<T>): CachedInstance<T> | undefined {
    const cached = this.instances.get(identifier);
    return cached !== undefined && isCachedFor(cached, identifier) ? cached : undefined;
  }

  /**
   * Stores `value` unless an instance is already cached, and returns the
   * stored one.
   */
  add<T>(identifier: ServiceIdentifier<T>, value: T): T {
    const existing = this.get(identifier);
    if (existing) {
      return existing.value;
    }
    this.instances.set(identifier, { identifier, value });
    return value;
  }

  values(): unknown[] {
    return [...this.instances.values()].map((cached) => cached.value);
  }

  clear(): void {
    this.instances.clear();
  }
}
