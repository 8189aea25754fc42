/**
 * scopewire - Scope handle
 */

import type {
  IDisposable,
  IServiceScope,
  ServiceIdentifier,
} from '../../application/di';
import type { ILogger } from '../../application/logging';
import { ScopeStateError } from '../../domain/exceptions';
import { InstanceTable } from './InstanceTable';

/**
 * Container side of a scope: resolution against a given scope table and
 * release of the scope from the active stack.
 *
 * @internal
 */
export interface ScopeHost {
  resolveWithin<T>(identifier: ServiceIdentifier<T>, scope: ContainerScope): T;
  isRegistered(identifier: ServiceIdentifier): boolean;
  release(scope: ContainerScope): void;
}

function isDisposable(value: unknown): value is IDisposable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  );
}

/**
 * ContainerScope - one scope table and the handle that releases it
 *
 * @remarks
 * Instances created through this scope are cached in its table until
 * the scope is disposed. Disposal restores the enclosing scope on the
 * container and then calls `dispose()` on every cached instance that has
 * one, newest first.
 */
export class ContainerScope implements IServiceScope {
  readonly instances = new InstanceTable();
  private disposed = false;

  constructor(
    private readonly host: ScopeHost,
    public readonly id: number,
    private readonly logger: ILogger,
  ) {}

  get isDisposed(): boolean {
    return this.disposed;
  }

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    if (this.disposed) {
      throw new ScopeStateError(`Scope #${this.id} has already been disposed`);
    }
    return this.host.resolveWithin(identifier, this);
  }

  isRegistered(identifier: ServiceIdentifier): boolean {
    return this.host.isRegistered(identifier);
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.host.release(this);
    this.disposed = true;

    const owned = this.instances.values().reverse();
    this.instances.clear();

    for (const instance of owned) {
      if (!isDisposable(instance)) {
        continue;
      }
      try {
        instance.dispose();
      } catch (error) {
        this.logger.error(`Error disposing scoped instance in scope #${this.id}:`, error);
      }
    }
  }
}
