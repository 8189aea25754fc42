/**
 * scopewire - Injection Tokens
 *
 * Interfaces are erased at runtime, so they cannot be used as map keys.
 * An `InjectionToken` gives such a capability a stable runtime identity
 * while keeping the resolved type.
 *
 * @example
 * ```typescript
 * interface IClock { now(): Date }
 * const IClock = new InjectionToken<IClock>('IClock');
 *
 * container.addFactory(IClock, () => ({ now: () => new Date() }));
 * const clock = container.resolve(IClock); // typed as IClock
 * ```
 */
export class InjectionToken<T> {
  /** Carries `T` for inference only; never assigned. */
  declare readonly __type?: T;

  constructor(public readonly description: string) {}

  toString(): string {
    return `InjectionToken(${this.description})`;
  }
}
