/**
 * scopewire - Basic Example
 *
 * Demonstrates the core container concepts:
 * - Lifetimes (PerRequest, Scoped, Singleton)
 * - Constructor injection with decorators and tokens
 * - Fixed parameters
 * - Nested scopes and disposal
 * - Resolution errors with dependency graphs
 */

import 'reflect-metadata';

import {
  Container,
  DependencyResolutionError,
  Inject,
  InjectionToken,
  Injectable,
  Lifetime,
  Named,
  consoleLogger,
} from '../src';

// ============================================================================
// Capabilities
// ============================================================================

interface IClock {
  now(): Date;
}

const IClock = new InjectionToken<IClock>('IClock');

@Injectable({ lifetime: Lifetime.Singleton })
class AppConfig {
  readonly databaseUrl = 'memory://orders';
}

@Injectable({ lifetime: Lifetime.Scoped })
class UnitOfWork {
  private readonly pending: string[] = [];

  constructor(readonly config: AppConfig) {}

  track(change: string): void {
    this.pending.push(change);
  }

  dispose(): void {
    console.log(`UnitOfWork closed with ${this.pending.length} pending change(s)`);
  }
}

@Injectable()
class PlaceOrderHandler {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    @Inject(IClock) private readonly clock: IClock,
    @Named('currency') private readonly currency: string,
  ) {}

  handle(orderId: string, amount: number): string {
    this.unitOfWork.track(orderId);
    return `${orderId}: ${amount} ${this.currency} at ${this.clock.now().toISOString()}`;
  }
}

// ============================================================================
// Composition root
// ============================================================================

const container = new Container({ name: 'orders', logger: consoleLogger })
  .addSingleton(AppConfig)
  .addScoped(UnitOfWork)
  .addPerRequest(PlaceOrderHandler, { currency: 'EUR' })
  .addFactory(IClock, () => ({ now: () => new Date() }), Lifetime.Singleton);

function main(): void {
  // One scope per request
  for (const [orderId, amount] of [
    ['order-1', 30],
    ['order-2', 45],
  ] as const) {
    const receipt = container.runInScope((scope) =>
      scope.resolve(PlaceOrderHandler).handle(orderId, amount),
    );
    console.log(receipt);
  }

  // Outside a scope the handler cannot get its unit of work
  try {
    container.resolve(PlaceOrderHandler);
  } catch (error) {
    if (!(error instanceof DependencyResolutionError)) {
      throw error;
    }
    console.log(`${error.code}: ${error.message}`);
    console.log(error.dependencyGraph);
  }
}

main();
