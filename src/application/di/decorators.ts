/**
 * scopewire - Injection Decorators
 *
 * Constructor injection driven by `reflect-metadata`. With
 * `emitDecoratorMetadata` enabled the compiler records the declared
 * constructor parameter types of every decorated class under
 * `design:paramtypes`; the container resolves class-typed parameters from
 * those. Interface-typed parameters are emitted as `Object` and need an
 * explicit `@Inject(token)`.
 *
 * @example
 * ```typescript
 * @Injectable({ lifetime: Lifetime.Scoped })
 * class OrderService {
 *   constructor(
 *     private readonly repository: OrderRepository,
 *     @Inject(IClock) private readonly clock: IClock,
 *     @Named('pageSize') private readonly pageSize: number,
 *     @Optional() private readonly audit?: AuditTrail,
 *   ) {}
 * }
 *
 * container.addScoped(OrderService, { pageSize: 50 });
 * ```
 */

import 'reflect-metadata';

import { Lifetime } from '../../domain/lifetime';
import type {
  AbstractConstructor,
  ParameterDeclaration,
  ServiceIdentifier,
} from './IDependencyInjection';

/**
 * Options of {@link Injectable}
 */
export interface InjectableOptions {
  /** Lifetime used when the class is registered without one */
  lifetime?: Lifetime;
}

interface ParameterMetadata {
  token?: ServiceIdentifier;
  name?: string;
  optional?: boolean;
}

const LIFETIME_KEY = 'injectable:scope';
const PARAMETERS_KEY = 'injectable:parameters';

const LIFETIMES: readonly unknown[] = Object.values(Lifetime);

/**
 * Parameter types the compiler emits for primitives and erased types;
 * they never identify a capability.
 */
const NON_INJECTABLE_TYPES: ReadonlySet<unknown> = new Set<unknown>([
  Object,
  String,
  Number,
  Boolean,
  Symbol,
  BigInt,
  Array,
  Function,
  Promise,
]);

/**
 * Marks a class as injectable and records its default lifetime.
 */
export function Injectable(options: InjectableOptions = {}): ClassDecorator {
  return (target) => {
    if (options.lifetime !== undefined) {
      Reflect.defineMetadata(LIFETIME_KEY, options.lifetime, target);
    }
  };
}

/**
 * Injects `identifier` into a constructor parameter, overriding the
 * emitted parameter type.
 */
export function Inject(identifier: ServiceIdentifier): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    updateParameter(target, parameterIndex, { token: identifier });
  };
}

/**
 * Names a constructor parameter so it can be supplied through fixed
 * parameters.
 */
export function Named(name: string): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    updateParameter(target, parameterIndex, { name });
  };
}

/**
 * Lets a constructor parameter be `undefined` when it can be neither
 * resolved nor supplied.
 */
export function Optional(): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    updateParameter(target, parameterIndex, { optional: true });
  };
}

/**
 * Lifetime declared with {@link Injectable}, if any. Subclasses inherit it.
 */
export function getInjectableLifetime(target: AbstractConstructor): Lifetime | undefined {
  const lifetime: unknown = Reflect.getMetadata(LIFETIME_KEY, target);
  return isLifetime(lifetime) ? lifetime : undefined;
}

/**
 * Reads the constructor parameter declarations of a decorated class.
 *
 * @remarks
 * Parameters without `@Named` are called `arg0`, `arg1`, ...
 * A subclass without a decorated constructor of its own reuses its
 * base's declarations.
 */
export function getParameterDeclarations(
  target: AbstractConstructor,
): ParameterDeclaration[] {
  const emitted = readParamTypes(target);
  const overrides = readParameterMetadata(
    target,
    Reflect.hasOwnMetadata('design:paramtypes', target),
  );
  const count = Math.max(emitted.length, overrides.length);

  const declarations: ParameterDeclaration[] = [];
  for (let index = 0; index < count; index++) {
    const meta = overrides[index] ?? {};
    const emittedType = emitted[index];
    const token = meta.token ?? (isInjectableType(emittedType) ? emittedType : undefined);

    declarations.push({
      name: meta.name ?? `arg${index}`,
      ...(token !== undefined && { token }),
      ...(meta.optional === true && { optional: true }),
    });
  }
  return declarations;
}

function updateParameter(
  target: object,
  parameterIndex: number,
  patch: ParameterMetadata,
): void {
  // Own metadata only, so decorating a subclass never rewrites its base
  const own = [...readParameterMetadata(target, true)];
  own[parameterIndex] = { ...own[parameterIndex], ...patch };
  Reflect.defineMetadata(PARAMETERS_KEY, own, target);
}

function readParameterMetadata(
  target: object,
  own: boolean,
): readonly (ParameterMetadata | undefined)[] {
  const stored: unknown = own
    ? Reflect.getOwnMetadata(PARAMETERS_KEY, target)
    : Reflect.getMetadata(PARAMETERS_KEY, target);
  return Array.isArray(stored) ? stored : [];
}

function readParamTypes(target: object): unknown[] {
  const types: unknown = Reflect.getMetadata('design:paramtypes', target);
  return Array.isArray(types) ? types : [];
}

function isInjectableType(value: unknown): value is AbstractConstructor {
  return typeof value === 'function' && !NON_INJECTABLE_TYPES.has(value);
}

function isLifetime(value: unknown): value is Lifetime {
  return LIFETIMES.includes(value);
}
