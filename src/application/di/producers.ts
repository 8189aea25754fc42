/**
 * scopewire - Producer helpers
 */

import type {
  ClassProducer,
  Constructor,
  FactoryProducer,
  ParameterDeclaration,
  ServiceIdentifier,
} from './IDependencyInjection';
import { InjectionToken } from './InjectionToken';

/**
 * Class producer. Pass `parameters` to declare the constructor's
 * dependencies explicitly instead of relying on decorator metadata.
 *
 * @example
 * ```typescript
 * container.register(
 *   IMailer,
 *   useClass(SmtpMailer, [
 *     { name: 'transport', token: ITransport },
 *     { name: 'from' },
 *   ]),
 *   Lifetime.Singleton,
 *   { from: 'noreply@example.test' },
 * );
 * ```
 */
export function useClass<T>(
  implementation: Constructor<T>,
  parameters?: readonly ParameterDeclaration[],
): ClassProducer<T> {
  return parameters === undefined
    ? { kind: 'class', implementation }
    : { kind: 'class', implementation, parameters };
}

/**
 * Factory producer. The factory receives no arguments; close over the
 * container if it needs other services.
 */
export function useFactory<T>(factory: () => T): FactoryProducer<T> {
  return { kind: 'factory', factory };
}

/**
 * Factory producer returning a prebuilt value.
 */
export function useValue<T>(value: T): FactoryProducer<T> {
  return useFactory(() => value);
}

/**
 * Printable name of an identifier, used in logs and error graphs.
 */
export function describeIdentifier(identifier: ServiceIdentifier): string {
  if (identifier instanceof InjectionToken) {
    return identifier.description;
  }
  return identifier.name || '<anonymous class>';
}

/**
 * True when the identifier is itself a class that can be used as its
 * own implementation.
 */
export function isClassIdentifier<T>(
  identifier: ServiceIdentifier<T>,
): identifier is Constructor<T> {
  return typeof identifier === 'function';
}
