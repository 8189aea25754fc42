/**
 * scopewire - Container configuration
 */

import type { ILogger } from '../logging';
import { silentLogger } from '../logging';

/**
 * Container configuration options
 */
export interface ContainerOptions {
  /** Label used in log lines */
  name?: string;

  /** Receives registration, construction and scope diagnostics */
  logger?: ILogger;

  /** Fail fast with `CyclicDependencyError` instead of overflowing the stack */
  detectCycles?: boolean;

  /** Reject singletons that depend, directly or not, on scoped services */
  validateLifetimes?: boolean;
}

export type ResolvedContainerOptions = Required<ContainerOptions>;

export const DEFAULT_CONTAINER_OPTIONS: Readonly<ResolvedContainerOptions> = {
  name: 'container',
  logger: silentLogger,
  detectCycles: true,
  validateLifetimes: false,
};

/**
 * Fills in defaults for every option that is not set.
 */
export function resolveContainerOptions(
  options: ContainerOptions = {},
): ResolvedContainerOptions {
  return {
    name: options.name ?? DEFAULT_CONTAINER_OPTIONS.name,
    logger: options.logger ?? DEFAULT_CONTAINER_OPTIONS.logger,
    detectCycles: options.detectCycles ?? DEFAULT_CONTAINER_OPTIONS.detectCycles,
    validateLifetimes:
      options.validateLifetimes ?? DEFAULT_CONTAINER_OPTIONS.validateLifetimes,
  };
}
