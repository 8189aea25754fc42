/**
 * @fileoverview Shared test utilities
 */

import type { ILogger } from '../src';

/**
 * Runs `fn` and returns what it threw.
 *
 * @throws Error if `fn` returns normally
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw, but it returned normally');
}

/**
 * Logger whose methods are Jest mocks
 */
export function createMockLogger() {
  return {
    debug: jest.fn<void, Parameters<ILogger['debug']>>(),
    info: jest.fn<void, Parameters<ILogger['info']>>(),
    warn: jest.fn<void, Parameters<ILogger['warn']>>(),
    error: jest.fn<void, Parameters<ILogger['error']>>(),
  } satisfies ILogger;
}
