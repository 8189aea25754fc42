/**
 * scopewire - Logging Module
 */

export type { ILogger } from './logger';
export { consoleLogger, silentLogger } from './logger';
