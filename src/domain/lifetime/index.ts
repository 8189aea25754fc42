/**
 * scopewire - Lifetime Module
 */

export { Lifetime } from './Lifetime';
