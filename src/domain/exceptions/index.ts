/**
 * scopewire - Exception Module
 *
 * Errors raised during registration lookup, resolution and scope handling
 */

export {
  DependencyResolutionError,
  UnregisteredCapabilityError,
  NoActiveScopeError,
  ConstructionFailedError,
  CyclicDependencyError,
  ScopeMismatchError,
  ScopeStateError,
} from './exceptions';

export type { ResolutionErrorCode } from './exceptions';
