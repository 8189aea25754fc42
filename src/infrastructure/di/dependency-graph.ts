/**
 * scopewire - Dependency graph rendering
 */

import type { ServiceIdentifier } from '../../application/di';
import { describeIdentifier } from '../../application/di';

/**
 * Renders a resolution path as an indented tree, annotating the node
 * where resolution stopped.
 *
 * @example
 * ```typescript
 * renderDependencyGraph([UserController, UserService], IConfig, 'UNREGISTERED');
 * // └─ UserController
 * //   └─ UserService
 * //     └─ IConfig (UNREGISTERED)
 * ```
 */
export function renderDependencyGraph(
  path: readonly ServiceIdentifier[],
  failing: ServiceIdentifier,
  annotation: string,
): string {
  const names = path.map(describeIdentifier);
  names.push(`${describeIdentifier(failing)} (${annotation})`);
  return names
    .map((name, depth) => `${'  '.repeat(depth)}└─ ${name}`)
    .join('\n');
}
