/**
 * Common call contracts: Component signatures
 */

import type { Props } from './props';

export type ComponentContext = {
  signal: AbortSignal;
};

/**
 * Identifies an instantiable component. Component frames only record it;
 * the renderer resolves and invokes it later.
 */
export type ComponentType = (
  props: Props,
  context?: ComponentContext
) => unknown;

export function componentName(type: ComponentType): string {
  return type.name || 'Anonymous';
}
