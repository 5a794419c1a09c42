/**
 * Common call contracts: Props
 *
 * Props are what a component frame's attributes describe once the renderer
 * resolves the component.
 */

/**
 * Props accepted by components and elements.
 * Intentionally permissive but provides a single named type.
 */
export interface Props {
  /** Optional key for keyed lists */
  key?: string | number | symbol;
  /** Optional children slot */
  children?: unknown;
  /** Allow additional arbitrary attributes (e.g., class, id, data-*) */
  [attr: string]: unknown;
}
