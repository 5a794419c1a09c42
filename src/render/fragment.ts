/**
 * Render fragments
 *
 * A fragment is any function that renders into a builder it is handed.
 * Passing the builder explicitly keeps concurrent render passes independent:
 * each pass owns its builder and nothing is looked up globally.
 */

import type { ArrayRange } from '../builder/array-builder';
import {
  UnclosedStructureError,
  isRenderTreeError,
  type RenderTreeError,
} from '../builder/errors';
import { RenderTreeBuilder } from '../builder/render-tree-builder';
import type { Frame } from '../frames/types';

export type RenderFragment = (builder: RenderTreeBuilder) => void;

export type BuildResult =
  | { readonly ok: true; readonly frames: ArrayRange<Frame> }
  | { readonly ok: false; readonly error: RenderTreeError };

/**
 * Runs a fragment against a cleared builder and returns its frames.
 * Reusing a builder across passes avoids reallocating its buffer.
 *
 * Throws `UnclosedStructureError` when the fragment leaves an element,
 * component or region open.
 */
export function renderFragment(
  fragment: RenderFragment,
  builder: RenderTreeBuilder = new RenderTreeBuilder()
): ArrayRange<Frame> {
  builder.clear();
  fragment(builder);
  const innermost = builder.innermostOpenType;
  if (innermost !== null) {
    throw new UnclosedStructureError(innermost, builder.openDepth);
  }
  return builder.getFrames();
}

/**
 * Like `renderFragment`, but reports contract violations as a value
 *
 * @example
 * ```ts
 * const result = tryBuild((b) => b.closeElement());
 * if (!result.ok) console.error(result.error.code); // UNBALANCED_STRUCTURE
 * ```
 */
export function tryBuild(
  fragment: RenderFragment,
  builder?: RenderTreeBuilder
): BuildResult {
  try {
    return { ok: true, frames: renderFragment(fragment, builder) };
  } catch (error) {
    if (isRenderTreeError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}
