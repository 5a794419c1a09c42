/**
 * frametree: linearized render trees
 *
 * Public API surface. Generated component code drives a RenderTreeBuilder;
 * renderers consume the frames it produces.
 */

// Builder
export { RenderTreeBuilder } from './builder/render-tree-builder';
export type { RenderTreeBuilderOptions } from './builder/render-tree-builder';
export { ArrayBuilder, ArrayRange } from './builder/array-builder';

// Errors
export {
  RenderTreeError,
  UnbalancedStructureError,
  UnclosedStructureError,
  MismatchedCloseTypeError,
  IllegalAttributePositionError,
  WrongFrameKindError,
  isRenderTreeError,
} from './builder/errors';
export type { RenderTreeErrorCode } from './builder/errors';

// Frames
export * from './frames';

// Render passes and consumers
export { renderFragment, tryBuild } from './render/fragment';
export type { RenderFragment, BuildResult } from './render/fragment';
export { frameEnd, attributesOf, childIndices, rootIndices } from './render/walk';
export { describeFrame, describeFrames } from './render/describe';
export { buildVNode } from './render/vnode';
export type { VNode } from './render/vnode';

// Essential public types
export type { Props } from './common/props';
export type { ComponentType, ComponentContext } from './common/component';
export { Fragment } from './common/jsx';
export type { JSXElement } from './common/jsx';

// Logging
export { createLogger, logger } from './dev/logger';
export type { Logger } from './dev/logger';
