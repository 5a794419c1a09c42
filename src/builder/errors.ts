/**
 * Render tree contract violations
 *
 * Every failure here is a defect in the code driving the builder (usually
 * generated template code), never a transient condition. They are thrown
 * at the operation that detects them and are not retried.
 */

import type { ContainerFrameType, FrameType } from '../frames/types';

export type RenderTreeErrorCode =
  | 'UNBALANCED_STRUCTURE'
  | 'UNCLOSED_STRUCTURE'
  | 'MISMATCHED_CLOSE_TYPE'
  | 'ILLEGAL_ATTRIBUTE_POSITION'
  | 'WRONG_FRAME_KIND';

export abstract class RenderTreeError extends Error {
  abstract readonly code: RenderTreeErrorCode;
}

export class UnbalancedStructureError extends RenderTreeError {
  readonly code = 'UNBALANCED_STRUCTURE';
  constructor(readonly closing: ContainerFrameType) {
    super(`Cannot close ${closing}: there is no open element, component or region.`);
    this.name = 'UnbalancedStructureError';
    Object.setPrototypeOf(this, UnbalancedStructureError.prototype);
  }
}

export class UnclosedStructureError extends RenderTreeError {
  readonly code = 'UNCLOSED_STRUCTURE';
  constructor(
    readonly innermost: ContainerFrameType,
    readonly openDepth: number
  ) {
    super(
      `Render pass ended with ${openDepth} open frame(s) (innermost: ${innermost}).`
    );
    this.name = 'UnclosedStructureError';
    Object.setPrototypeOf(this, UnclosedStructureError.prototype);
  }
}

export class MismatchedCloseTypeError extends RenderTreeError {
  readonly code = 'MISMATCHED_CLOSE_TYPE';
  constructor(
    readonly expected: ContainerFrameType,
    readonly actual: ContainerFrameType,
    readonly index: number
  ) {
    super(
      `Cannot close ${expected}: the innermost open frame (index ${index}) is a ${actual}.`
    );
    this.name = 'MismatchedCloseTypeError';
    Object.setPrototypeOf(this, MismatchedCloseTypeError.prototype);
  }
}

export class IllegalAttributePositionError extends RenderTreeError {
  readonly code = 'ILLEGAL_ATTRIBUTE_POSITION';
  readonly allowed: readonly FrameType[] = ['element', 'component'];
  constructor(readonly actual: FrameType | null) {
    super(
      `Attributes may only be added immediately after frames of type element or component (last frame: ${actual ?? 'none'}).`
    );
    this.name = 'IllegalAttributePositionError';
    Object.setPrototypeOf(this, IllegalAttributePositionError.prototype);
  }
}

export class WrongFrameKindError extends RenderTreeError {
  readonly code = 'WRONG_FRAME_KIND';
  constructor(
    readonly expected: FrameType,
    readonly actual: FrameType
  ) {
    super(`The frame type must be ${expected}, got ${actual}.`);
    this.name = 'WrongFrameKindError';
    Object.setPrototypeOf(this, WrongFrameKindError.prototype);
  }
}

export function isRenderTreeError(value: unknown): value is RenderTreeError {
  return value instanceof RenderTreeError;
}
