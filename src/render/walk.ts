/**
 * Frame sequence traversal
 *
 * Helpers for consumers that walk a finished frame sequence. Structure is
 * recovered from frame order and `subtreeLength` only.
 */

import { ArrayRange } from '../builder/array-builder';
import { invariant } from '../dev/invariant';
import type { AttributeFrame, Frame } from '../frames/types';

type FrameSource = ArrayRange<Frame> | ReadonlyArray<Frame>;

function frameAt(frames: FrameSource, index: number): Frame {
  const frame = frames instanceof ArrayRange ? frames.at(index) : frames[index];
  invariant(frame !== undefined, `No frame at index ${index}`, { index });
  return frame;
}

function countOf(frames: FrameSource): number {
  return frames instanceof ArrayRange ? frames.count : frames.length;
}

/** Index one past the last frame of the subtree starting at `index` */
export function frameEnd(frames: FrameSource, index: number): number {
  const frame = frameAt(frames, index);
  invariant(
    frame.subtreeLength >= 1,
    `Frame at index ${index} has not been closed`,
    { index, frameType: frame.frameType }
  );
  return index + frame.subtreeLength;
}

/**
 * Attribute frames belonging to the element or component at `index`: the
 * run of attributes directly after it. The builder also accepts attributes
 * after a closed child (the last non-attribute frame is still an element or
 * component); those sit inside the parent's span but belong to neither the
 * parent nor the child, and are not returned here.
 */
export function attributesOf(
  frames: FrameSource,
  index: number
): AttributeFrame[] {
  const end = frameEnd(frames, index);
  const attributes: AttributeFrame[] = [];
  for (let i = index + 1; i < end; i++) {
    const frame = frameAt(frames, i);
    if (frame.frameType !== 'attribute') break;
    attributes.push(frame);
  }
  return attributes;
}

/** Indices of the direct, non-attribute children of the frame at `index` */
export function childIndices(frames: FrameSource, index: number): number[] {
  const end = frameEnd(frames, index);
  const children: number[] = [];
  let i = index + 1;
  while (i < end) {
    const frame = frameAt(frames, i);
    if (frame.frameType === 'attribute') {
      i++;
      continue;
    }
    children.push(i);
    i = frameEnd(frames, i);
  }
  return children;
}

/** Indices of the top-level frames of a whole sequence */
export function rootIndices(frames: FrameSource): number[] {
  const roots: number[] = [];
  const count = countOf(frames);
  let i = 0;
  while (i < count) {
    roots.push(i);
    i = frameEnd(frames, i);
  }
  return roots;
}
