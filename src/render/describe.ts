/**
 * Debug formatting for frame sequences
 */

import type { ArrayRange } from '../builder/array-builder';
import { componentName } from '../common/component';
import type { AttributeValue, Frame } from '../frames/types';

function describeValue(value: AttributeValue): string {
  switch (value.kind) {
    case 'string':
      return JSON.stringify(value.value);
    case 'handler':
      return 'handler';
    case 'opaque':
      return 'opaque';
  }
}

/**
 * @example
 * describeFrame(elementFrame(0, 'ul')) // 'Element("ul", len=0)'
 */
export function describeFrame(frame: Frame): string {
  switch (frame.frameType) {
    case 'element':
      return `Element(${JSON.stringify(frame.elementName)}, len=${frame.subtreeLength})`;
    case 'component':
      return `Component(${componentName(frame.componentType)}, len=${frame.subtreeLength})`;
    case 'text':
      return `Text(${JSON.stringify(frame.textContent)})`;
    case 'attribute':
      return `Attribute(${JSON.stringify(frame.attributeName)}, ${describeValue(frame.attributeValue)})`;
    case 'region':
      return `Region(len=${frame.subtreeLength})`;
  }
}

export function describeFrames(
  frames: ArrayRange<Frame> | ReadonlyArray<Frame>
): string[] {
  const out: string[] = [];
  for (const frame of frames) out.push(describeFrame(frame));
  return out;
}
