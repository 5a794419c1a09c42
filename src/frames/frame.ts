/**
 * Frame constructors
 *
 * Pure factories, one per variant. Frames are never mutated; the builder's
 * back-patch replaces a container with the value from `withSubtreeLength`.
 */

import type { ComponentType } from '../common/component';
import type {
  AttributeFrame,
  AttributeValue,
  ComponentFrame,
  ContainerFrame,
  ElementFrame,
  Frame,
  RegionFrame,
  TextFrame,
  UIEventHandler,
} from './types';

// Attribute values

export function stringValue(value: string): AttributeValue {
  return { kind: 'string', value };
}

export function handlerValue(handler: UIEventHandler): AttributeValue {
  return { kind: 'handler', handler };
}

export function opaqueValue(value: unknown): AttributeValue {
  return { kind: 'opaque', value };
}

// Frames

export function elementFrame(sequence: number, elementName: string): ElementFrame {
  return { frameType: 'element', sequence, elementName, subtreeLength: 0 };
}

export function componentFrame(
  sequence: number,
  componentType: ComponentType
): ComponentFrame {
  return { frameType: 'component', sequence, componentType, subtreeLength: 0 };
}

export function regionFrame(sequence: number): RegionFrame {
  return { frameType: 'region', sequence, subtreeLength: 0 };
}

export function textFrame(sequence: number, textContent: string): TextFrame {
  return { frameType: 'text', sequence, textContent, subtreeLength: 1 };
}

export function attributeFrame(
  sequence: number,
  attributeName: string,
  attributeValue: AttributeValue
): AttributeFrame {
  return {
    frameType: 'attribute',
    sequence,
    attributeName,
    attributeValue,
    subtreeLength: 1,
  };
}

export function stringAttributeFrame(
  sequence: number,
  name: string,
  value: string
): AttributeFrame {
  return attributeFrame(sequence, name, stringValue(value));
}

export function handlerAttributeFrame(
  sequence: number,
  name: string,
  handler: UIEventHandler
): AttributeFrame {
  return attributeFrame(sequence, name, handlerValue(handler));
}

export function opaqueAttributeFrame(
  sequence: number,
  name: string,
  value: unknown
): AttributeFrame {
  return attributeFrame(sequence, name, opaqueValue(value));
}

// Derived transforms

export function withSubtreeLength<F extends ContainerFrame>(
  frame: F,
  subtreeLength: number
): F {
  return { ...frame, subtreeLength };
}

export function withAttributeSequence(
  frame: AttributeFrame,
  sequence: number
): AttributeFrame {
  return { ...frame, sequence };
}

// Guards

export function isContainerFrame(frame: Frame): frame is ContainerFrame {
  return (
    frame.frameType === 'element' ||
    frame.frameType === 'component' ||
    frame.frameType === 'region'
  );
}

export function isAttributeFrame(frame: Frame): frame is AttributeFrame {
  return frame.frameType === 'attribute';
}
