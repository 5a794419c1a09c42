/**
 * Frame data model
 *
 * A frame is one node in the depth-first recording of a render pass. The
 * renderer rebuilds parent/child/sibling relationships from frame order and
 * `subtreeLength` alone, so frames carry no tree pointers.
 */

import type { ComponentType } from '../common/component';

export type FrameType = 'element' | 'component' | 'text' | 'attribute' | 'region';

/** Frame kinds that are opened and closed, and whose length is back-patched */
export type ContainerFrameType = 'element' | 'component' | 'region';

export interface UIEventArgs {
  type: string;
  [detail: string]: unknown;
}

export type UIEventHandler = (event: UIEventArgs) => void;

export type AttributeValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'handler'; readonly handler: UIEventHandler }
  | { readonly kind: 'opaque'; readonly value: unknown };

interface FrameBase {
  /** Caller-assigned source position, consumed by the diff engine */
  readonly sequence: number;
  /**
   * Frames spanned by this node and its descendants, inclusive. Leaves are
   * always 1; containers are 0 until closed.
   */
  readonly subtreeLength: number;
}

export interface ElementFrame extends FrameBase {
  readonly frameType: 'element';
  readonly elementName: string;
}

export interface ComponentFrame extends FrameBase {
  readonly frameType: 'component';
  readonly componentType: ComponentType;
}

export interface TextFrame extends FrameBase {
  readonly frameType: 'text';
  readonly textContent: string;
}

export interface AttributeFrame extends FrameBase {
  readonly frameType: 'attribute';
  readonly attributeName: string;
  readonly attributeValue: AttributeValue;
}

export interface RegionFrame extends FrameBase {
  readonly frameType: 'region';
}

export type ContainerFrame = ElementFrame | ComponentFrame | RegionFrame;

export type Frame = ContainerFrame | TextFrame | AttributeFrame;
