/**
 * RenderTreeBuilder
 *
 * Single-writer accumulator for the frames of one render pass. Generated
 * component code issues open/add/close calls in traversal order; the
 * builder appends frames, tracks nesting, and back-patches each container's
 * subtree length when it closes.
 *
 * The builder is passed explicitly to whatever renders into it. There is no
 * ambient "current builder".
 */

import type { ComponentType } from '../common/component';
import { invariant } from '../dev/invariant';
import { warnUnless } from '../dev/warnings';
import {
  componentFrame,
  elementFrame,
  handlerAttributeFrame,
  isContainerFrame,
  opaqueAttributeFrame,
  regionFrame,
  stringAttributeFrame,
  textFrame,
  withAttributeSequence,
  withSubtreeLength,
} from '../frames/frame';
import type {
  ContainerFrame,
  ContainerFrameType,
  Frame,
  FrameType,
  UIEventHandler,
} from '../frames/types';
import { ArrayBuilder, type ArrayRange } from './array-builder';
import {
  IllegalAttributePositionError,
  MismatchedCloseTypeError,
  UnbalancedStructureError,
  WrongFrameKindError,
} from './errors';

export interface RenderTreeBuilderOptions {
  /** Initial frame capacity of the backing buffer */
  initialCapacity?: number;
}

type OpenEntry = {
  index: number;
  frameType: ContainerFrameType;
};

export class RenderTreeBuilder {
  private readonly entries: ArrayBuilder<Frame>;
  private readonly openStack: OpenEntry[] = [];
  private lastNonAttributeType: FrameType | null = null;

  constructor(options: RenderTreeBuilderOptions = {}) {
    this.entries = new ArrayBuilder<Frame>(options.initialCapacity);
  }

  /** Number of elements, components and regions not yet closed */
  get openDepth(): number {
    return this.openStack.length;
  }

  /** Kind of the innermost open container, or null when all are closed */
  get innermostOpenType(): ContainerFrameType | null {
    const top = this.openStack[this.openStack.length - 1];
    return top === undefined ? null : top.frameType;
  }

  /**
   * Appends an element frame. Balance with `closeElement()` after the
   * element's attributes and children.
   */
  openElement(sequence: number, elementName: string): void {
    this.open(elementFrame(sequence, elementName));
  }

  closeElement(): void {
    this.close('element');
  }

  /**
   * Appends a child component frame. Attributes added directly after it
   * become the component's parameters.
   */
  openComponent(sequence: number, componentType: ComponentType): void {
    this.open(componentFrame(sequence, componentType));
  }

  closeComponent(): void {
    this.close('component');
  }

  /**
   * Appends a region frame: a fragment the diff engine treats as a unit.
   * Regions have no rendered identity of their own.
   */
  openRegion(sequence: number): void {
    this.open(regionFrame(sequence));
  }

  closeRegion(): void {
    this.close('region');
  }

  /** Appends a text frame. Absent content becomes the empty string. */
  addText(sequence: number, textContent: unknown): void {
    this.append(textFrame(sequence, textOf(textContent)));
  }

  /**
   * Appends an attribute to the most recently opened element or component.
   */
  addAttribute(sequence: number, name: string, value: string): void;
  addAttribute(sequence: number, name: string, handler: UIEventHandler): void;
  addAttribute(
    sequence: number,
    name: string,
    value: string | UIEventHandler
  ): void {
    this.assertCanAddAttribute();
    if (typeof value === 'string') {
      this.append(stringAttributeFrame(sequence, name, value));
    } else {
      this.append(handlerAttributeFrame(sequence, name, value));
    }
  }

  /**
   * Appends an attribute whose representation depends on its owner:
   * elements only take text, so the value is stringified; components
   * receive it as-is.
   */
  addAttributeValue(sequence: number, name: string, value: unknown): void {
    switch (this.lastNonAttributeType) {
      case 'element':
        this.append(stringAttributeFrame(sequence, name, textOf(value)));
        return;
      case 'component':
        this.append(opaqueAttributeFrame(sequence, name, value));
        return;
      default:
        throw new IllegalAttributePositionError(this.lastNonAttributeType);
    }
  }

  /**
   * Appends an attribute frame built elsewhere, stamped with `sequence`.
   */
  appendAttribute(sequence: number, frame: Frame): void {
    if (frame.frameType !== 'attribute') {
      throw new WrongFrameKindError('attribute', frame.frameType);
    }
    this.assertCanAddAttribute();
    this.append(withAttributeSequence(frame, sequence));
  }

  /** Resets the builder for another render pass, keeping its storage */
  clear(): void {
    this.entries.clear();
    this.openStack.length = 0;
    this.lastNonAttributeType = null;
  }

  /**
   * Returns the frames appended so far. The view is not a copy: do not hold
   * it across a later call that mutates the builder.
   */
  getFrames(): ArrayRange<Frame> {
    warnUnless(
      this.openStack.length === 0,
      `getFrames() called with ${this.openStack.length} open frame(s); subtree lengths are incomplete.`
    );
    return this.entries.toRange();
  }

  private open(frame: ContainerFrame): void {
    this.openStack.push({ index: this.entries.count, frameType: frame.frameType });
    this.append(frame);
  }

  // Validates before popping so a failed close leaves the builder untouched.
  private close(expected: ContainerFrameType): void {
    const top = this.openStack[this.openStack.length - 1];
    if (top === undefined) {
      throw new UnbalancedStructureError(expected);
    }
    if (top.frameType !== expected) {
      throw new MismatchedCloseTypeError(expected, top.frameType, top.index);
    }

    const frame = this.entries.get(top.index);
    invariant(isContainerFrame(frame), 'open stack points at a non-container frame', {
      index: top.index,
      frameType: frame.frameType,
    });
    this.openStack.pop();
    this.entries.set(
      top.index,
      withSubtreeLength(frame, this.entries.count - top.index)
    );
  }

  private assertCanAddAttribute(): void {
    if (
      this.lastNonAttributeType !== 'element' &&
      this.lastNonAttributeType !== 'component'
    ) {
      throw new IllegalAttributePositionError(this.lastNonAttributeType);
    }
  }

  private append(frame: Frame): void {
    this.entries.append(frame);
    if (frame.frameType !== 'attribute') {
      this.lastNonAttributeType = frame.frameType;
    }
  }
}

function textOf(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}
