/**
 * VNode replay
 *
 * Translates a VNode / JSX element tree into builder calls, so code that
 * describes UI as plain objects can produce the same frames generated
 * template code would.
 *
 * - string tags become elements, `Fragment` becomes a region
 * - component functions become component frames whose props are attached
 *   as opaque attributes; the component itself is not invoked
 * - sequence numbers are sibling positions, attribute sequences are prop
 *   positions, so skipped props never shift their neighbours
 * - a nested child array becomes a region, so its items number their own
 *   sibling group instead of colliding with the parent's
 */

import type { RenderTreeBuilder } from '../builder/render-tree-builder';
import type { ComponentType } from '../common/component';
import { Fragment, type JSXElement } from '../common/jsx';
import type { Props } from '../common/props';
import { logger } from '../dev/logger';
import type { UIEventHandler } from '../frames/types';

export type VNode = {
  type: string | symbol | ComponentType;
  props?: Props;
  // Some JSX runtimes put children on `props.children`, others on `children`.
  children?: unknown[];
};

function isVNodeLike(x: unknown): x is VNode | JSXElement {
  return !!x && typeof x === 'object' && 'type' in x;
}

function isComponentType(x: unknown): x is ComponentType {
  return typeof x === 'function';
}

function isEventHandler(x: unknown): x is UIEventHandler {
  return typeof x === 'function';
}

// onClick, onChange, ...: at least 3 chars and the 3rd is uppercase
function isEventProp(key: string): boolean {
  return (
    key.length >= 3 &&
    key[0] === 'o' &&
    key[1] === 'n' &&
    key[2] >= 'A' &&
    key[2] <= 'Z'
  );
}

function styleToCss(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (!value || typeof value !== 'object') return null;
  // camelCase -> kebab-case
  let out = '';
  for (const [k, v] of Object.entries(value)) {
    if (v === null || v === undefined || v === false) continue;
    const prop = k.replace(/[A-Z]/g, (m) => `-${m.toLowerCase()}`);
    out += `${prop}:${String(v)};`;
  }
  return out;
}

function normalizeChildren(node: VNode | JSXElement): unknown[] {
  // Prefer explicit node.children; fallback to props.children
  const direct = 'children' in node && Array.isArray(node.children) ? node.children : null;
  const raw: unknown = direct ?? node.props?.children;

  if (raw === null || raw === undefined || raw === false) return [];
  if (Array.isArray(raw)) return raw;
  return [raw];
}

function buildElementAttributes(
  builder: RenderTreeBuilder,
  props: Props | undefined
): void {
  if (!props) return;
  const entries = Object.entries(props);
  for (let i = 0; i < entries.length; i++) {
    const [key, value] = entries[i];

    // Structure and identity, not attributes
    if (key === 'children' || key === 'key' || key === 'ref') continue;
    if (key.startsWith('_')) continue;

    if (isEventProp(key)) {
      if (isEventHandler(value)) {
        builder.addAttribute(i, key.toLowerCase(), value);
      }
      continue;
    }

    const name = key === 'className' ? 'class' : key;

    if (name === 'style') {
      const css = styleToCss(value);
      if (css) builder.addAttribute(i, name, css);
      continue;
    }

    if (value === true) {
      builder.addAttribute(i, name, '');
    } else if (value === false || value === null || value === undefined) {
      continue;
    } else {
      builder.addAttributeValue(i, name, value);
    }
  }
}

function buildComponentAttributes(
  builder: RenderTreeBuilder,
  node: VNode | JSXElement
): void {
  const entries = Object.entries(node.props ?? {});
  for (let i = 0; i < entries.length; i++) {
    const [key, value] = entries[i];
    if (key === 'key') continue;
    builder.addAttributeValue(i, key, value);
  }
  const direct = 'children' in node && Array.isArray(node.children) ? node.children : [];
  if (direct.length > 0 && !(node.props && 'children' in node.props)) {
    builder.addAttributeValue(entries.length, 'children', direct);
  }
}

function buildChildren(builder: RenderTreeBuilder, children: unknown[]): void {
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (Array.isArray(child)) {
      builder.openRegion(i);
      buildChildren(builder, child);
      builder.closeRegion();
    } else {
      buildVNode(builder, child, i);
    }
  }
}

/**
 * Appends the frames for `node` to `builder`. A top-level array is a
 * sibling group of its own and is not wrapped.
 */
export function buildVNode(
  builder: RenderTreeBuilder,
  node: unknown,
  sequence = 0
): void {
  if (node === null || node === undefined || typeof node === 'boolean') return;

  if (typeof node === 'string' || typeof node === 'number') {
    builder.addText(sequence, node);
    return;
  }

  if (Array.isArray(node)) {
    buildChildren(builder, node);
    return;
  }

  if (!isVNodeLike(node)) {
    logger.warn('Skipping value that is not a renderable node:', node);
    return;
  }

  const { type } = node;

  if (type === Fragment) {
    builder.openRegion(sequence);
    buildChildren(builder, normalizeChildren(node));
    builder.closeRegion();
    return;
  }

  if (isComponentType(type)) {
    builder.openComponent(sequence, type);
    buildComponentAttributes(builder, node);
    builder.closeComponent();
    return;
  }

  if (typeof type === 'string') {
    builder.openElement(sequence, type);
    buildElementAttributes(builder, node.props);
    buildChildren(builder, normalizeChildren(node));
    builder.closeElement();
    return;
  }

  logger.warn('Skipping node with unsupported type:', type);
}
