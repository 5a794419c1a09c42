import { describe, it, expect, vi } from 'vitest';
import {
  Fragment,
  RenderTreeBuilder,
  buildVNode,
  describeFrames,
} from '../../src/index';
import type { Props, UIEventHandler } from '../../src/index';

let counterCalls = 0;

function Counter(_props: Props): null {
  counterCalls++;
  return null;
}

function build(node: unknown) {
  const builder = new RenderTreeBuilder();
  buildVNode(builder, node);
  return builder.getFrames();
}

describe('buildVNode (RENDER)', () => {
  it('should replay an element with attributes and children', () => {
    const onClick: UIEventHandler = () => {};
    const frames = build({
      type: 'div',
      props: {
        className: 'box',
        id: 'main',
        onClick,
        style: { fontSize: '12px' },
        hidden: true,
        title: null,
        key: 'k',
        _internal: 1,
        tabIndex: 3,
      },
      children: ['hello', 42, null, { type: 'span', children: ['x'] }],
    });

    expect(describeFrames(frames)).toEqual([
      'Element("div", len=11)',
      'Attribute("class", "box")',
      'Attribute("id", "main")',
      'Attribute("onclick", handler)',
      'Attribute("style", "font-size:12px;")',
      'Attribute("hidden", "")',
      'Attribute("tabIndex", "3")',
      'Text("hello")',
      'Text("42")',
      'Element("span", len=2)',
      'Text("x")',
    ]);
    expect(frames.toArray().map((f) => f.sequence)).toEqual([
      0, 0, 1, 2, 3, 4, 8, 0, 1, 3, 0,
    ]);
  });

  it('should read children from props when the node has none of its own', () => {
    const frames = build({ type: 'p', props: { children: 'only' } });

    expect(describeFrames(frames)).toEqual(['Element("p", len=2)', 'Text("only")']);
  });

  it('should replay fragments as regions', () => {
    const frames = build({ type: Fragment, props: { children: ['a', 'b'] } });

    expect(describeFrames(frames)).toEqual([
      'Region(len=3)',
      'Text("a")',
      'Text("b")',
    ]);
  });

  it('should record components with their props as opaque attributes', () => {
    const items = [1, 2];
    const frames = build({ type: Counter, props: { start: 5, key: 'c', items } });

    expect(describeFrames(frames)).toEqual([
      'Component(Counter, len=3)',
      'Attribute("start", opaque)',
      'Attribute("items", opaque)',
    ]);
    const last = frames.at(2);
    expect(last.sequence).toBe(2);
    expect(
      last.frameType === 'attribute' &&
        last.attributeValue.kind === 'opaque' &&
        last.attributeValue.value
    ).toBe(items);
    expect(counterCalls).toBe(0);
  });

  it('should pass node children to a component as a children attribute', () => {
    const frames = build({ type: Counter, children: ['x'] });

    expect(describeFrames(frames)).toEqual([
      'Component(Counter, len=2)',
      'Attribute("children", opaque)',
    ]);
  });

  it('should wrap nested child arrays in regions with their own numbering', () => {
    const frames = build({ type: 'ul', children: ['a', 'b', ['c', 'd'], 'e'] });

    expect(describeFrames(frames)).toEqual([
      'Element("ul", len=7)',
      'Text("a")',
      'Text("b")',
      'Region(len=3)',
      'Text("c")',
      'Text("d")',
      'Text("e")',
    ]);
    expect(frames.toArray().map((f) => f.sequence)).toEqual([0, 0, 1, 2, 0, 1, 3]);
  });

  it('should skip booleans and empty values', () => {
    expect(build([true, false, null, undefined, 'kept']).toArray()).toEqual([
      { frameType: 'text', sequence: 4, textContent: 'kept', subtreeLength: 1 },
    ]);
  });

  it('should warn and skip values that are not nodes', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    try {
      const node = { notAType: true };
      expect(build(node).count).toBe(0);
      expect(warn).toHaveBeenCalledWith(
        '[frametree]',
        'Skipping value that is not a renderable node:',
        node
      );
    } finally {
      warn.mockRestore();
    }
  });
});
