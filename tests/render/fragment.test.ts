import { describe, it, expect } from 'vitest';
import {
  RenderTreeBuilder,
  UnbalancedStructureError,
  UnclosedStructureError,
  describeFrames,
  renderFragment,
  tryBuild,
} from '../../src/index';
import type { RenderFragment } from '../../src/index';

const greeting: RenderFragment = (builder) => {
  builder.openElement(0, 'h1');
  builder.addText(1, 'Hello');
  builder.closeElement();
};

describe('renderFragment (RENDER)', () => {
  it('should return the frames the fragment rendered', () => {
    expect(describeFrames(renderFragment(greeting))).toEqual([
      'Element("h1", len=2)',
      'Text("Hello")',
    ]);
  });

  it('should clear a reused builder before rendering into it', () => {
    const builder = new RenderTreeBuilder();
    builder.openRegion(0);
    builder.addText(1, 'stale');

    const frames = renderFragment(greeting, builder);

    expect(frames.count).toBe(2);
    expect(builder.openDepth).toBe(0);
  });

  it('should throw UnclosedStructureError when the fragment leaves a container open', () => {
    expect(() =>
      renderFragment((builder) => {
        builder.openRegion(0);
        builder.openElement(1, 'div');
        builder.addText(2, 'x');
      })
    ).toThrow(
      'Render pass ended with 2 open frame(s) (innermost: element).'
    );
  });

  it('should keep independent builders isolated', () => {
    const a = new RenderTreeBuilder();
    const b = new RenderTreeBuilder();
    a.openElement(0, 'div');
    renderFragment(greeting, b);
    a.closeElement();

    expect(describeFrames(a.getFrames())).toEqual(['Element("div", len=1)']);
    expect(describeFrames(b.getFrames())).toEqual([
      'Element("h1", len=2)',
      'Text("Hello")',
    ]);
  });
});

describe('tryBuild (RENDER)', () => {
  it('should report success with the frames', () => {
    const result = tryBuild(greeting);

    expect(result.ok).toBe(true);
    expect(result.ok && result.frames.count).toBe(2);
  });

  it('should report contract violations as a value', () => {
    const result = tryBuild((builder) => {
      builder.addText(0, 'x');
      builder.closeElement();
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(UnbalancedStructureError);
      expect(result.error.code).toBe('UNBALANCED_STRUCTURE');
    }
  });

  it('should report an unclosed container as a failure', () => {
    const result = tryBuild((builder) => {
      builder.openElement(0, 'div');
      builder.addText(1, 'x');
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(UnclosedStructureError);
      expect(result.error).toMatchObject({
        code: 'UNCLOSED_STRUCTURE',
        innermost: 'element',
        openDepth: 1,
      });
    }
  });

  it('should rethrow errors that are not render tree violations', () => {
    expect(() =>
      tryBuild(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');
  });
});
