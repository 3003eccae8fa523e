import { describe, expect, test } from 'vitest';

import type { TextFragment } from './text-block-builder';

import {
  buildTextSpans,
  groupIntoLines,
  lineText,
} from './text-block-builder';

function fragment(
  text: string,
  x: number,
  baseline: number,
  overrides: Partial<TextFragment> = {},
): TextFragment {
  return {
    text,
    x,
    baseline,
    width: text.length * 6,
    fontSize: 12,
    isBold: false,
    ...overrides,
  };
}

describe('groupIntoLines', () => {
  test('keeps fragments with close baselines on one line', () => {
    const lines = groupIntoLines([
      fragment('Body', 72, 100),
      fragment('text', 110, 100.5),
      fragment('Next', 72, 114),
    ]);

    expect(lines).toHaveLength(2);
    expect(lines[0].fragments.map((f) => f.text)).toEqual(['Body', 'text']);
    expect(lines[1].baseline).toBe(114);
  });

  test('drops empty fragments and never starts a line with whitespace', () => {
    const lines = groupIntoLines([
      fragment('', 72, 50),
      fragment('  ', 72, 80),
      fragment('Word', 72, 100),
    ]);

    expect(lines).toHaveLength(1);
    expect(lines[0].fragments.map((f) => f.text)).toEqual(['Word']);
  });
});

describe('lineText', () => {
  test('inserts a space only across word gaps', () => {
    const [line] = groupIntoLines([
      fragment('Hel', 72, 100, { width: 18 }),
      fragment('lo', 90, 100, { width: 12 }),
      fragment('world', 105, 100, { width: 30 }),
    ]);

    expect(lineText(line)).toBe('Hello world');
  });

  test('does not double explicit spaces', () => {
    const [line] = groupIntoLines([
      fragment('a', 72, 100, { width: 6 }),
      fragment(' ', 80, 100, { width: 3 }),
      fragment('b', 86, 100, { width: 6 }),
    ]);

    expect(lineText(line)).toBe('a b');
  });

  test('orders fragments left to right', () => {
    const [line] = groupIntoLines([
      fragment('right', 200, 100),
      fragment('left', 72, 100),
    ]);

    expect(lineText(line)).toBe('left right');
  });
});

describe('buildTextSpans', () => {
  test('splits blocks on large gaps and font changes', () => {
    const spans = buildTextSpans(3, [
      fragment('INTRODUCTION', 72, 72, { fontSize: 18, isBold: true }),
      fragment('Body line', 72, 100),
      fragment('one', 130, 100.5),
      fragment('second line', 80, 114),
      fragment('Far away', 72, 200),
    ]);

    expect(spans).toEqual([
      {
        type: 'text',
        pageIndex: 3,
        verticalOffset: 54,
        horizontalOffset: 72,
        content: 'INTRODUCTION',
        fontSize: 18,
        isBold: true,
      },
      {
        type: 'text',
        pageIndex: 3,
        verticalOffset: 88,
        horizontalOffset: 72,
        content: 'Body line one\nsecond line',
        fontSize: 12,
        isBold: false,
      },
      {
        type: 'text',
        pageIndex: 3,
        verticalOffset: 188,
        horizontalOffset: 72,
        content: 'Far away',
        fontSize: 12,
        isBold: false,
      },
    ]);
  });

  test('starts a new block when weight changes', () => {
    const spans = buildTextSpans(1, [
      fragment('Bold lead', 72, 100, { isBold: true }),
      fragment('regular body', 72, 114),
    ]);

    expect(spans.map((span) => span.content)).toEqual([
      'Bold lead',
      'regular body',
    ]);
  });

  test('returns no spans for a page without text', () => {
    expect(buildTextSpans(1, [])).toEqual([]);
    expect(buildTextSpans(1, [fragment(' ', 72, 100)])).toEqual([]);
  });
});
