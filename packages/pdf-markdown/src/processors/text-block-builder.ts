import type { TextSpan } from '@docmark/model';

import { PDF_EXTRACTOR } from '../config/constants';

/**
 * One text item of a page in top-down coordinates
 */
export interface TextFragment {
  text: string;
  /** Left edge, points from the left of the page */
  x: number;
  /** Baseline, points from the top of the page */
  baseline: number;
  /** Advance width in points */
  width: number;
  fontSize: number;
  isBold: boolean;
}

export interface TextLine {
  fragments: TextFragment[];
  baseline: number;
  fontSize: number;
  isBold: boolean;
}

const WHITESPACE_END = /\s$/;
const WHITESPACE_START = /^\s/;

function isSameLine(line: TextLine, fragment: TextFragment): boolean {
  const tolerance =
    PDF_EXTRACTOR.SAME_LINE_TOLERANCE_RATIO *
    Math.max(line.fontSize, fragment.fontSize);
  return Math.abs(fragment.baseline - line.baseline) <= tolerance;
}

/**
 * Group fragments into lines, in content-stream order. A fragment joins the
 * current line when its baseline is within tolerance; whitespace-only
 * fragments never start a line.
 */
export function groupIntoLines(fragments: readonly TextFragment[]): TextLine[] {
  const lines: TextLine[] = [];
  let current: TextLine | null = null;

  for (const fragment of fragments) {
    if (fragment.text.length === 0) continue;

    if (current && isSameLine(current, fragment)) {
      current.fragments.push(fragment);
      current.fontSize = Math.max(current.fontSize, fragment.fontSize);
      continue;
    }

    if (fragment.text.trim().length === 0) continue;

    current = {
      fragments: [fragment],
      baseline: fragment.baseline,
      fontSize: fragment.fontSize,
      isBold: fragment.isBold,
    };
    lines.push(current);
  }

  return lines;
}

/**
 * Join a line's fragments left to right, inserting a space where the gap
 * between two fragments is wider than a word gap.
 */
export function lineText(line: TextLine): string {
  const ordered = [...line.fragments].sort((a, b) => a.x - b.x);
  let text = '';
  let previous: TextFragment | null = null;

  for (const fragment of ordered) {
    if (previous) {
      const gap = fragment.x - (previous.x + previous.width);
      const needsSpace =
        gap > PDF_EXTRACTOR.WORD_GAP_RATIO * line.fontSize &&
        !WHITESPACE_END.test(text) &&
        !WHITESPACE_START.test(fragment.text);
      if (needsSpace) text += ' ';
    }
    text += fragment.text;
    previous = fragment;
  }

  return text.trim();
}

function continuesBlock(previous: TextLine, line: TextLine): boolean {
  const gap = line.baseline - previous.baseline;
  return (
    gap > 0 &&
    gap <= PDF_EXTRACTOR.BLOCK_GAP_RATIO * previous.fontSize &&
    Math.abs(line.fontSize - previous.fontSize) <=
      PDF_EXTRACTOR.FONT_SIZE_TOLERANCE &&
    line.isBold === previous.isBold
  );
}

/**
 * Build the text spans of one page.
 *
 * Consecutive lines form a block while the baseline gap stays within
 * `BLOCK_GAP_RATIO` of the line height and the font size and weight do not
 * change. Each block becomes one span with its lines joined by `\n`.
 */
export function buildTextSpans(
  pageIndex: number,
  fragments: readonly TextFragment[],
): TextSpan[] {
  const spans: TextSpan[] = [];
  let block: TextLine[] = [];

  const flush = () => {
    const texts = block.map(lineText).filter((text) => text.length > 0);
    const [first] = block;
    if (first && texts.length > 0) {
      spans.push({
        type: 'text',
        pageIndex,
        verticalOffset: first.baseline - first.fontSize,
        horizontalOffset: Math.min(
          ...block.flatMap((line) => line.fragments.map((f) => f.x)),
        ),
        content: texts.join('\n'),
        fontSize: first.fontSize,
        isBold: first.isBold,
      });
    }
    block = [];
  };

  for (const line of groupIntoLines(fragments)) {
    const previous = block.at(-1);
    if (previous && !continuesBlock(previous, line)) {
      flush();
    }
    block.push(line);
  }
  flush();

  return spans;
}
