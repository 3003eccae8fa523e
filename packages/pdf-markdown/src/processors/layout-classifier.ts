import type { ClassifiedText, HeadingLevel, TextSpan } from '@docmark/model';

import type { ResolvedLayoutClassifierOptions } from '../config/options';

import { LAYOUT_CLASSIFIER } from '../config/constants';
import { TextNormalizer } from '../utils/text-normalizer';

/**
 * Heading classification for PDF text blocks.
 *
 * PDFs carry no semantic heading tags, so this is a casing heuristic and
 * will misclassify unusual typography. Length is measured on the whole
 * block; the casing tests look at its first line only, which is how
 * multi-line blocks are treated as one unit.
 *
 * Rules are evaluated in order and the first match wins:
 * 1. short (<= shortTextMaxLength) and fully uppercase -> level 1
 * 2. title case and <= mediumTextMaxLength -> level 2
 * 3. anything else -> paragraph (0)
 */

export const DEFAULT_CLASSIFIER_OPTIONS: ResolvedLayoutClassifierOptions = {
  shortTextMaxLength: LAYOUT_CLASSIFIER.SHORT_TEXT_MAX_LENGTH,
  mediumTextMaxLength: LAYOUT_CLASSIFIER.MEDIUM_TEXT_MAX_LENGTH,
};

/**
 * Words that title-case conventions leave lowercase. They do not count
 * against title case unless they open the line.
 */
const MINOR_WORDS = new Set([
  'a',
  'an',
  'and',
  'as',
  'at',
  'but',
  'by',
  'for',
  'in',
  'nor',
  'of',
  'on',
  'or',
  'the',
  'to',
  'via',
  'with',
]);

interface TextSignals {
  /** Trimmed length of the whole block */
  length: number;
  /** First non-empty line, trimmed */
  firstLine: string;
}

interface HeadingRule {
  level: Exclude<HeadingLevel, 0>;
  matches: (
    signals: TextSignals,
    options: ResolvedLayoutClassifierOptions,
  ) => boolean;
}

const HEADING_RULES: readonly HeadingRule[] = [
  {
    level: 1,
    matches: ({ length, firstLine }, options) =>
      length <= options.shortTextMaxLength && isUppercase(firstLine),
  },
  {
    level: 2,
    matches: ({ length, firstLine }, options) =>
      length <= options.mediumTextMaxLength && isTitleCase(firstLine),
  },
];

/**
 * True when the text has at least one cased letter and none of its
 * letters are lowercase. Digits and punctuation are ignored.
 */
export function isUppercase(text: string): boolean {
  return /\p{Lu}/u.test(text) && !/\p{Ll}/u.test(text);
}

/**
 * True when the first word is capitalized and a strict majority of the
 * counted words start with an uppercase letter. Words without letters are
 * skipped, and minor words after the first are not counted.
 */
export function isTitleCase(text: string): boolean {
  const words = text.split(/\s+/).filter((word) => /\p{L}/u.test(word));
  if (words.length === 0 || !startsUppercase(words[0])) {
    return false;
  }

  const counted = words.filter(
    (word, index) =>
      index === 0 || !MINOR_WORDS.has(word.toLowerCase().replace(/\P{L}/gu, '')),
  );
  const capitalized = counted.filter((word) => startsUppercase(word));

  return capitalized.length * 2 > counted.length;
}

function startsUppercase(word: string): boolean {
  const initial = word.match(/\p{L}/u)?.[0];
  return initial !== undefined && /\p{Lu}/u.test(initial);
}

/**
 * Classify a block of text as heading level 1, 2 or paragraph (0).
 */
export function classifyHeading(
  content: string,
  options: ResolvedLayoutClassifierOptions = DEFAULT_CLASSIFIER_OPTIONS,
): HeadingLevel {
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    return 0;
  }

  const signals: TextSignals = {
    length: trimmed.length,
    firstLine: trimmed.split(/\r?\n/)[0].trim(),
  };

  const rule = HEADING_RULES.find((candidate) =>
    candidate.matches(signals, options),
  );
  return rule?.level ?? 0;
}

/**
 * Drop blank spans and classify the rest, keeping their order.
 */
export function classifySpans(
  spans: readonly TextSpan[],
  options: ResolvedLayoutClassifierOptions = DEFAULT_CLASSIFIER_OPTIONS,
): ClassifiedText[] {
  return spans
    .filter((span) => !TextNormalizer.isBlank(span.content))
    .map((span) => ({
      span,
      headingLevel: classifyHeading(span.content, options),
    }));
}
