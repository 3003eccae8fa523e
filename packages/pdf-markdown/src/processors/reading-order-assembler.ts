import type { ClassifiedText, ImageArtifact } from '@docmark/model';

import { MARKDOWN_FORMAT } from '../config/constants';
import { TextNormalizer } from '../utils/text-normalizer';

/** Classified text or an OCR'd image, positioned on its page */
export type PageItem =
  | { kind: 'text'; verticalOffset: number; text: ClassifiedText }
  | { kind: 'image'; verticalOffset: number; artifact: ImageArtifact };

/** All items of one page, in any order */
export interface PageLayout {
  pageIndex: number;
  items: readonly PageItem[];
}

/**
 * Angle-bracket link destination, so paths with spaces or parentheses stay
 * one link. Angle brackets and backslashes in the path are escaped.
 */
export function toLinkDestination(path: string): string {
  return `<${path.replace(/[<>\\]/g, '\\$&')}>`;
}

export interface ReadingOrderAssemblerOptions {
  /** Text of the top-level title line */
  title?: string;
}

/**
 * ReadingOrderAssembler
 *
 * Orders page items top to bottom and serializes them to Markdown.
 * Horizontal position is ignored, so multi-column pages interleave their
 * columns. Output depends only on the input items: the sort is stable and
 * nothing else reorders them.
 *
 * Every block is written as `<block>\n\n`:
 *
 * ```markdown
 * # PDF Document Conversion
 *
 * ## Page 1
 *
 * # HEADING
 *
 * Paragraph
 *
 * ![Image](<report/image_p1_1.png>)
 *
 * *Image text (OCR):* recognized text
 *
 * ---
 *
 * *End of document*
 * ```
 */
export class ReadingOrderAssembler {
  private readonly title: string;

  constructor(options: ReadingOrderAssemblerOptions = {}) {
    this.title = options.title ?? MARKDOWN_FORMAT.TITLE;
  }

  /**
   * Stable sort by `verticalOffset` ascending. Ties keep input order.
   */
  static sortByReadingOrder<T extends { verticalOffset: number }>(
    items: readonly T[],
  ): T[] {
    return [...items].sort((a, b) => a.verticalOffset - b.verticalOffset);
  }

  /**
   * Markdown for one page: the page heading followed by its items in
   * reading order.
   */
  renderPage(pageIndex: number, items: readonly PageItem[]): string {
    const blocks = [`${MARKDOWN_FORMAT.PAGE_HEADING_PREFIX} ${pageIndex}`];

    for (const item of ReadingOrderAssembler.sortByReadingOrder(items)) {
      if (item.kind === 'text') {
        const block = this.renderText(item.text);
        if (block) blocks.push(block);
      } else {
        blocks.push(...this.renderImage(item.artifact));
      }
    }

    return blocks.map((block) => `${block}\n\n`).join('');
  }

  /**
   * Full document: title, pages separated by rules, then a closing rule and
   * the end marker.
   */
  renderDocument(pages: readonly PageLayout[]): string {
    const parts = [`# ${this.title}\n\n`];

    pages.forEach((page, index) => {
      if (index > 0) {
        parts.push(`${MARKDOWN_FORMAT.PAGE_SEPARATOR}\n\n`);
      }
      parts.push(this.renderPage(page.pageIndex, page.items));
    });

    parts.push(`${MARKDOWN_FORMAT.PAGE_SEPARATOR}\n\n`);
    parts.push(`${MARKDOWN_FORMAT.END_MARKER}\n`);

    return parts.join('');
  }

  private renderText({ span, headingLevel }: ClassifiedText): string | null {
    if (headingLevel > 0) {
      const heading = TextNormalizer.toSingleLine(span.content);
      return heading ? `${'#'.repeat(headingLevel)} ${heading}` : null;
    }

    const paragraph = TextNormalizer.toParagraph(span.content);
    return paragraph || null;
  }

  private renderImage(artifact: ImageArtifact): string[] {
    const destination = toLinkDestination(artifact.relativePath);
    const blocks = [`![${MARKDOWN_FORMAT.IMAGE_ALT_TEXT}](${destination})`];

    const caption = TextNormalizer.toSingleLine(artifact.recognizedText);
    if (caption) {
      blocks.push(`${MARKDOWN_FORMAT.CAPTION_PREFIX} ${caption}`);
    }

    return blocks;
  }
}
