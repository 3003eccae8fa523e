/**
 * Positioned content extracted from a PDF page.
 *
 * Coordinates are in top-down page space: `verticalOffset` is the distance in
 * points from the top edge of the page to the top of the element's bounding
 * box. It is the only key used to order elements inside a page.
 */

/**
 * A run of native PDF text grouped into one block
 *
 * Multi-line blocks keep their line breaks in `content`.
 *
 * @interface TextSpan
 */
export interface TextSpan {
  type: 'text';

  /**
   * 1-based page number
   * @type {number}
   */
  pageIndex: number;

  /**
   * Top of the bounding box, in points from the top of the page
   * @type {number}
   */
  verticalOffset: number;

  /**
   * Left of the bounding box, in points from the left of the page
   *
   * Carried for completeness; reading order ignores it.
   *
   * @type {number}
   */
  horizontalOffset: number;

  /**
   * Text content, lines joined with `\n`
   * @type {string}
   */
  content: string;

  /**
   * Font size of the first line, in points
   * @type {number}
   */
  fontSize: number;

  /**
   * Whether the block's font is a bold face
   * @type {boolean}
   */
  isBold: boolean;
}

/**
 * An embedded raster image, already encoded as PNG
 *
 * @interface ImageBlock
 */
export interface ImageBlock {
  type: 'image';

  /**
   * 1-based page number
   * @type {number}
   */
  pageIndex: number;

  /**
   * Top of the image's bounding box, in points from the top of the page
   * @type {number}
   */
  verticalOffset: number;

  /**
   * PNG-encoded image bytes
   * @type {Uint8Array}
   */
  imageBytes: Uint8Array;

  /**
   * 1-based position of the image among the images of its page,
   * in extraction order
   * @type {number}
   */
  sequenceIndexOnPage: number;
}

export type PositionedElement = TextSpan | ImageBlock;

/** Elements of one page in extraction order */
export interface ExtractedPage {
  pageIndex: number;
  elements: PositionedElement[];
}

/** 0 = paragraph, 1 = `#`, 2 = `##` */
export type HeadingLevel = 0 | 1 | 2;

export interface ClassifiedText {
  span: TextSpan;
  headingLevel: HeadingLevel;
}
