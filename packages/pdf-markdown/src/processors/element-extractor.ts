import type { LoggerMethods } from '@docmark/logger';
import type { ExtractedPage, ImageBlock, TextSpan } from '@docmark/model';
import type { PDFDocumentProxy, PDFPageProxy } from 'pdfjs-dist/legacy/build/pdf.mjs';

import {
  OPS,
  VerbosityLevel,
  getDocument,
} from 'pdfjs-dist/legacy/build/pdf.mjs';

import type { TransformMatrix } from '../utils/transform-matrix';
import type { TextFragment } from './text-block-builder';

import { PDF_EXTRACTOR } from '../config/constants';
import { DocumentParseError } from '../errors/document-parse-error';
import { getErrorMessage } from '../errors/error-message';
import {
  IDENTITY_MATRIX,
  applyToPoint,
  multiplyMatrices,
  toTransformMatrix,
} from '../utils/transform-matrix';
import { ImageEncoder, toRawImage } from './image-encoder';
import { buildTextSpans } from './text-block-builder';

export interface ExtractPagesOptions {
  /** Password for encrypted documents */
  password?: string;
}

type OperatorList = Awaited<ReturnType<PDFPageProxy['getOperatorList']>>;
type TextContentItem = Awaited<
  ReturnType<PDFPageProxy['getTextContent']>
>['items'][number];

/** Corners of the unit square images are painted into */
const UNIT_SQUARE: ReadonlyArray<[number, number]> = [
  [0, 0],
  [1, 0],
  [0, 1],
  [1, 1],
];

/**
 * Whether a resolved pdf.js font object is a bold face
 */
function isBoldFontObject(font: unknown): boolean {
  if (typeof font !== 'object' || font === null) return false;
  if ('bold' in font && font.bold === true) return true;
  if ('black' in font && font.black === true) return true;
  return (
    'name' in font &&
    typeof font.name === 'string' &&
    PDF_EXTRACTOR.BOLD_FONT_PATTERN.test(font.name)
  );
}

/**
 * ElementExtractor
 *
 * Reads positioned text blocks and embedded raster images from a PDF with
 * pdf.js. Pages are opened one at a time as the generator is consumed.
 *
 * Coordinates are converted to top-down page space through the page's
 * unscaled viewport. Images are located by replaying the save/restore/
 * transform operators of the page's operator list and mapping the unit
 * square through the current transformation matrix.
 */
export class ElementExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Yield the elements of each page in extraction order: text blocks first,
   * then images.
   *
   * @throws DocumentParseError when the document or one of its pages cannot
   * be read
   */
  async *extractPages(
    pdfBytes: Uint8Array,
    options: ExtractPagesOptions = {},
  ): AsyncGenerator<ExtractedPage> {
    const document = await this.openDocument(pdfBytes, options.password);

    try {
      this.logger.debug(
        `[ElementExtractor] Opened PDF with ${document.numPages} pages`,
      );

      for (let pageIndex = 1; pageIndex <= document.numPages; pageIndex++) {
        yield await this.extractPage(document, pageIndex);
      }
    } finally {
      await document.destroy();
    }
  }

  private async openDocument(
    pdfBytes: Uint8Array,
    password: string | undefined,
  ): Promise<PDFDocumentProxy> {
    try {
      // pdf.js takes ownership of the buffer it is given
      const loadingTask = getDocument({
        data: new Uint8Array(pdfBytes),
        password,
        isOffscreenCanvasSupported: false,
        verbosity: VerbosityLevel.ERRORS,
      });
      return await loadingTask.promise;
    } catch (error) {
      throw DocumentParseError.fromError('Failed to open PDF', error);
    }
  }

  private async extractPage(
    document: PDFDocumentProxy,
    pageIndex: number,
  ): Promise<ExtractedPage> {
    let page: PDFPageProxy;
    try {
      page = await document.getPage(pageIndex);
    } catch (error) {
      throw DocumentParseError.fromError(
        `Failed to read page ${pageIndex}`,
        error,
      );
    }

    try {
      // Fonts reach commonObjs while the operator list is built, so it has
      // to come before the text content
      const operatorList = await page.getOperatorList();
      const { items } = await page.getTextContent();

      const toPageSpace =
        toTransformMatrix(page.getViewport({ scale: 1 }).transform) ??
        IDENTITY_MATRIX;

      const text = await this.extractText(page, pageIndex, items, toPageSpace);
      const images = await this.extractImages(
        page,
        pageIndex,
        operatorList,
        toPageSpace,
      );

      this.logger.debug(
        `[ElementExtractor] Page ${pageIndex}: ${text.length} text blocks, ${images.length} images`,
      );

      return { pageIndex, elements: [...text, ...images] };
    } catch (error) {
      throw DocumentParseError.fromError(
        `Failed to read page ${pageIndex}`,
        error,
      );
    } finally {
      page.cleanup();
    }
  }

  private async extractText(
    page: PDFPageProxy,
    pageIndex: number,
    items: TextContentItem[],
    toPageSpace: TransformMatrix,
  ): Promise<TextSpan[]> {
    const boldByFont = new Map<string, boolean>();
    const fragments: TextFragment[] = [];

    for (const item of items) {
      if (!('str' in item)) continue;

      const matrix = toTransformMatrix(item.transform);
      if (!matrix) continue;

      let isBold = boldByFont.get(item.fontName);
      if (isBold === undefined) {
        isBold = isBoldFontObject(await this.resolveObject(page, item.fontName));
        boldByFont.set(item.fontName, isBold);
      }

      const [x, baseline] = applyToPoint(toPageSpace, matrix[4], matrix[5]);
      fragments.push({
        text: item.str,
        x,
        baseline,
        width: item.width,
        fontSize: Math.hypot(matrix[2], matrix[3]),
        isBold,
      });
    }

    return buildTextSpans(pageIndex, fragments);
  }

  private async extractImages(
    page: PDFPageProxy,
    pageIndex: number,
    { fnArray, argsArray }: OperatorList,
    toPageSpace: TransformMatrix,
  ): Promise<ImageBlock[]> {
    const images: ImageBlock[] = [];
    const stack: TransformMatrix[] = [];
    let ctm = IDENTITY_MATRIX;

    for (let i = 0; i < fnArray.length; i++) {
      const args: unknown = argsArray[i];

      switch (fnArray[i]) {
        case OPS.save:
          stack.push(ctm);
          break;
        case OPS.restore:
          ctm = stack.pop() ?? ctm;
          break;
        case OPS.transform: {
          const matrix = toTransformMatrix(args);
          if (matrix) ctm = multiplyMatrices(ctm, matrix);
          break;
        }
        case OPS.paintFormXObjectBegin: {
          stack.push(ctm);
          const matrix = Array.isArray(args) ? toTransformMatrix(args[0]) : null;
          if (matrix) ctm = multiplyMatrices(ctm, matrix);
          break;
        }
        case OPS.paintFormXObjectEnd:
          ctm = stack.pop() ?? ctm;
          break;
        case OPS.paintImageXObject: {
          const objId = Array.isArray(args) ? args[0] : null;
          if (typeof objId !== 'string') break;
          const image = await this.resolveObject(page, objId);
          this.pushImage(images, image, ctm, toPageSpace, pageIndex, objId);
          break;
        }
        case OPS.paintInlineImageXObject: {
          const image: unknown = Array.isArray(args) ? args[0] : null;
          this.pushImage(images, image, ctm, toPageSpace, pageIndex, 'inline');
          break;
        }
      }
    }

    return images;
  }

  private pushImage(
    images: ImageBlock[],
    image: unknown,
    ctm: TransformMatrix,
    toPageSpace: TransformMatrix,
    pageIndex: number,
    label: string,
  ): void {
    const raw = toRawImage(image);
    if (!raw) {
      this.logger.warn(
        `[ElementExtractor] Skipping image ${label} on page ${pageIndex}: pixel data unavailable`,
      );
      return;
    }

    let imageBytes: Buffer;
    try {
      imageBytes = ImageEncoder.toPng(raw);
    } catch (error) {
      this.logger.warn(
        `[ElementExtractor] Skipping image ${label} on page ${pageIndex}: ${getErrorMessage(error)}`,
      );
      return;
    }

    const tops = UNIT_SQUARE.map(([x, y]) => {
      const [userX, userY] = applyToPoint(ctm, x, y);
      return applyToPoint(toPageSpace, userX, userY)[1];
    });

    images.push({
      type: 'image',
      pageIndex,
      verticalOffset: Math.min(...tops),
      imageBytes,
      sequenceIndexOnPage: images.length + 1,
    });
  }

  /**
   * Wait for a pdf.js page object. Resolves with null when it does not
   * arrive within `OBJECT_RESOLVE_TIMEOUT_MS`.
   */
  private resolveObject(page: PDFPageProxy, objId: string): Promise<unknown> {
    // Ids of objects shared across pages carry a `g_` prefix
    const objects = objId.startsWith('g_') ? page.commonObjs : page.objs;

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.logger.debug(
          `[ElementExtractor] Timed out waiting for object ${objId}`,
        );
        resolve(null);
      }, PDF_EXTRACTOR.OBJECT_RESOLVE_TIMEOUT_MS);

      objects.get(objId, (data: unknown) => {
        clearTimeout(timer);
        resolve(data);
      });
    });
  }
}
