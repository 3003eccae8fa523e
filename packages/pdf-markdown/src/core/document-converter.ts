import type { LoggerMethods } from '@docmark/logger';
import type {
  ConversionErrorRecord,
  ConversionResult,
  ExtractedPage,
  ImageArtifact,
  ImageBlock,
  TextSpan,
} from '@docmark/model';

import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import type {
  LayoutClassifierOptions,
  MarkdownOptions,
  ResolvedLayoutClassifierOptions,
} from '../config/options';
import type { OcrAdapter } from '../ocr/ocr-adapter';
import type { PageItem, PageLayout } from '../processors/reading-order-assembler';

import {
  layoutClassifierOptionsSchema,
  markdownOptionsSchema,
  parseOptions,
} from '../config/options';
import { ArtifactWriteError } from '../errors/artifact-write-error';
import { DocumentParseError } from '../errors/document-parse-error';
import { getErrorMessage } from '../errors/error-message';
import { OcrEngineUnavailableError } from '../errors/ocr-engine-unavailable-error';
import { ElementExtractor } from '../processors/element-extractor';
import { classifySpans } from '../processors/layout-classifier';
import { ReadingOrderAssembler } from '../processors/reading-order-assembler';
import { documentStem } from '../utils/output-paths';

export interface DocumentConverterOptions {
  classifier?: LayoutClassifierOptions;
  markdown?: MarkdownOptions;
}

export interface ConvertOptions {
  /** Password for encrypted documents */
  password?: string;

  /**
   * Artifact directory under the output root. Defaults to
   * `documentStem(sourceName)`.
   */
  outputStem?: string;
}

/**
 * Map a conversion failure to the record stored on the result
 */
export function toErrorRecord(error: unknown): ConversionErrorRecord {
  const message = getErrorMessage(error);

  if (error instanceof DocumentParseError) {
    return { kind: 'DocumentParseError', message };
  }
  if (error instanceof OcrEngineUnavailableError) {
    return { kind: 'OcrEngineUnavailable', message };
  }
  if (error instanceof ArtifactWriteError) {
    return { kind: 'ArtifactWriteError', message };
  }
  return { kind: 'UnexpectedError', message };
}

/**
 * DocumentConverter
 *
 * Converts one PDF to Markdown. Per page, text blocks are classified and
 * every image is written to `<outputRoot>/<stem>/` and then passed to the
 * OCR adapter, before the page is assembled in reading order.
 *
 * `convert` never rejects: failures are reported on the result.
 */
export class DocumentConverter {
  private readonly extractor: ElementExtractor;
  private readonly assembler: ReadingOrderAssembler;
  private readonly classifierOptions: ResolvedLayoutClassifierOptions;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly ocr: OcrAdapter,
    options: DocumentConverterOptions = {},
  ) {
    this.classifierOptions = parseOptions(
      layoutClassifierOptionsSchema,
      options.classifier,
      'Invalid classifier options',
    );
    const { title } = parseOptions(
      markdownOptionsSchema,
      options.markdown,
      'Invalid markdown options',
    );
    this.extractor = new ElementExtractor(logger);
    this.assembler = new ReadingOrderAssembler({ title });
  }

  async convert(
    pdfBytes: Uint8Array,
    sourceName: string,
    outputRoot: string,
    options: ConvertOptions = {},
  ): Promise<ConversionResult> {
    const startTime = Date.now();
    const stem = options.outputStem ?? documentStem(sourceName);
    const documentDir = join(outputRoot, stem);
    const artifacts: ImageArtifact[] = [];

    this.logger.info(`[DocumentConverter] Converting ${sourceName}`);

    try {
      this.clearDirectory(documentDir);

      const pages: PageLayout[] = [];
      for await (const page of this.extractor.extractPages(pdfBytes, {
        password: options.password,
      })) {
        pages.push(await this.layoutPage(page, stem, documentDir, artifacts));
      }

      const markdownText = this.assembler.renderDocument(pages);

      this.logger.info(
        `[DocumentConverter] Converted ${sourceName}: ${pages.length} pages, ${artifacts.length} images in ${Date.now() - startTime}ms`,
      );
      return {
        sourceName,
        outputStem: stem,
        markdownText,
        artifacts,
        error: null,
      };
    } catch (error) {
      const record = toErrorRecord(error);
      this.logger.error(
        `[DocumentConverter] Failed to convert ${sourceName} (${record.kind}): ${record.message}`,
      );
      return {
        sourceName,
        outputStem: stem,
        markdownText: null,
        artifacts,
        error: record,
      };
    }
  }

  private async layoutPage(
    page: ExtractedPage,
    stem: string,
    documentDir: string,
    artifacts: ImageArtifact[],
  ): Promise<PageLayout> {
    const spans = page.elements.filter(
      (element): element is TextSpan => element.type === 'text',
    );
    const images = page.elements.filter(
      (element): element is ImageBlock => element.type === 'image',
    );

    const items = classifySpans(spans, this.classifierOptions).map(
      (text): PageItem => ({
        kind: 'text',
        verticalOffset: text.span.verticalOffset,
        text,
      }),
    );

    for (const image of images) {
      const filename = this.ocr.imageFilename(
        page.pageIndex,
        image.sequenceIndexOnPage,
      );
      this.writeImage(documentDir, filename, image.imageBytes);

      const artifact: ImageArtifact = {
        pageIndex: page.pageIndex,
        sequenceIndex: image.sequenceIndexOnPage,
        relativePath: `${stem}/${filename}`,
        recognizedText: await this.ocr.recognize(image.imageBytes),
      };
      artifacts.push(artifact);
      items.push({
        kind: 'image',
        verticalOffset: image.verticalOffset,
        artifact,
      });
    }

    return { pageIndex: page.pageIndex, items };
  }

  /**
   * Remove images left by an earlier run so the directory only holds the
   * artifacts of this conversion.
   */
  private clearDirectory(documentDir: string): void {
    try {
      rmSync(documentDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(
        `[DocumentConverter] Could not clear ${documentDir}: ${getErrorMessage(error)}`,
      );
    }
  }

  private writeImage(
    documentDir: string,
    filename: string,
    imageBytes: Uint8Array,
  ): void {
    const filePath = join(documentDir, filename);
    try {
      mkdirSync(documentDir, { recursive: true });
      writeFileSync(filePath, imageBytes);
    } catch (error) {
      throw ArtifactWriteError.fromError(filePath, error);
    }
  }
}
