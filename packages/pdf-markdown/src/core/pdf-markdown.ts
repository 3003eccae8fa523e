import type { LoggerMethods } from '@docmark/logger';
import type {
  BatchDocument,
  BatchReport,
  CompletedBatchReport,
  ConversionResult,
} from '@docmark/model';

import { createConsoleLogger } from '@docmark/logger';

import type { DocmarkConfig } from '../config/env';
import type { OcrAdapter } from '../ocr/ocr-adapter';
import type { BatchSummary } from './output-bundler';

import { loadConfigFromEnv } from '../config/env';
import { TesseractOcrAdapter } from '../ocr/tesseract-ocr-adapter';
import { BatchScheduler } from './batch-scheduler';
import { OutputBundler } from './output-bundler';

type Options = {
  /** Defaults to `loadConfigFromEnv()` */
  config?: DocmarkConfig;
  /** Defaults to a console logger at `config.logLevel` */
  logger?: LoggerMethods;
  /** Defaults to a TesseractOcrAdapter built from `config.ocr` */
  ocr?: OcrAdapter;
  /** Title line of every generated document */
  title?: string;
};

/**
 * PdfMarkdown - batch PDF to Markdown conversion
 *
 * Wires the scheduler, the OCR adapter and the ZIP bundler from one
 * configuration. Output goes under `config.outputRoot`.
 *
 * ## System Requirements
 * - `tesseract` on the PATH, or `DOCMARK_TESSERACT_PATH` pointing at it
 *
 * @example
 * ```typescript
 * const pdfMarkdown = new PdfMarkdown();
 * const report = await pdfMarkdown.convert([
 *   { name: 'report.pdf', bytes: readFileSync('report.pdf') },
 * ]);
 * writeFileSync('report.zip', await pdfMarkdown.bundle(report.results));
 * ```
 */
export class PdfMarkdown {
  readonly config: DocmarkConfig;
  private readonly logger: LoggerMethods;
  private readonly scheduler: BatchScheduler;
  private readonly bundler: OutputBundler;

  constructor(options: Options = {}) {
    this.config = options.config ?? loadConfigFromEnv();
    this.logger =
      options.logger ?? createConsoleLogger({ level: this.config.logLevel });

    const ocr =
      options.ocr ?? new TesseractOcrAdapter(this.logger, this.config.ocr);
    this.scheduler = new BatchScheduler(this.logger, ocr, {
      classifier: this.config.classifier,
      markdown: options.title === undefined ? undefined : { title: options.title },
    });
    this.bundler = new OutputBundler(this.logger);
  }

  /**
   * Convert a batch with the configured concurrency.
   *
   * @throws OcrEngineUnavailableError when the OCR engine cannot run
   */
  convert(
    documents: readonly BatchDocument[],
    onProgress?: (report: BatchReport) => void,
  ): Promise<CompletedBatchReport> {
    return this.scheduler.run(documents, {
      concurrency: this.config.concurrency,
      outputRoot: this.config.outputRoot,
      onProgress,
    });
  }

  /**
   * ZIP of the successful results and their images
   */
  async bundle(results: readonly ConversionResult[]): Promise<Buffer> {
    const summary = this.summarize(results);
    this.logger.info(
      `[PdfMarkdown] Bundling ${summary.succeeded} documents, ${summary.imageCount} images (${summary.failed} failed)`,
    );
    return this.bundler.createZip(results, this.config.outputRoot);
  }

  summarize(results: readonly ConversionResult[]): BatchSummary {
    return OutputBundler.summarize(results);
  }
}
