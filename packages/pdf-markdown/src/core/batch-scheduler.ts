import type { LoggerMethods } from '@docmark/logger';
import type {
  BatchDocument,
  BatchReport,
  CompletedBatchReport,
  ConversionResult,
} from '@docmark/model';

import { ConcurrentPool } from '@docmark/shared';

import type { OcrAdapter } from '../ocr/ocr-adapter';
import type { DocumentConverterOptions } from './document-converter';

import { batchRunOptionsSchema, parseOptions } from '../config/options';
import { assignOutputStems, documentStem } from '../utils/output-paths';
import { DocumentConverter } from './document-converter';

export interface BatchRunOptions {
  /** Documents converted at once (default 4) */
  concurrency?: number;

  /**
   * Directory that receives `<stem>/image_p<page>_<seq>.png`. Documents
   * sharing a stem get `<stem>-2/`, `<stem>-3/`, ...
   */
  outputRoot: string;

  /**
   * Called after every document with the live report. The report object is
   * reused between calls; copy it to keep a snapshot. An exception thrown
   * here rejects the batch.
   */
  onProgress?: (report: BatchReport) => void;
}

/**
 * BatchScheduler
 *
 * Converts documents through a fixed-size worker pool. Results land in the
 * slot of their input position, so `results[i]` always belongs to
 * `documents[i]` whatever the completion order. A failed document never
 * stops its siblings.
 */
export class BatchScheduler {
  private readonly converter: DocumentConverter;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly ocr: OcrAdapter,
    converterOptions: DocumentConverterOptions = {},
  ) {
    this.converter = new DocumentConverter(logger, ocr, converterOptions);
  }

  /**
   * @throws ConfigValidationError when the options are invalid
   * @throws OcrEngineUnavailableError when the OCR engine cannot run; no
   * document is converted in that case
   */
  async run(
    documents: readonly BatchDocument[],
    options: BatchRunOptions,
  ): Promise<CompletedBatchReport> {
    const { concurrency, outputRoot } = parseOptions(
      batchRunOptionsSchema,
      options,
      'Invalid batch options',
    );

    await this.ocr.ensureAvailable();

    const outputStems = assignOutputStems(
      documents.map((document) => document.name),
    );
    outputStems.forEach((stem, index) => {
      if (stem !== documentStem(documents[index].name)) {
        this.logger.warn(
          `[BatchScheduler] ${documents[index].name} shares its name with an earlier document, writing to ${stem}/`,
        );
      }
    });

    const totalCount = documents.length;
    const report: BatchReport = {
      results: new Array<ConversionResult | null>(totalCount).fill(null),
      completedCount: 0,
      totalCount,
    };

    this.logger.info(
      `[BatchScheduler] Converting ${totalCount} documents (concurrency: ${concurrency})`,
    );

    const results = await ConcurrentPool.run(
      documents,
      concurrency,
      (document, index) =>
        this.converter.convert(document.bytes, document.name, outputRoot, {
          password: document.password,
          outputStem: outputStems[index],
        }),
      ({ result, index, completedCount }) => {
        report.results[index] = result;
        report.completedCount = completedCount;

        const status = result.error ? `failed (${result.error.kind})` : 'done';
        this.logger.info(
          `[BatchScheduler] ${completedCount}/${totalCount} ${result.sourceName}: ${status}`,
        );
        options.onProgress?.(report);
      },
    );

    const failedCount = results.filter((result) => result.error).length;
    if (failedCount > 0) {
      this.logger.warn(
        `[BatchScheduler] ${failedCount} of ${totalCount} documents failed`,
      );
    }

    return { results, completedCount: report.completedCount, totalCount };
  }
}
