import type { LoggerMethods } from '@docmark/logger';
import type { ConversionResult } from '@docmark/model';

import archiver from 'archiver';
import { partition, sumBy } from 'es-toolkit';
import { join } from 'node:path';

import { OUTPUT_BUNDLER } from '../config/constants';

export interface BatchSummary {
  succeeded: number;
  failed: number;
  /** Images saved by the successful documents */
  imageCount: number;
}

/**
 * OutputBundler
 *
 * Packs batch results into a single ZIP: `<stem>.md` at the root and the
 * document's images under `<stem>/`, so the Markdown references resolve
 * inside the archive. Failed results are left out.
 */
export class OutputBundler {
  constructor(private readonly logger: LoggerMethods) {}

  static summarize(results: readonly ConversionResult[]): BatchSummary {
    const [succeeded, failed] = partition(
      results,
      (result) => result.error === null,
    );
    return {
      succeeded: succeeded.length,
      failed: failed.length,
      imageCount: sumBy(succeeded, (result) => result.artifacts.length),
    };
  }

  /**
   * Build the ZIP in memory. Image files are read from `outputRoot`.
   *
   * Rejects when an image file is missing or unreadable.
   */
  async createZip(
    results: readonly ConversionResult[],
    outputRoot: string,
  ): Promise<Buffer> {
    const archive = archiver('zip', {
      zlib: { level: OUTPUT_BUNDLER.COMPRESSION_LEVEL },
    });

    const chunks: Buffer[] = [];
    const zip = new Promise<Buffer>((resolve, reject) => {
      archive.on('data', (chunk: Buffer) => chunks.push(chunk));
      archive.on('end', () => resolve(Buffer.concat(chunks)));
      // archiver reports missing files as warnings and skips them
      archive.on('warning', reject);
      archive.on('error', reject);
    });

    let documentCount = 0;
    for (const result of results) {
      if (result.markdownText === null) continue;

      documentCount++;
      archive.append(result.markdownText, { name: `${result.outputStem}.md` });
      for (const artifact of result.artifacts) {
        archive.file(join(outputRoot, artifact.relativePath), {
          name: artifact.relativePath,
        });
      }
    }

    try {
      const [buffer] = await Promise.all([zip, archive.finalize()]);
      this.logger.info(
        `[OutputBundler] Bundled ${documentCount} documents (${buffer.length} bytes)`,
      );
      return buffer;
    } catch (error) {
      archive.abort();
      throw error;
    }
  }
}
