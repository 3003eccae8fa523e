import type { ConversionResult } from './conversion-result';

/**
 * A PDF submitted for conversion
 */
export interface BatchDocument {
  /** File name, used for the output directory and the result */
  name: string;

  /** Raw PDF bytes */
  bytes: Uint8Array;

  /** Password for encrypted documents */
  password?: string;
}

/**
 * Live progress of a running batch
 *
 * `results` is pre-sized to `totalCount`. A slot stays `null` until its
 * document finishes, so `results[i]` always belongs to the i-th input.
 */
export interface BatchReport {
  results: Array<ConversionResult | null>;
  completedCount: number;
  totalCount: number;
}

/**
 * Report returned once every document has a result
 */
export interface CompletedBatchReport {
  results: ConversionResult[];
  completedCount: number;
  totalCount: number;
}
