export { PdfMarkdown } from './core/pdf-markdown';
export { BatchScheduler } from './core/batch-scheduler';
export type { BatchRunOptions } from './core/batch-scheduler';
export { DocumentConverter, toErrorRecord } from './core/document-converter';
export type {
  ConvertOptions,
  DocumentConverterOptions,
} from './core/document-converter';
export { OutputBundler } from './core/output-bundler';
export type { BatchSummary } from './core/output-bundler';
export { TesseractOcrAdapter } from './ocr/tesseract-ocr-adapter';
export type { OcrAdapter } from './ocr/ocr-adapter';
export { ElementExtractor } from './processors/element-extractor';
export type { ExtractPagesOptions } from './processors/element-extractor';
export {
  DEFAULT_CLASSIFIER_OPTIONS,
  classifyHeading,
  classifySpans,
} from './processors/layout-classifier';
export { ReadingOrderAssembler } from './processors/reading-order-assembler';
export type {
  PageItem,
  PageLayout,
  ReadingOrderAssemblerOptions,
} from './processors/reading-order-assembler';
export { loadConfigFromEnv } from './config/env';
export type { DocmarkConfig } from './config/env';
export type {
  LayoutClassifierOptions,
  MarkdownOptions,
  TesseractOcrAdapterOptions,
} from './config/options';
export {
  BATCH_SCHEDULER,
  LAYOUT_CLASSIFIER,
  MARKDOWN_FORMAT,
  OCR_ENGINE,
} from './config/constants';
export {
  ArtifactWriteError,
  ConfigValidationError,
  DocumentParseError,
  ImageRecognitionError,
  OcrEngineUnavailableError,
} from './errors';
export {
  assignOutputStems,
  documentStem,
  imageFilename,
} from './utils/output-paths';
