/**
 * Configuration constants for ElementExtractor
 */
export const PDF_EXTRACTOR = {
  /**
   * Maximum baseline difference, as a ratio of font size, for two text
   * items to share a line
   */
  SAME_LINE_TOLERANCE_RATIO: 0.5,

  /**
   * Horizontal gap between two items of a line, as a ratio of font size,
   * above which a space is inserted
   */
  WORD_GAP_RATIO: 0.15,

  /**
   * Maximum vertical gap between consecutive lines, as a ratio of line
   * height, for them to belong to the same block
   */
  BLOCK_GAP_RATIO: 1.5,

  /**
   * Font sizes closer than this (points) are treated as equal when
   * deciding whether two lines belong to the same block
   */
  FONT_SIZE_TOLERANCE: 1,

  /**
   * Longest wait for pdf.js to resolve an image object, in milliseconds
   */
  OBJECT_RESOLVE_TIMEOUT_MS: 2000,

  /**
   * Font name fragments that mark a bold face
   */
  BOLD_FONT_PATTERN: /bold|black|heavy|semibold|demi/i,
} as const;

/**
 * Default thresholds for the heading classifier
 */
export const LAYOUT_CLASSIFIER = {
  /**
   * Longest all-caps text still treated as a level-1 heading
   */
  SHORT_TEXT_MAX_LENGTH: 60,

  /**
   * Longest title-case text still treated as a level-2 heading
   */
  MEDIUM_TEXT_MAX_LENGTH: 100,
} as const;

/**
 * Configuration constants for TesseractOcrAdapter
 */
export const OCR_ENGINE = {
  BINARY: 'tesseract',
  LANGUAGE: 'eng',
} as const;

/**
 * Markdown output format
 */
export const MARKDOWN_FORMAT = {
  TITLE: 'PDF Document Conversion',
  PAGE_HEADING_PREFIX: '## Page',
  IMAGE_ALT_TEXT: 'Image',
  CAPTION_PREFIX: '*Image text (OCR):*',
  PAGE_SEPARATOR: '---',
  END_MARKER: '*End of document*',
} as const;

/**
 * Configuration constants for BatchScheduler
 */
export const BATCH_SCHEDULER = {
  DEFAULT_CONCURRENCY: 4,
  DEFAULT_OUTPUT_ROOT: 'output',
} as const;

/**
 * Configuration constants for OutputBundler
 */
export const OUTPUT_BUNDLER = {
  /** zlib compression level for ZIP entries */
  COMPRESSION_LEVEL: 6,
} as const;

/**
 * Pixel layouts of decoded PDF images, numbered as pdf.js reports them
 */
export const RAW_IMAGE_KIND = {
  /** 1 bit per pixel, rows padded to whole bytes, set bit = white */
  GRAYSCALE_1BPP: 1,
  RGB_24BPP: 2,
  RGBA_32BPP: 3,
} as const;
