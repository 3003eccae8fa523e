export type {
  ClassifiedText,
  ExtractedPage,
  HeadingLevel,
  ImageBlock,
  PositionedElement,
  TextSpan,
} from './positioned-element';
export type {
  ConversionErrorKind,
  ConversionErrorRecord,
  ConversionResult,
  ImageArtifact,
} from './conversion-result';
export type {
  BatchDocument,
  BatchReport,
  CompletedBatchReport,
} from './batch-report';
