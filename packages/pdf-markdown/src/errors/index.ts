export { ArtifactWriteError } from './artifact-write-error';
export { ConfigValidationError } from './config-validation-error';
export { DocumentParseError } from './document-parse-error';
export { getErrorMessage } from './error-message';
export { ImageRecognitionError } from './image-recognition-error';
export { OcrEngineUnavailableError } from './ocr-engine-unavailable-error';
