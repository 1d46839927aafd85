export * from './models/index.js';

export type {
  DirectoryEntry,
  FileSystemPort,
  LoggerPort,
  OcrEnginePort,
  TokenCell,
  TokenTable,
} from './ports/index.js';

export {
  EngineUnavailableError,
  DirectoryNotFoundError,
  EngineInvocationError,
  MalformedEngineOutputError,
  FileSystemError,
} from './exceptions.js';
export type {
  EngineUnavailableOptions,
  FileSystemOperation,
  InvocationPhase,
} from './exceptions.js';

export { buildWordRecords } from './ocr/word-records.js';
export { parseOrientation } from './ocr/orientation.js';
export {
  enumerateImages,
  isSupportedImage,
  SUPPORTED_IMAGE_EXTENSIONS,
} from './images/enumerate-images.js';
export { assembleReport, serializeReport } from './report/report-assembler.js';

export { OcrBatchService } from './ocr-batch-service.js';
export type { BatchRunOptions, BatchRunResult } from './ocr-batch-service.js';
