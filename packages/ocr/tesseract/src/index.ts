export { TesseractCliEngine, TESSERACT_HINT } from './tesseract-cli-engine.js';
export type { TesseractCliConfig } from './tesseract-cli-engine.js';
export { TesseractJsEngine, TESSERACT_JS_ENGINE, formatOsd } from './tesseract-js-engine.js';
export type { OsdReport, TesseractJsConfig } from './tesseract-js-engine.js';
export {
  resolveTesseractCommand,
  DEFAULT_TESSERACT_COMMAND,
  TESSERACT_CMD_ENV,
} from './resolve-command.js';
export { runCommand, CommandError } from './run-command.js';
export type { CommandOutput, CommandRunner } from './run-command.js';
export { parseTsv } from './tsv.js';
