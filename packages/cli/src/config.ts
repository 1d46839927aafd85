import { parseArgs } from 'node:util';
import { resolveTesseractCommand } from '@ocr-words/ocr-tesseract';

export type EngineKind = 'tesseract' | 'tesseract-js';

export const ENGINE_KINDS: readonly EngineKind[] = ['tesseract', 'tesseract-js'];

export interface CliConfig {
  imageDir: string;
  outputPath: string;
  engine: EngineKind;
  /** Resolved tesseract executable. Only used by the `tesseract` engine */
  tesseractCmd: string;
  lang: string;
  /** tesseract.js language data directory. Required by the `tesseract-js` engine */
  tessdata?: string;
  verbose: boolean;
}

export const DEFAULT_CONFIG: CliConfig = {
  imageDir: 'img',
  outputPath: 'ocr_output.json',
  engine: 'tesseract',
  tesseractCmd: 'tesseract',
  lang: 'eng',
  verbose: false,
};

export const USAGE = `Usage: ocr-words [options]

Run OCR on every image of a directory and write the detected words as JSON.

Options:
  --img-dir <dir>          Directory containing images (default: ${DEFAULT_CONFIG.imageDir})
  --output <path>          Output JSON path (default: ${DEFAULT_CONFIG.outputPath})
  --tesseract-cmd <path>   Path to the tesseract executable (or set TESSERACT_CMD)
  --engine <name>          ${ENGINE_KINDS.join(' | ')} (default: ${DEFAULT_CONFIG.engine})
  --lang <code>            Recognition language(s), e.g. eng or deu+eng (default: ${DEFAULT_CONFIG.lang})
  --tessdata <dir>         Directory with <lang>.traineddata.gz and osd.traineddata.gz
                           (required with --engine tesseract-js)
  --verbose                Log progress per image
  -h, --help               Show this message`;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type ConfigResolution = { kind: 'run'; config: CliConfig } | { kind: 'help' };

function isEngineKind(value: string): value is EngineKind {
  return ENGINE_KINDS.some((kind) => kind === value);
}

function parse(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        'img-dir': { type: 'string' },
        output: { type: 'string' },
        'tesseract-cmd': { type: 'string' },
        engine: { type: 'string' },
        lang: { type: 'string' },
        tessdata: { type: 'string' },
        verbose: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    });
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
}

/** Defaults, then environment, then command line. The engine command is resolved here once. */
export function resolveConfig(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>>,
): ConfigResolution {
  const { values } = parse(argv);
  if (values.help) {
    return { kind: 'help' };
  }

  const engine = values.engine ?? DEFAULT_CONFIG.engine;
  if (!isEngineKind(engine)) {
    throw new ConfigError(`Unknown engine: ${engine} (expected ${ENGINE_KINDS.join(' or ')})`);
  }
  if (engine === 'tesseract-js' && !values.tessdata) {
    throw new ConfigError('--engine tesseract-js requires --tessdata <dir>');
  }

  return {
    kind: 'run',
    config: {
      imageDir: values['img-dir'] ?? DEFAULT_CONFIG.imageDir,
      outputPath: values.output ?? DEFAULT_CONFIG.outputPath,
      engine,
      tesseractCmd: resolveTesseractCommand(values['tesseract-cmd'], env),
      lang: values.lang ?? DEFAULT_CONFIG.lang,
      ...(values.tessdata ? { tessdata: values.tessdata } : {}),
      verbose: values.verbose ?? DEFAULT_CONFIG.verbose,
    },
  };
}
