export const DEFAULT_TESSERACT_COMMAND = 'tesseract';
export const TESSERACT_CMD_ENV = 'TESSERACT_CMD';

/** Explicit override, then `TESSERACT_CMD`, then `tesseract` on the PATH. Empty values count as unset. */
export function resolveTesseractCommand(
  override: string | undefined,
  env: Readonly<Record<string, string | undefined>>,
): string {
  return override || env[TESSERACT_CMD_ENV] || DEFAULT_TESSERACT_COMMAND;
}
