import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { createLogger } from '../src/logger.js';

describe('createLogger', () => {
  let debugSpy: MockInstance<typeof console.debug>;
  let errorSpy: MockInstance<typeof console.error>;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('info calls console.debug with the [ocr-words:Namespace] prefix when verbose', () => {
    const log = createLogger('Batch', { verbose: true });
    log.info('img/a.png: rotation 0, 3 word(s)');
    expect(debugSpy).toHaveBeenCalledWith('[ocr-words:Batch] img/a.png: rotation 0, 3 word(s)');
  });

  it('info is silent unless verbose', () => {
    const log = createLogger('Batch');
    log.info('Found 2 image(s) in img');
    expect(debugSpy).not.toHaveBeenCalled();
  });

  it('error calls console.error with the prefix', () => {
    const log = createLogger('Cli');
    log.error('Image directory not found: img');
    expect(errorSpy).toHaveBeenCalledWith('[ocr-words:Cli] Image directory not found: img');
  });

  it('error passes the error object as the second argument', () => {
    const log = createLogger('Batch');
    const err = new Error('fail');
    log.error('tesseract failed', err);
    expect(errorSpy).toHaveBeenCalledWith('[ocr-words:Batch] tesseract failed', err);
  });

  it('notify prints the message as is', () => {
    const log = createLogger('Cli');
    log.notify('Wrote OCR results to ocr_output.json');
    expect(logSpy).toHaveBeenCalledWith('Wrote OCR results to ocr_output.json');
  });
});
