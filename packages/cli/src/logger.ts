import type { LoggerPort } from '@ocr-words/core';

type Namespace = 'Batch' | 'Cli';

export interface Logger extends LoggerPort {
  notify(msg: string): void;
}

export interface LoggerOptions {
  /** Emit info messages. Errors and notifications are always printed */
  verbose?: boolean;
}

export function createLogger(namespace: Namespace, options: LoggerOptions = {}): Logger {
  const prefix = `[ocr-words:${namespace}]`;
  return {
    info: (msg: string) => {
      if (options.verbose) console.debug(`${prefix} ${msg}`);
    },
    error: (msg: string, err?: unknown) =>
      err ? console.error(`${prefix} ${msg}`, err) : console.error(`${prefix} ${msg}`),
    notify: (msg: string) => console.log(msg),
  };
}
