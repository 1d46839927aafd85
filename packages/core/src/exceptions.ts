export interface EngineUnavailableOptions {
  readonly cause?: unknown;
  /** How to make the engine available, appended to the message */
  readonly hint?: string;
}

export class EngineUnavailableError extends Error {
  readonly command: string;

  constructor(command: string, options: EngineUnavailableOptions = {}) {
    const base = `OCR engine not available: ${command}`;
    super(options.hint ? `${base}. ${options.hint}` : base);
    this.name = 'EngineUnavailableError';
    this.command = command;
    this.cause = options.cause;
  }
}

export class DirectoryNotFoundError extends Error {
  readonly path: string;

  constructor(dirPath: string) {
    super(`Image directory not found: ${dirPath}`);
    this.name = 'DirectoryNotFoundError';
    this.path = dirPath;
  }
}

export type InvocationPhase = 'orientation' | 'tokens';

export class EngineInvocationError extends Error {
  readonly phase: InvocationPhase;
  readonly file: string;

  constructor(phase: InvocationPhase, file: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`OCR engine failed at ${phase}: ${file}: ${message}`);
    this.name = 'EngineInvocationError';
    this.phase = phase;
    this.file = file;
    this.cause = cause;
  }
}

export class MalformedEngineOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedEngineOutputError';
  }
}

export type FileSystemOperation = 'read' | 'write' | 'stat';

export class FileSystemError extends Error {
  readonly operation: FileSystemOperation;
  readonly path: string;

  constructor(operation: FileSystemOperation, filePath: string, cause?: unknown) {
    super(`File system ${operation} failed: ${filePath}`);
    this.name = 'FileSystemError';
    this.operation = operation;
    this.path = filePath;
    this.cause = cause;
  }
}
