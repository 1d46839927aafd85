import {
  DirectoryNotFoundError,
  EngineInvocationError,
  EngineUnavailableError,
  FileSystemError,
} from '@ocr-words/core';
import { ConfigError } from './config.js';

function causeMessage(error: Error): string {
  return error.cause instanceof Error ? `: ${error.cause.message}` : '';
}

export function formatRunError(error: unknown): string {
  if (
    error instanceof ConfigError ||
    error instanceof EngineUnavailableError ||
    error instanceof DirectoryNotFoundError ||
    error instanceof EngineInvocationError
  ) {
    return error.message;
  }
  if (error instanceof FileSystemError) {
    switch (error.operation) {
      case 'write': return `Could not write OCR results to ${error.path}${causeMessage(error)}`;
      case 'read': return `Could not read ${error.path}${causeMessage(error)}`;
      case 'stat': return `Could not access ${error.path}${causeMessage(error)}`;
    }
  }
  if (error instanceof Error) {
    return `Unexpected error: ${error.message}`;
  }
  return `Unexpected error: ${String(error)}`;
}
