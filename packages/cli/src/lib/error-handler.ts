import { ZodError } from 'zod';
import { ExportError, ValidationError } from './errors.js';
import { logger } from './logger.js';

export interface ErrorSink {
  stderr(text: string): void;
}

/**
 * Report a failure on stderr and return the process exit code:
 * 2 for invalid input, 1 for export failures and anything unexpected.
 */
export function handleCliError(error: unknown, sink: ErrorSink): number {
  if (error instanceof ZodError) {
    const lines = error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  - ${path}: ${issue.message}`;
    });
    sink.stderr(['error: invalid options', ...lines].join('\n') + '\n');
    return 2;
  }

  if (error instanceof ValidationError) {
    sink.stderr(`error: ${error.message}\n`);
    if (error.details) {
      logger.debug({ details: error.details }, error.message);
    }
    return error.exitCode;
  }

  if (error instanceof ExportError) {
    sink.stderr(`error: ${error.message}\n`);
    return error.exitCode;
  }

  logger.error({ err: error }, 'unexpected failure');
  sink.stderr('error: An unexpected error occurred\n');
  return 1;
}
