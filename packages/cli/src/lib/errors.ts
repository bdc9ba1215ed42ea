export class ValidationError extends Error {
  public exitCode = 2;
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

export class ExportError extends Error {
  public exitCode = 1;
  public path: string;

  constructor(format: 'CSV' | 'JSON', path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${format} export to '${path}' failed: ${reason}`);
    this.name = 'ExportError';
    this.path = path;
  }
}
