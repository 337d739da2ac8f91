// src/utils/errors.ts

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidTimestampNameError extends ConfigurationError {
  constructor(public value: string) {
    super(
      `unknown timestamp "${value}" (expected one of created, scheduled, started, finished)`
    );
    this.name = 'InvalidTimestampNameError';
  }
}

/**
 * A report definition that cannot be compiled. `report` is the report name,
 * or its position in the list when the name itself is missing.
 */
export class QueryCompileError extends ConfigurationError {
  constructor(
    public report: string,
    public field: string,
    reason: string
  ) {
    super(`Report "${report}": invalid "${field}": ${reason}`);
    this.name = 'QueryCompileError';
  }
}

export class GroupRenderError extends Error {
  constructor(
    public buildId: string,
    public path: string,
    message: string
  ) {
    super(`[build ${buildId}] ${message}`);
    this.name = 'GroupRenderError';
  }
}

export class UpstreamError extends Error {
  constructor(
    message: string,
    public status?: number,
    public url?: string
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

export class TemplateSyntaxError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'TemplateSyntaxError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
