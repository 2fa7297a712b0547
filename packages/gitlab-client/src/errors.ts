export class GitLabClientError extends Error {
  readonly statusCode: number;
  readonly code: string | null;
  readonly details: unknown;

  constructor(
    message: string,
    options: { statusCode: number; code?: string | null; details?: unknown; cause?: unknown }
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GitLabClientError';
    this.statusCode = options.statusCode;
    this.code = options.code ?? null;
    this.details = options.details;
  }
}

export class GitLabNotFoundError extends GitLabClientError {
  constructor(resource: string, details?: unknown) {
    super(`${resource} was not found`, { statusCode: 404, code: 'NOT_FOUND', details });
    this.name = 'GitLabNotFoundError';
  }
}

export class GitLabResponseError extends GitLabClientError {
  readonly issues: string[];

  constructor(path: string, issues: string[]) {
    super(`Unexpected response payload from ${path}`, {
      statusCode: 200,
      code: 'INVALID_RESPONSE',
      details: issues
    });
    this.name = 'GitLabResponseError';
    this.issues = issues;
  }
}
