import type { ResourceId } from '@glreporter/gitlab-client';

export type NodeKind = 'group' | 'project';

export class ReportEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReportEngineError';
  }
}

export class InvalidIdentifierError extends ReportEngineError {
  readonly code = 'INVALID_IDENTIFIER';
  readonly kind: NodeKind;
  readonly value: unknown;

  constructor(kind: NodeKind, value: unknown) {
    super(`invalid ${kind} ID: ${String(value)}`);
    this.name = 'InvalidIdentifierError';
    this.kind = kind;
    this.value = value;
  }
}

export class RootFetchError extends ReportEngineError {
  readonly code = 'ROOT_FETCH_FAILED';
  readonly kind: NodeKind;
  readonly id: ResourceId;

  constructor(kind: NodeKind, id: ResourceId, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`failed to get ${kind} ${id}: ${reason}`, { cause });
    this.name = 'RootFetchError';
    this.kind = kind;
    this.id = id;
  }
}

export class PoolClosedError extends ReportEngineError {
  readonly code = 'POOL_CLOSED';

  constructor() {
    super('worker pool has been shut down');
    this.name = 'PoolClosedError';
  }
}
