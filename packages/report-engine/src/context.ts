import type { GitLabGateway, ResourceId } from '@glreporter/gitlab-client';
import type { NodeKind } from './errors';
import type { ReporterLogger } from './logger';
import type { WorkerPool } from './workerPool';

export interface BranchFailure {
  operation: string;
  kind: NodeKind;
  id: ResourceId;
  error: unknown;
}

export type BranchFailureHandler = (failure: BranchFailure) => void;

/** Everything a walk or fan-out needs; built once per top-level operation. */
export interface EngineContext {
  gateway: GitLabGateway;
  pool: WorkerPool;
  pageSize: number;
  logger: ReporterLogger;
  signal?: AbortSignal;
  onBranchFailure?: BranchFailureHandler;
}

export function reportBranchFailure(context: EngineContext, failure: BranchFailure): void {
  const reason = failure.error instanceof Error ? failure.error.message : String(failure.error);
  context.logger.debug(`Skipping ${failure.kind} ${failure.id} after ${failure.operation} failed`, {
    operation: failure.operation,
    kind: failure.kind,
    id: failure.id,
    error: reason
  });
  context.onBranchFailure?.(failure);
}

export function listOptions(context: EngineContext, page: number) {
  return { page, perPage: context.pageSize, signal: context.signal };
}
