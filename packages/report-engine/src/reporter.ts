import type { GitLabGateway, Group, Project, ResourceId } from '@glreporter/gitlab-client';
import {
  collectGroupAccessTokens,
  collectGroupVariables,
  collectPipelineTriggers,
  collectProjectAccessTokens,
  collectProjects,
  collectProjectVariables,
  listGroupAccessTokens,
  listGroupVariables,
  listPipelineTriggers,
  listProjectAccessTokens,
  listProjectVariables,
  type TokenFilter
} from './aggregators';
import type { BranchFailureHandler, EngineContext } from './context';
import { RootFetchError, type NodeKind } from './errors';
import { normalizeRootId, requireResourceId } from './identifiers';
import { noopLogger, type ReporterLogger } from './logger';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from './pagination';
import type {
  GroupAccessTokenWithGroup,
  GroupVariableWithGroup,
  PipelineTriggerWithProject,
  ProjectAccessTokenWithProject,
  ProjectVariableWithProject
} from './records';
import { listAllGroups, walkGroupTree } from './treeWalker';
import { WorkerPool } from './workerPool';

export const DEFAULT_WORKERS = 100;

export interface ReporterOptions {
  gateway: GitLabGateway;
  workers?: number;
  pageSize?: number;
  logger?: ReporterLogger;
  onBranchFailure?: BranchFailureHandler;
}

export interface OperationOptions {
  signal?: AbortSignal;
  /** Overrides the reporter-wide hook for this call. */
  onBranchFailure?: BranchFailureHandler;
}

export type TokenOperationOptions = OperationOptions & TokenFilter;

/**
 * Entry point of the engine. Owns one worker pool for its whole lifetime;
 * every operation issued through it shares that pool. Call `close` when done.
 *
 * Recursive operations tolerate failures below the root and return what they
 * could reach. Single-target operations fail on the first error.
 */
export class Reporter {
  private readonly gateway: GitLabGateway;
  private readonly pool: WorkerPool;
  private readonly pageSize: number;
  private readonly logger: ReporterLogger;
  private readonly onBranchFailure?: BranchFailureHandler;

  constructor(options: ReporterOptions) {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new RangeError(`page size must be an integer between 1 and ${MAX_PAGE_SIZE}, got ${pageSize}`);
    }
    this.gateway = options.gateway;
    this.pageSize = pageSize;
    this.logger = options.logger ?? noopLogger;
    this.onBranchFailure = options.onBranchFailure;
    this.pool = new WorkerPool(options.workers ?? DEFAULT_WORKERS, { logger: this.logger });
  }

  get workers(): number {
    return this.pool.size;
  }

  /** Root group plus all descendants. A missing root lists every accessible group. */
  async getGroupsRecursively(groupId: ResourceId | null, options: OperationOptions = {}): Promise<Group[]> {
    const root = normalizeRootId('group', groupId);
    return walkGroupTree(this.context(options), root);
  }

  async getAllGroups(options: OperationOptions = {}): Promise<Group[]> {
    return listAllGroups(this.context(options));
  }

  /** Projects of every group in the tree, unique and ascending by ID. */
  async getProjectsRecursively(groupId: ResourceId | null, options: OperationOptions = {}): Promise<Project[]> {
    return this.walkProjects(this.context(options), groupId);
  }

  async getGroupAccessTokens(
    groupId: ResourceId,
    options: TokenOperationOptions = {}
  ): Promise<GroupAccessTokenWithGroup[]> {
    const context = this.context(options);
    const group = await this.fetchGroup(context, groupId);
    return listGroupAccessTokens(context, group, options);
  }

  async getGroupAccessTokensRecursively(
    groupId: ResourceId | null,
    options: TokenOperationOptions = {}
  ): Promise<GroupAccessTokenWithGroup[]> {
    const context = this.context(options);
    const groups = await walkGroupTree(context, normalizeRootId('group', groupId));
    return collectGroupAccessTokens(context, groups, options);
  }

  async getProjectAccessTokens(
    projectId: ResourceId,
    options: TokenOperationOptions = {}
  ): Promise<ProjectAccessTokenWithProject[]> {
    const context = this.context(options);
    const project = await this.fetchProject(context, projectId);
    return listProjectAccessTokens(context, project, options);
  }

  async getProjectAccessTokensRecursively(
    groupId: ResourceId | null,
    options: TokenOperationOptions = {}
  ): Promise<ProjectAccessTokenWithProject[]> {
    const context = this.context(options);
    const projects = await this.walkProjects(context, groupId);
    return collectProjectAccessTokens(context, projects, options);
  }

  async getPipelineTriggers(
    projectId: ResourceId,
    options: OperationOptions = {}
  ): Promise<PipelineTriggerWithProject[]> {
    const context = this.context(options);
    const project = await this.fetchProject(context, projectId);
    return listPipelineTriggers(context, project);
  }

  async getPipelineTriggersRecursively(
    groupId: ResourceId | null,
    options: OperationOptions = {}
  ): Promise<PipelineTriggerWithProject[]> {
    const context = this.context(options);
    const projects = await this.walkProjects(context, groupId);
    return collectPipelineTriggers(context, projects);
  }

  async getProjectVariables(
    projectId: ResourceId,
    options: OperationOptions = {}
  ): Promise<ProjectVariableWithProject[]> {
    const context = this.context(options);
    const project = await this.fetchProject(context, projectId);
    return listProjectVariables(context, project);
  }

  async getProjectVariablesRecursively(
    groupId: ResourceId | null,
    options: OperationOptions = {}
  ): Promise<ProjectVariableWithProject[]> {
    const context = this.context(options);
    const projects = await this.walkProjects(context, groupId);
    return collectProjectVariables(context, projects);
  }

  async getGroupVariables(groupId: ResourceId, options: OperationOptions = {}): Promise<GroupVariableWithGroup[]> {
    const context = this.context(options);
    const group = await this.fetchGroup(context, groupId);
    return listGroupVariables(context, group);
  }

  async getGroupVariablesRecursively(
    groupId: ResourceId | null,
    options: OperationOptions = {}
  ): Promise<GroupVariableWithGroup[]> {
    const context = this.context(options);
    const groups = await walkGroupTree(context, normalizeRootId('group', groupId));
    return collectGroupVariables(context, groups);
  }

  async close(): Promise<void> {
    await this.pool.shutdown();
  }

  private context(options: OperationOptions): EngineContext {
    return {
      gateway: this.gateway,
      pool: this.pool,
      pageSize: this.pageSize,
      logger: this.logger,
      signal: options.signal,
      onBranchFailure: options.onBranchFailure ?? this.onBranchFailure
    };
  }

  private async walkProjects(context: EngineContext, groupId: ResourceId | null): Promise<Project[]> {
    const groups = await walkGroupTree(context, normalizeRootId('group', groupId));
    return collectProjects(context, groups);
  }

  private fetchGroup(context: EngineContext, groupId: ResourceId): Promise<Group> {
    const id = requireResourceId('group', groupId);
    return this.fetchTarget(context, 'group', id, () => this.gateway.getGroup(id, { signal: context.signal }));
  }

  private fetchProject(context: EngineContext, projectId: ResourceId): Promise<Project> {
    const id = requireResourceId('project', projectId);
    return this.fetchTarget(context, 'project', id, () => this.gateway.getProject(id, { signal: context.signal }));
  }

  private async fetchTarget<T>(
    context: EngineContext,
    kind: NodeKind,
    id: ResourceId,
    load: () => Promise<T>
  ): Promise<T> {
    try {
      return await load();
    } catch (err) {
      context.signal?.throwIfAborted();
      throw new RootFetchError(kind, id, err);
    }
  }
}
