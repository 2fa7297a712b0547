import type {
  AccessToken,
  AccessTokenState,
  CiVariable,
  Group,
  PipelineTrigger,
  Project
} from './schemas';

export type TokenSupplier = string | (() => string | Promise<string>);

export interface GitLabClientOptions {
  baseUrl?: string;
  token: TokenSupplier;
  defaultHeaders?: Record<string, string>;
  userAgent?: string;
  fetchTimeoutMs?: number;
}

/**
 * A group or project reference: a numeric ID or the full path
 * (`parent/child`), which is URL-encoded on the wire.
 */
export type ResourceId = number | string;

export interface Page<T> {
  items: T[];
  /** `null` once the listing has no further pages. */
  nextPage: number | null;
}

export interface RequestContext {
  signal?: AbortSignal;
}

export interface ListOptions extends RequestContext {
  page: number;
  perPage: number;
}

export interface AccessTokenListOptions extends ListOptions {
  state?: AccessTokenState;
}

/**
 * The capability set the report engine consumes. `GitLabClient` is the HTTP
 * implementation; tests substitute in-memory fakes.
 */
export interface GitLabGateway {
  getGroup(id: ResourceId, context?: RequestContext): Promise<Group>;
  listSubgroups(id: ResourceId, options: ListOptions): Promise<Page<Group>>;
  listGroupProjects(id: ResourceId, options: ListOptions): Promise<Page<Project>>;
  listGroups(options: ListOptions): Promise<Page<Group>>;
  getProject(id: ResourceId, context?: RequestContext): Promise<Project>;
  listGroupAccessTokens(id: ResourceId, options: AccessTokenListOptions): Promise<Page<AccessToken>>;
  listProjectAccessTokens(id: ResourceId, options: AccessTokenListOptions): Promise<Page<AccessToken>>;
  listPipelineTriggers(id: ResourceId, options: ListOptions): Promise<Page<PipelineTrigger>>;
  listProjectVariables(id: ResourceId, options: ListOptions): Promise<Page<CiVariable>>;
  listGroupVariables(id: ResourceId, options: ListOptions): Promise<Page<CiVariable>>;
}
