import type {
  AccessToken,
  AccessTokenListOptions,
  CiVariable,
  GitLabGateway,
  Group,
  ListOptions,
  Page,
  PipelineTrigger,
  Project,
  RequestContext,
  ResourceId
} from '@glreporter/gitlab-client';
import { GitLabClientError, GitLabNotFoundError } from '@glreporter/gitlab-client';

export function makeGroup(id: number, parentPath?: string): Group {
  const path = `g${id}`;
  const fullPath = parentPath ? `${parentPath}/${path}` : path;
  return {
    id,
    name: `Group ${id}`,
    path,
    full_path: fullPath,
    web_url: `http://gitlab.test/groups/${fullPath}`
  };
}

export function makeProject(id: number, group: Group): Project {
  const path = `p${id}`;
  return {
    id,
    name: `Project ${id}`,
    path,
    path_with_namespace: `${group.full_path}/${path}`,
    web_url: `http://gitlab.test/${group.full_path}/${path}`,
    namespace: { id: group.id, name: group.name, path: group.path, full_path: group.full_path, kind: 'group' }
  };
}

export function makeToken(id: number, active = true): AccessToken {
  return {
    id,
    name: `token-${id}`,
    scopes: ['read_api'],
    active,
    revoked: !active,
    created_at: '2025-01-01T00:00:00.000Z',
    expires_at: null
  };
}

export function makeTrigger(id: number): PipelineTrigger {
  return {
    id,
    description: `trigger-${id}`,
    created_at: '2025-01-01T00:00:00.000Z',
    last_used: null,
    owner: null
  };
}

export function makeVariable(key: string, value = 'test-value'): CiVariable {
  return {
    key,
    value,
    variable_type: 'env_var',
    protected: false,
    masked: false,
    raw: false,
    environment_scope: '*',
    description: null
  };
}

function pageOf<T>(items: readonly T[], options: ListOptions): Page<T> {
  const start = (options.page - 1) * options.perPage;
  const end = start + options.perPage;
  return {
    items: items.slice(start, end),
    nextPage: end < items.length ? options.page + 1 : null
  };
}

/**
 * In-memory gateway. Listings are paged with the requested page size; any call
 * key registered through `fail` rejects with a 500.
 */
export class FakeGateway implements GitLabGateway {
  readonly groups = new Map<number, Group>();
  readonly children = new Map<number, number[]>();
  readonly projects = new Map<number, Project>();
  readonly groupProjects = new Map<number, number[]>();
  readonly groupTokens = new Map<number, AccessToken[]>();
  readonly projectTokens = new Map<number, AccessToken[]>();
  readonly triggers = new Map<number, PipelineTrigger[]>();
  readonly projectVariables = new Map<number, CiVariable[]>();
  readonly groupVariables = new Map<number, CiVariable[]>();
  readonly calls: string[] = [];
  readonly tokenStates: Array<string | undefined> = [];

  /** When set, the `state` filter on token listings is not applied. */
  ignoreStateFilter = false;
  inFlight = 0;
  maxInFlight = 0;

  private readonly failures = new Set<string>();

  addGroup(id: number, parentId?: number): Group {
    const parent = parentId === undefined ? undefined : this.groups.get(parentId);
    const group = makeGroup(id, parent?.full_path);
    if (parentId !== undefined) {
      group.parent_id = parentId;
      this.children.set(parentId, [...(this.children.get(parentId) ?? []), id]);
    }
    this.groups.set(id, group);
    return group;
  }

  addProject(id: number, groupId: number): Project {
    const group = this.groups.get(groupId);
    if (!group) {
      throw new Error(`unknown group ${groupId}`);
    }
    const project = this.projects.get(id) ?? makeProject(id, group);
    this.projects.set(id, project);
    this.groupProjects.set(groupId, [...(this.groupProjects.get(groupId) ?? []), id]);
    return project;
  }

  fail(operation: string, id?: number): void {
    this.failures.add(id === undefined ? operation : `${operation}:${id}`);
  }

  async getGroup(id: ResourceId, _context?: RequestContext): Promise<Group> {
    await this.enter('getGroup', id);
    try {
      const group = this.findGroup(id);
      if (!group) {
        throw new GitLabNotFoundError(`Group ${id}`);
      }
      return group;
    } finally {
      this.leave();
    }
  }

  async getProject(id: ResourceId, _context?: RequestContext): Promise<Project> {
    await this.enter('getProject', id);
    try {
      const project = typeof id === 'number' ? this.projects.get(id) : this.findProjectByPath(id);
      if (!project) {
        throw new GitLabNotFoundError(`Project ${id}`);
      }
      return project;
    } finally {
      this.leave();
    }
  }

  listGroups(options: ListOptions): Promise<Page<Group>> {
    return this.list('listGroups', undefined, options, () => Array.from(this.groups.values()));
  }

  listSubgroups(id: ResourceId, options: ListOptions): Promise<Page<Group>> {
    return this.list('listSubgroups', id, options, (groupId) =>
      (this.children.get(groupId) ?? []).flatMap((childId) => this.groups.get(childId) ?? [])
    );
  }

  listGroupProjects(id: ResourceId, options: ListOptions): Promise<Page<Project>> {
    return this.list('listGroupProjects', id, options, (groupId) =>
      (this.groupProjects.get(groupId) ?? []).flatMap((projectId) => this.projects.get(projectId) ?? [])
    );
  }

  listGroupAccessTokens(id: ResourceId, options: AccessTokenListOptions): Promise<Page<AccessToken>> {
    this.tokenStates.push(options.state);
    return this.list('listGroupAccessTokens', id, options, (groupId) =>
      this.filterTokens(this.groupTokens.get(groupId) ?? [], options)
    );
  }

  listProjectAccessTokens(id: ResourceId, options: AccessTokenListOptions): Promise<Page<AccessToken>> {
    this.tokenStates.push(options.state);
    return this.list('listProjectAccessTokens', id, options, (projectId) =>
      this.filterTokens(this.projectTokens.get(projectId) ?? [], options)
    );
  }

  listPipelineTriggers(id: ResourceId, options: ListOptions): Promise<Page<PipelineTrigger>> {
    return this.list('listPipelineTriggers', id, options, (projectId) => this.triggers.get(projectId) ?? []);
  }

  listProjectVariables(id: ResourceId, options: ListOptions): Promise<Page<CiVariable>> {
    return this.list('listProjectVariables', id, options, (projectId) => this.projectVariables.get(projectId) ?? []);
  }

  listGroupVariables(id: ResourceId, options: ListOptions): Promise<Page<CiVariable>> {
    return this.list('listGroupVariables', id, options, (groupId) => this.groupVariables.get(groupId) ?? []);
  }

  private filterTokens(tokens: AccessToken[], options: AccessTokenListOptions): AccessToken[] {
    if (this.ignoreStateFilter || options.state === undefined) {
      return tokens;
    }
    const wantActive = options.state === 'active';
    return tokens.filter((token) => token.active === wantActive);
  }

  private findGroup(id: ResourceId): Group | undefined {
    if (typeof id === 'number') {
      return this.groups.get(id);
    }
    return Array.from(this.groups.values()).find((group) => group.full_path === id);
  }

  private findProjectByPath(path: string): Project | undefined {
    return Array.from(this.projects.values()).find((project) => project.path_with_namespace === path);
  }

  private async list<T>(
    operation: string,
    id: ResourceId | undefined,
    options: ListOptions,
    source: (id: number) => readonly T[]
  ): Promise<Page<T>> {
    await this.enter(operation, id);
    try {
      const numericId = typeof id === 'number' ? id : (this.findGroup(id ?? '')?.id ?? 0);
      return pageOf(source(numericId), options);
    } finally {
      this.leave();
    }
  }

  private async enter(operation: string, id: ResourceId | undefined): Promise<void> {
    this.calls.push(id === undefined ? operation : `${operation}:${id}`);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise<void>((resolve) => setImmediate(resolve));
    if (this.failures.has(operation) || this.failures.has(`${operation}:${id}`)) {
      this.leave();
      throw new GitLabClientError('500 Internal Server Error', { statusCode: 500 });
    }
  }

  private leave(): void {
    this.inFlight -= 1;
  }
}
