import type {
  AccessToken,
  CiVariable,
  GitLabGateway,
  Group,
  Page,
  PipelineTrigger,
  Project,
  ResourceId
} from '@glreporter/gitlab-client';
import { GitLabClientError, GitLabNotFoundError } from '@glreporter/gitlab-client';
import type { CliDependencies } from '../src/lib/session';
import type { TableRow } from '../src/lib/layouts';

export const platform: Group = {
  id: 1,
  name: 'Platform',
  path: 'platform',
  full_path: 'platform',
  web_url: 'http://gitlab.test/groups/platform'
};

export const infra: Group = {
  id: 2,
  name: 'Infra',
  path: 'infra',
  full_path: 'platform/infra',
  web_url: 'http://gitlab.test/groups/platform/infra',
  parent_id: 1
};

export const portal: Project = {
  id: 10,
  name: 'Portal',
  path: 'portal',
  path_with_namespace: 'platform/portal',
  web_url: 'http://gitlab.test/platform/portal',
  namespace: { id: 1, name: 'Platform', path: 'platform', full_path: 'platform', kind: 'group' }
};

export const terraform: Project = {
  id: 20,
  name: 'Terraform',
  path: 'terraform',
  path_with_namespace: 'platform/infra/terraform',
  web_url: 'http://gitlab.test/platform/infra/terraform',
  namespace: { id: 2, name: 'Infra', path: 'infra', full_path: 'platform/infra', kind: 'group' }
};

export function token(id: number, name: string, active = true): AccessToken {
  return {
    id,
    name,
    scopes: ['read_api', 'read_repository'],
    active,
    revoked: false,
    created_at: '2025-01-01T00:00:00.000Z',
    expires_at: '2026-01-01'
  };
}

export function variable(key: string, value: string): CiVariable {
  return {
    key,
    value,
    variable_type: 'env_var',
    protected: true,
    masked: false,
    raw: false,
    environment_scope: '*',
    description: null
  };
}

function single<T>(items: readonly T[] | undefined): Page<T> {
  return { items: [...(items ?? [])], nextPage: null };
}

function numeric(id: ResourceId): number {
  return typeof id === 'number' ? id : Number.NaN;
}

/** Two groups (platform > infra), one project in each; listings fit in one page. */
export class StubGateway implements GitLabGateway {
  readonly groups = new Map<number, Group>([
    [platform.id, platform],
    [infra.id, infra]
  ]);
  readonly projects = new Map<number, Project>([
    [portal.id, portal],
    [terraform.id, terraform]
  ]);
  readonly subgroups = new Map<number, Group[]>([[platform.id, [infra]]]);
  readonly groupProjects = new Map<number, Project[]>([
    [platform.id, [portal]],
    [infra.id, [terraform]]
  ]);
  readonly groupTokens = new Map<number, AccessToken[]>();
  readonly projectTokens = new Map<number, AccessToken[]>();
  readonly triggers = new Map<number, PipelineTrigger[]>();
  readonly projectVariables = new Map<number, CiVariable[]>();
  readonly groupVariables = new Map<number, CiVariable[]>();
  readonly failingSubgroups = new Set<number>();

  async getGroup(id: ResourceId): Promise<Group> {
    const group = this.groups.get(numeric(id));
    if (!group) {
      throw new GitLabNotFoundError(`Group ${id}`);
    }
    return group;
  }

  async getProject(id: ResourceId): Promise<Project> {
    const project = this.projects.get(numeric(id));
    if (!project) {
      throw new GitLabNotFoundError(`Project ${id}`);
    }
    return project;
  }

  async listGroups(): Promise<Page<Group>> {
    return single(Array.from(this.groups.values()));
  }

  async listSubgroups(id: ResourceId): Promise<Page<Group>> {
    if (this.failingSubgroups.has(numeric(id))) {
      throw new GitLabClientError('503 Service Unavailable', { statusCode: 503 });
    }
    return single(this.subgroups.get(numeric(id)));
  }

  async listGroupProjects(id: ResourceId): Promise<Page<Project>> {
    return single(this.groupProjects.get(numeric(id)));
  }

  async listGroupAccessTokens(id: ResourceId): Promise<Page<AccessToken>> {
    return single(this.groupTokens.get(numeric(id)));
  }

  async listProjectAccessTokens(id: ResourceId): Promise<Page<AccessToken>> {
    return single(this.projectTokens.get(numeric(id)));
  }

  async listPipelineTriggers(id: ResourceId): Promise<Page<PipelineTrigger>> {
    return single(this.triggers.get(numeric(id)));
  }

  async listProjectVariables(id: ResourceId): Promise<Page<CiVariable>> {
    return single(this.projectVariables.get(numeric(id)));
  }

  async listGroupVariables(id: ResourceId): Promise<Page<CiVariable>> {
    return single(this.groupVariables.get(numeric(id)));
  }
}

export interface CapturedOutput {
  deps: CliDependencies;
  stdout: string[];
  tables: TableRow[][];
  stderr: string[];
  logs: string[];
}

export function captureDeps(
  gateway: GitLabGateway,
  env: Record<string, string> = { GITLAB_TOKEN: 'test-token' }
): CapturedOutput {
  const stdout: string[] = [];
  const tables: TableRow[][] = [];
  const stderr: string[] = [];
  const logs: string[] = [];
  return {
    stdout,
    tables,
    stderr,
    logs,
    deps: {
      env,
      sink: {
        write: (text) => {
          stdout.push(text);
        },
        table: (rows) => {
          tables.push(rows);
        }
      },
      stderr: (line) => {
        stderr.push(line);
      },
      logDestination: {
        write: (line: string) => {
          logs.push(line);
        }
      },
      createGateway: () => gateway
    }
  };
}
