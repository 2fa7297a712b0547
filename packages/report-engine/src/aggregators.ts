import type { AccessToken, AccessTokenState, Group, Project } from '@glreporter/gitlab-client';
import { AggregateMap } from './aggregate';
import type { EngineContext } from './context';
import { listOptions } from './context';
import { collectFromEach, fanOut } from './fanOut';
import { sortById } from './normalize';
import { collectPages } from './pagination';
import {
  groupIdentity,
  projectIdentity,
  type GroupAccessTokenWithGroup,
  type GroupVariableWithGroup,
  type PipelineTriggerWithProject,
  type ProjectAccessTokenWithProject,
  type ProjectVariableWithProject
} from './records';

export interface TokenFilter {
  includeInactive?: boolean;
}

function tokenState(filter: TokenFilter): AccessTokenState | undefined {
  return filter.includeInactive ? undefined : 'active';
}

// The remote state filter is not trusted on its own.
function keepToken(token: AccessToken, filter: TokenFilter): boolean {
  return filter.includeInactive === true || token.active;
}

/** Every project directly inside the given groups, unique by ID and ascending. */
export async function collectProjects(context: EngineContext, groups: readonly Group[]): Promise<Project[]> {
  const projects = new AggregateMap<number, Project>();
  await fanOut(context, groups, {
    operation: 'listGroupProjects',
    kind: 'group',
    idOf: (group) => group.id,
    run: async (group) => {
      const items = await collectPages(
        (page) => context.gateway.listGroupProjects(group.id, listOptions(context, page)),
        { signal: context.signal }
      );
      const inserted = projects.mergeIfAbsent(items, (project) => project.id);
      context.logger.debug('Fetched group projects', { groupId: group.id, count: items.length, inserted });
    }
  });
  return sortById(projects.toMap());
}

export async function listGroupAccessTokens(
  context: EngineContext,
  group: Group,
  filter: TokenFilter = {}
): Promise<GroupAccessTokenWithGroup[]> {
  const state = tokenState(filter);
  const tokens = await collectPages(
    (page) => context.gateway.listGroupAccessTokens(group.id, { ...listOptions(context, page), state }),
    { signal: context.signal }
  );
  const identity = groupIdentity(group);
  return tokens.filter((token) => keepToken(token, filter)).map((token) => ({ token, ...identity }));
}

export async function listProjectAccessTokens(
  context: EngineContext,
  project: Project,
  filter: TokenFilter = {}
): Promise<ProjectAccessTokenWithProject[]> {
  const state = tokenState(filter);
  const tokens = await collectPages(
    (page) => context.gateway.listProjectAccessTokens(project.id, { ...listOptions(context, page), state }),
    { signal: context.signal }
  );
  const identity = projectIdentity(project);
  return tokens.filter((token) => keepToken(token, filter)).map((token) => ({ token, ...identity }));
}

export async function listPipelineTriggers(
  context: EngineContext,
  project: Project
): Promise<PipelineTriggerWithProject[]> {
  const triggers = await collectPages(
    (page) => context.gateway.listPipelineTriggers(project.id, listOptions(context, page)),
    { signal: context.signal }
  );
  const identity = projectIdentity(project);
  return triggers.map((trigger) => ({ trigger, ...identity }));
}

export async function listProjectVariables(
  context: EngineContext,
  project: Project
): Promise<ProjectVariableWithProject[]> {
  const variables = await collectPages(
    (page) => context.gateway.listProjectVariables(project.id, listOptions(context, page)),
    { signal: context.signal }
  );
  const identity = projectIdentity(project);
  return variables.map((variable) => ({ variable, ...identity }));
}

export async function listGroupVariables(context: EngineContext, group: Group): Promise<GroupVariableWithGroup[]> {
  const variables = await collectPages(
    (page) => context.gateway.listGroupVariables(group.id, listOptions(context, page)),
    { signal: context.signal }
  );
  const identity = groupIdentity(group);
  return variables.map((variable) => ({ variable, ...identity }));
}

export function collectGroupAccessTokens(
  context: EngineContext,
  groups: readonly Group[],
  filter: TokenFilter = {}
): Promise<GroupAccessTokenWithGroup[]> {
  return collectFromEach(context, groups, {
    operation: 'listGroupAccessTokens',
    kind: 'group',
    idOf: (group) => group.id,
    fetch: (group) => listGroupAccessTokens(context, group, filter)
  });
}

export function collectProjectAccessTokens(
  context: EngineContext,
  projects: readonly Project[],
  filter: TokenFilter = {}
): Promise<ProjectAccessTokenWithProject[]> {
  return collectFromEach(context, projects, {
    operation: 'listProjectAccessTokens',
    kind: 'project',
    idOf: (project) => project.id,
    fetch: (project) => listProjectAccessTokens(context, project, filter)
  });
}

export function collectPipelineTriggers(
  context: EngineContext,
  projects: readonly Project[]
): Promise<PipelineTriggerWithProject[]> {
  return collectFromEach(context, projects, {
    operation: 'listPipelineTriggers',
    kind: 'project',
    idOf: (project) => project.id,
    fetch: (project) => listPipelineTriggers(context, project)
  });
}

export function collectProjectVariables(
  context: EngineContext,
  projects: readonly Project[]
): Promise<ProjectVariableWithProject[]> {
  return collectFromEach(context, projects, {
    operation: 'listProjectVariables',
    kind: 'project',
    idOf: (project) => project.id,
    fetch: (project) => listProjectVariables(context, project)
  });
}

export function collectGroupVariables(
  context: EngineContext,
  groups: readonly Group[]
): Promise<GroupVariableWithGroup[]> {
  return collectFromEach(context, groups, {
    operation: 'listGroupVariables',
    kind: 'group',
    idOf: (group) => group.id,
    fetch: (group) => listGroupVariables(context, group)
  });
}
