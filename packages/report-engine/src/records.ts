import type { AccessToken, CiVariable, Group, PipelineTrigger, Project } from '@glreporter/gitlab-client';
import { ReportEngineError } from './errors';

export interface GroupIdentity {
  groupName: string;
  groupPath: string;
  groupWebUrl: string;
}

export interface ProjectIdentity {
  projectName: string;
  projectPath: string;
  projectNamespace: string;
  projectWebUrl: string;
}

export interface GroupAccessTokenWithGroup extends GroupIdentity {
  token: AccessToken;
}

export interface ProjectAccessTokenWithProject extends ProjectIdentity {
  token: AccessToken;
}

export interface PipelineTriggerWithProject extends ProjectIdentity {
  trigger: PipelineTrigger;
}

export interface ProjectVariableWithProject extends ProjectIdentity {
  variable: CiVariable;
}

export interface GroupVariableWithGroup extends GroupIdentity {
  variable: CiVariable;
}

export type VariableSource = 'project' | 'group';

export interface VariableWithSource {
  variable: CiVariable;
  source: VariableSource;
  sourceName: string;
  sourcePath: string;
  sourceWebUrl: string;
  /** Parent namespace for project variables, empty for group variables. */
  sourceNamespace: string;
}

// Owner path is the join key of every report row.
function requireOwnerPath(kind: string, id: number, path: string): string {
  if (!path) {
    throw new ReportEngineError(`${kind} ${id} has an empty path`);
  }
  return path;
}

export function groupIdentity(group: Group): GroupIdentity {
  return {
    groupName: group.name,
    groupPath: requireOwnerPath('group', group.id, group.full_path),
    groupWebUrl: group.web_url
  };
}

export function projectIdentity(project: Project): ProjectIdentity {
  return {
    projectName: project.name,
    projectPath: requireOwnerPath('project', project.id, project.path_with_namespace),
    projectNamespace: project.namespace.full_path,
    projectWebUrl: project.web_url
  };
}

export function toUnifiedVariables(
  projectVariables: readonly ProjectVariableWithProject[],
  groupVariables: readonly GroupVariableWithGroup[]
): VariableWithSource[] {
  const unified: VariableWithSource[] = [];
  for (const entry of projectVariables) {
    unified.push({
      variable: entry.variable,
      source: 'project',
      sourceName: entry.projectName,
      sourcePath: entry.projectPath,
      sourceWebUrl: entry.projectWebUrl,
      sourceNamespace: entry.projectNamespace
    });
  }
  for (const entry of groupVariables) {
    unified.push({
      variable: entry.variable,
      source: 'group',
      sourceName: entry.groupName,
      sourcePath: entry.groupPath,
      sourceWebUrl: entry.groupWebUrl,
      sourceNamespace: ''
    });
  }
  return unified;
}
