import type { AccessToken, CiVariable, Group, Project } from '@glreporter/gitlab-client';
import type {
  GroupAccessTokenWithGroup,
  GroupIdentity,
  GroupVariableWithGroup,
  PipelineTriggerWithProject,
  ProjectAccessTokenWithProject,
  ProjectIdentity,
  ProjectVariableWithProject,
  VariableWithSource
} from '@glreporter/report-engine';
import type { CsvField } from './csv';

export type TableCell = string | number | boolean;
export type TableRow = Record<string, TableCell>;

/** How one record type renders in each output format. */
export interface RecordLayout<T> {
  tableRow(record: T, includeValues: boolean): TableRow;
  csvFields(includeValues: boolean): CsvField<T>[];
  toJson(record: T, includeValues: boolean): unknown;
}

export const NEVER_TEXT = 'Never';
export const PLACEHOLDER_TEXT = 'N/A';

/** `2025-06-01T12:30:00.000Z` → `2025-06-01 12:30:00Z`; unparseable input is returned as is. */
export function formatTimestamp(value: string | null | undefined, fallback: string): string {
  if (!value) {
    return fallback;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return value;
  }
  return date.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, 'Z');
}

function withoutValue(variable: CiVariable): Omit<CiVariable, 'value'> {
  const { value: _value, ...rest } = variable;
  return rest;
}

function tokenFields<T extends { token: AccessToken }>(): CsvField<T>[] {
  return [
    { header: 'token_id', value: (record) => record.token.id },
    { header: 'token_name', value: (record) => record.token.name },
    { header: 'scopes', value: (record) => record.token.scopes },
    { header: 'active', value: (record) => record.token.active },
    { header: 'revoked', value: (record) => record.token.revoked },
    { header: 'access_level', value: (record) => record.token.access_level },
    { header: 'created_at', value: (record) => record.token.created_at },
    { header: 'expires_at', value: (record) => record.token.expires_at },
    { header: 'last_used_at', value: (record) => record.token.last_used_at }
  ];
}

function variableFields<T extends { variable: CiVariable }>(includeValues: boolean): CsvField<T>[] {
  const fields: CsvField<T>[] = [{ header: 'key', value: (record) => record.variable.key }];
  if (includeValues) {
    fields.push({ header: 'value', value: (record) => record.variable.value });
  }
  fields.push(
    { header: 'variable_type', value: (record) => record.variable.variable_type },
    { header: 'protected', value: (record) => record.variable.protected },
    { header: 'masked', value: (record) => record.variable.masked },
    { header: 'hidden', value: (record) => record.variable.hidden },
    { header: 'raw', value: (record) => record.variable.raw },
    { header: 'environment_scope', value: (record) => record.variable.environment_scope },
    { header: 'description', value: (record) => record.variable.description }
  );
  return fields;
}

function variableColumns(variable: CiVariable, includeValues: boolean): TableRow {
  const row: TableRow = {
    Key: variable.key,
    Type: variable.variable_type,
    Protected: variable.protected,
    Masked: variable.masked,
    Environment: variable.environment_scope
  };
  if (includeValues) {
    row.Value = variable.value;
  }
  return row;
}

function variableJson<T extends { variable: CiVariable }>(record: T, includeValues: boolean): unknown {
  return includeValues ? record : { ...record, variable: withoutValue(record.variable) };
}

function projectOwnerFields<T extends ProjectIdentity>(): CsvField<T>[] {
  return [
    { header: 'project_name', value: (record) => record.projectName },
    { header: 'project_path', value: (record) => record.projectPath },
    { header: 'project_namespace', value: (record) => record.projectNamespace },
    { header: 'project_web_url', value: (record) => record.projectWebUrl }
  ];
}

function groupOwnerFields<T extends GroupIdentity>(): CsvField<T>[] {
  return [
    { header: 'group_name', value: (record) => record.groupName },
    { header: 'group_path', value: (record) => record.groupPath },
    { header: 'group_web_url', value: (record) => record.groupWebUrl }
  ];
}

export const groupLayout: RecordLayout<Group> = {
  tableRow: (group) => ({ ID: group.id, Name: group.name, 'Full Path': group.full_path }),
  csvFields: () => [
    { header: 'id', value: (group) => group.id },
    { header: 'name', value: (group) => group.name },
    { header: 'path', value: (group) => group.path },
    { header: 'full_path', value: (group) => group.full_path },
    { header: 'parent_id', value: (group) => group.parent_id },
    { header: 'visibility', value: (group) => group.visibility },
    { header: 'web_url', value: (group) => group.web_url }
  ],
  toJson: (group) => group
};

export const projectLayout: RecordLayout<Project> = {
  tableRow: (project) => ({ ID: project.id, Name: project.name, 'Path with Namespace': project.path_with_namespace }),
  csvFields: () => [
    { header: 'id', value: (project) => project.id },
    { header: 'name', value: (project) => project.name },
    { header: 'path', value: (project) => project.path },
    { header: 'path_with_namespace', value: (project) => project.path_with_namespace },
    { header: 'namespace', value: (project) => project.namespace.full_path },
    { header: 'visibility', value: (project) => project.visibility },
    { header: 'archived', value: (project) => project.archived },
    { header: 'web_url', value: (project) => project.web_url }
  ],
  toJson: (project) => project
};

export const groupAccessTokenLayout: RecordLayout<GroupAccessTokenWithGroup> = {
  tableRow: (record) => ({
    'Group Path': record.groupPath,
    'Token Name': record.token.name,
    Scopes: record.token.scopes.join(', '),
    Active: record.token.active,
    'Expires At': formatTimestamp(record.token.expires_at, NEVER_TEXT)
  }),
  csvFields: () => [...groupOwnerFields<GroupAccessTokenWithGroup>(), ...tokenFields<GroupAccessTokenWithGroup>()],
  toJson: (record) => record
};

export const projectAccessTokenLayout: RecordLayout<ProjectAccessTokenWithProject> = {
  tableRow: (record) => ({
    'Project Path': record.projectPath,
    'Token Name': record.token.name,
    Scopes: record.token.scopes.join(', '),
    Active: record.token.active,
    'Expires At': formatTimestamp(record.token.expires_at, NEVER_TEXT)
  }),
  csvFields: () => [
    ...projectOwnerFields<ProjectAccessTokenWithProject>(),
    ...tokenFields<ProjectAccessTokenWithProject>()
  ],
  toJson: (record) => record
};

export const pipelineTriggerLayout: RecordLayout<PipelineTriggerWithProject> = {
  tableRow: (record) => ({
    'Project Path': record.projectPath,
    Description: record.trigger.description,
    Owner: record.trigger.owner?.username ?? PLACEHOLDER_TEXT,
    'Last Used': formatTimestamp(record.trigger.last_used, NEVER_TEXT)
  }),
  csvFields: () => [
    ...projectOwnerFields<PipelineTriggerWithProject>(),
    { header: 'trigger_id', value: (record) => record.trigger.id },
    { header: 'description', value: (record) => record.trigger.description },
    { header: 'owner', value: (record) => record.trigger.owner?.username },
    { header: 'created_at', value: (record) => record.trigger.created_at },
    { header: 'last_used', value: (record) => record.trigger.last_used }
  ],
  toJson: (record) => record
};

export const projectVariableLayout: RecordLayout<ProjectVariableWithProject> = {
  tableRow: (record, includeValues) => ({
    'Project Path': record.projectPath,
    ...variableColumns(record.variable, includeValues)
  }),
  csvFields: (includeValues) => [
    ...projectOwnerFields<ProjectVariableWithProject>(),
    ...variableFields<ProjectVariableWithProject>(includeValues)
  ],
  toJson: variableJson
};

export const groupVariableLayout: RecordLayout<GroupVariableWithGroup> = {
  tableRow: (record, includeValues) => ({
    'Group Path': record.groupPath,
    ...variableColumns(record.variable, includeValues)
  }),
  csvFields: (includeValues) => [
    ...groupOwnerFields<GroupVariableWithGroup>(),
    ...variableFields<GroupVariableWithGroup>(includeValues)
  ],
  toJson: variableJson
};

export const unifiedVariableLayout: RecordLayout<VariableWithSource> = {
  tableRow: (record, includeValues) => ({
    Source: record.source,
    Path: record.sourcePath,
    ...variableColumns(record.variable, includeValues)
  }),
  csvFields: (includeValues) => [
    { header: 'source', value: (record) => record.source },
    { header: 'source_name', value: (record) => record.sourceName },
    { header: 'source_path', value: (record) => record.sourcePath },
    { header: 'source_namespace', value: (record) => record.sourceNamespace },
    { header: 'source_web_url', value: (record) => record.sourceWebUrl },
    ...variableFields<VariableWithSource>(includeValues)
  ],
  toJson: variableJson
};
