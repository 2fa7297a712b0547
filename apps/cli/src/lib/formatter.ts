import type { Group, Project } from '@glreporter/gitlab-client';
import type {
  GroupAccessTokenWithGroup,
  GroupVariableWithGroup,
  PipelineTriggerWithProject,
  ProjectAccessTokenWithProject,
  ProjectVariableWithProject,
  VariableWithSource
} from '@glreporter/report-engine';
import { ConfigError } from '../errors';
import { renderCsv } from './csv';
import {
  groupAccessTokenLayout,
  groupLayout,
  groupVariableLayout,
  pipelineTriggerLayout,
  projectAccessTokenLayout,
  projectLayout,
  projectVariableLayout,
  unifiedVariableLayout,
  type RecordLayout,
  type TableRow
} from './layouts';

export const OUTPUT_FORMATS = ['table', 'json', 'csv'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function parseOutputFormat(value: string): OutputFormat {
  const normalized = value.trim().toLowerCase();
  const match = OUTPUT_FORMATS.find((format) => format === normalized);
  if (!match) {
    throw new ConfigError(`unsupported format: ${value}`);
  }
  return match;
}

/** Where rendered reports go. */
export interface OutputSink {
  write(text: string): void;
  table(rows: TableRow[]): void;
}

export const stdoutSink: OutputSink = {
  write(text) {
    process.stdout.write(text);
  },
  table(rows) {
    console.table(rows);
  }
};

export interface Formatter {
  groups(groups: readonly Group[]): void;
  projects(projects: readonly Project[]): void;
  groupAccessTokens(tokens: readonly GroupAccessTokenWithGroup[]): void;
  projectAccessTokens(tokens: readonly ProjectAccessTokenWithProject[]): void;
  pipelineTriggers(triggers: readonly PipelineTriggerWithProject[]): void;
  projectVariables(variables: readonly ProjectVariableWithProject[], includeValues: boolean): void;
  groupVariables(variables: readonly GroupVariableWithGroup[], includeValues: boolean): void;
  unifiedVariables(variables: readonly VariableWithSource[], includeValues: boolean): void;
}

type Renderer = <T>(layout: RecordLayout<T>, records: readonly T[], includeValues: boolean) => void;

function createRenderer(format: OutputFormat, sink: OutputSink): Renderer {
  switch (format) {
    case 'table':
      return (layout, records, includeValues) => {
        sink.table(records.map((record) => layout.tableRow(record, includeValues)));
      };
    case 'json':
      return (layout, records, includeValues) => {
        const payload = records.map((record) => layout.toJson(record, includeValues));
        sink.write(`${JSON.stringify(payload, null, 2)}\n`);
      };
    case 'csv':
      return (layout, records, includeValues) => {
        const content = renderCsv(layout.csvFields(includeValues), records);
        if (content) {
          sink.write(content);
        }
      };
  }
}

export function createFormatter(format: string, sink: OutputSink = stdoutSink): Formatter {
  const render = createRenderer(parseOutputFormat(format), sink);
  return {
    groups: (groups) => render(groupLayout, groups, false),
    projects: (projects) => render(projectLayout, projects, false),
    groupAccessTokens: (tokens) => render(groupAccessTokenLayout, tokens, false),
    projectAccessTokens: (tokens) => render(projectAccessTokenLayout, tokens, false),
    pipelineTriggers: (triggers) => render(pipelineTriggerLayout, triggers, false),
    projectVariables: (variables, includeValues) => render(projectVariableLayout, variables, includeValues),
    groupVariables: (variables, includeValues) => render(groupVariableLayout, variables, includeValues),
    unifiedVariables: (variables, includeValues) => render(unifiedVariableLayout, variables, includeValues)
  };
}
