import type { Command } from 'commander';
import type { GroupVariableWithGroup, ProjectVariableWithProject } from '@glreporter/report-engine';
import { toUnifiedVariables } from '@glreporter/report-engine';
import { ConfigError } from '../errors';
import { parseResourceFlag, runReport, type CliDependencies } from '../lib/session';

type ScopeOptions = {
  groupId?: string;
  projectId?: string;
  includeValues?: boolean;
};

type GroupScopeOptions = {
  groupId?: string;
  includeValues?: boolean;
  all: boolean;
};

export const NO_VARIABLES_MESSAGE = 'No variables found';

function rejectBoth(options: ScopeOptions): void {
  if (parseResourceFlag(options.groupId) !== null && parseResourceFlag(options.projectId) !== null) {
    throw new ConfigError('cannot specify both --group-id and --project-id');
  }
}

function registerProjectVariables(variables: Command, deps: CliDependencies): void {
  variables
    .command('project')
    .alias('projects')
    .description('Project CI/CD variables of one project, every project below a group, or all accessible projects')
    .option('--project-id <id>', 'project ID or full path')
    .option('--group-id <id>', 'root group ID or full path')
    .option('--include-values', 'include variable values in the output')
    .action(async (options: ScopeOptions, command: Command) => {
      rejectBoth(options);
      const projectId = parseResourceFlag(options.projectId);
      await runReport(command, deps, 'project variables', async ({ reporter, formatter }) => {
        const records =
          projectId !== null
            ? await reporter.getProjectVariables(projectId)
            : await reporter.getProjectVariablesRecursively(parseResourceFlag(options.groupId));
        formatter.projectVariables(records, options.includeValues === true);
      });
    });
}

function registerGroupVariables(variables: Command, deps: CliDependencies): void {
  variables
    .command('group')
    .alias('groups')
    .description('Group CI/CD variables, recursively from a group or across all accessible groups')
    .option('--group-id <id>', 'root group ID or full path')
    .option('--no-all', 'only the given group, without its subgroups')
    .option('--include-values', 'include variable values in the output')
    .action(async (options: GroupScopeOptions, command: Command) => {
      const groupId = parseResourceFlag(options.groupId);
      if (!options.all && groupId === null) {
        throw new ConfigError('--no-all requires --group-id');
      }
      await runReport(command, deps, 'group variables', async ({ reporter, formatter }) => {
        const records =
          options.all || groupId === null
            ? await reporter.getGroupVariablesRecursively(groupId)
            : await reporter.getGroupVariables(groupId);
        formatter.groupVariables(records, options.includeValues === true);
      });
    });
}

function registerAllVariables(variables: Command, deps: CliDependencies): void {
  variables
    .command('all')
    .description('Project and group CI/CD variables together')
    .option('--group-id <id>', 'root group ID or full path')
    .option('--project-id <id>', 'project ID or full path')
    .option('--include-values', 'include variable values in the output')
    .action(async (options: ScopeOptions, command: Command) => {
      rejectBoth(options);
      const projectId = parseResourceFlag(options.projectId);
      const groupId = parseResourceFlag(options.groupId);
      await runReport(command, deps, 'variables', async ({ reporter, formatter, sink }) => {
        let projectVariables: ProjectVariableWithProject[];
        let groupVariables: GroupVariableWithGroup[] = [];
        if (projectId !== null) {
          projectVariables = await reporter.getProjectVariables(projectId);
        } else {
          projectVariables = await reporter.getProjectVariablesRecursively(groupId);
          groupVariables = await reporter.getGroupVariablesRecursively(groupId);
        }

        const unified = toUnifiedVariables(projectVariables, groupVariables);
        if (unified.length === 0) {
          sink.write(`${NO_VARIABLES_MESSAGE}\n`);
          return;
        }
        formatter.unifiedVariables(unified, options.includeValues === true);
      });
    });
}

export function registerVariableCommands(program: Command, deps: CliDependencies): void {
  const variables = program.command('variables').description('CI/CD variables of projects and groups');

  registerProjectVariables(variables, deps);
  registerGroupVariables(variables, deps);
  registerAllVariables(variables, deps);
}
