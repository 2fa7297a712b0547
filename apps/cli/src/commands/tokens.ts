import type { Command } from 'commander';
import { ConfigError } from '../errors';
import { parseResourceFlag, requireExclusiveTarget, runReport, type CliDependencies } from '../lib/session';

type GroupTokenOptions = {
  groupId?: string;
  includeInactive?: boolean;
  all: boolean;
};

type TargetOptions = {
  groupId?: string;
  projectId?: string;
  includeInactive?: boolean;
};

function registerGroupAccessTokens(tokens: Command, deps: CliDependencies): void {
  tokens
    .command('gat')
    .alias('group-access-tokens')
    .description('Group access tokens, recursively from a group or across all accessible groups')
    .option('--group-id <id>', 'root group ID or full path')
    .option('--include-inactive', 'include inactive tokens')
    .option('--no-all', 'only the given group, without its subgroups')
    .action(async (options: GroupTokenOptions, command: Command) => {
      const groupId = parseResourceFlag(options.groupId);
      const filter = { includeInactive: options.includeInactive === true };
      if (!options.all && groupId === null) {
        throw new ConfigError('--no-all requires --group-id');
      }
      await runReport(command, deps, 'group access tokens', async ({ reporter, formatter }) => {
        const records =
          options.all || groupId === null
            ? await reporter.getGroupAccessTokensRecursively(groupId, filter)
            : await reporter.getGroupAccessTokens(groupId, filter);
        formatter.groupAccessTokens(records);
      });
    });
}

function registerProjectAccessTokens(tokens: Command, deps: CliDependencies): void {
  tokens
    .command('pat')
    .alias('project-access-tokens')
    .description('Project access tokens of one project, or of every project below a group')
    .option('--group-id <id>', 'root group ID or full path')
    .option('--project-id <id>', 'project ID or full path')
    .option('--include-inactive', 'include inactive tokens')
    .action(async (options: TargetOptions, command: Command) => {
      const target = requireExclusiveTarget(parseResourceFlag(options.groupId), parseResourceFlag(options.projectId));
      const filter = { includeInactive: options.includeInactive === true };
      await runReport(command, deps, 'project access tokens', async ({ reporter, formatter }) => {
        const records =
          target.kind === 'group'
            ? await reporter.getProjectAccessTokensRecursively(target.id, filter)
            : await reporter.getProjectAccessTokens(target.id, filter);
        formatter.projectAccessTokens(records);
      });
    });
}

function registerPipelineTriggers(tokens: Command, deps: CliDependencies): void {
  tokens
    .command('ptt')
    .alias('pipeline-trigger-tokens')
    .description('Pipeline trigger tokens of one project, or of every project below a group')
    .option('--group-id <id>', 'root group ID or full path')
    .option('--project-id <id>', 'project ID or full path')
    .action(async (options: TargetOptions, command: Command) => {
      const target = requireExclusiveTarget(parseResourceFlag(options.groupId), parseResourceFlag(options.projectId));
      await runReport(command, deps, 'pipeline triggers', async ({ reporter, formatter }) => {
        const records =
          target.kind === 'group'
            ? await reporter.getPipelineTriggersRecursively(target.id)
            : await reporter.getPipelineTriggers(target.id);
        formatter.pipelineTriggers(records);
      });
    });
}

export function registerTokenCommands(program: Command, deps: CliDependencies): void {
  const tokens = program.command('tokens').description('Access tokens and pipeline trigger tokens');

  registerGroupAccessTokens(tokens, deps);
  registerProjectAccessTokens(tokens, deps);
  registerPipelineTriggers(tokens, deps);
}
