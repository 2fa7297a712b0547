import type { Command } from 'commander';
import { ConfigError } from '../errors';
import { parseResourceFlag, runReport, type CliDependencies } from '../lib/session';

export function registerGroupsCommand(program: Command, deps: CliDependencies): void {
  program
    .command('groups')
    .description('List a group and every subgroup below it')
    .requiredOption('--group-id <id>', 'root group ID or full path')
    .action(async (options: { groupId: string }, command: Command) => {
      const groupId = parseResourceFlag(options.groupId);
      if (groupId === null) {
        throw new ConfigError('--group-id must not be empty');
      }
      await runReport(command, deps, 'groups', async ({ reporter, formatter }) => {
        formatter.groups(await reporter.getGroupsRecursively(groupId));
      });
    });
}
