import type { Command } from 'commander';
import { ConfigError } from '../errors';
import { parseResourceFlag, runReport, type CliDependencies } from '../lib/session';

export function registerProjectsCommand(program: Command, deps: CliDependencies): void {
  program
    .command('projects')
    .description('List every project in a group and its subgroups')
    .requiredOption('--group-id <id>', 'root group ID or full path')
    .action(async (options: { groupId: string }, command: Command) => {
      const groupId = parseResourceFlag(options.groupId);
      if (groupId === null) {
        throw new ConfigError('--group-id must not be empty');
      }
      await runReport(command, deps, 'projects', async ({ reporter, formatter }) => {
        formatter.projects(await reporter.getProjectsRecursively(groupId));
      });
    });
}
