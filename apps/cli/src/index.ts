#!/usr/bin/env node

import { Command, Option } from 'commander';
import { registerGroupsCommand } from './commands/groups';
import { registerProjectsCommand } from './commands/projects';
import { registerTokenCommands } from './commands/tokens';
import { registerVariableCommands } from './commands/variables';
import { OUTPUT_FORMATS } from './lib/formatter';
import type { CliDependencies } from './lib/session';
import { VERSION } from './version';

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('glreporter')
    .description('Reports on GitLab groups, projects, access tokens and CI/CD variables')
    .version(VERSION)
    .addOption(new Option('--format <format>', 'output format').choices(OUTPUT_FORMATS).default('table'))
    .option('--token <token>', 'GitLab API token (defaults to GITLAB_TOKEN)')
    .option('--base-url <url>', 'GitLab base URL (defaults to GITLAB_BASE_URL or https://gitlab.com)')
    .option('--workers <count>', 'concurrent request ceiling (defaults to GLREPORTER_WORKERS or 100)')
    .option('--page-size <count>', 'items per page, 1-100 (defaults to GLREPORTER_PAGE_SIZE or 50)')
    .option('--debug', 'log debug output to stderr');

  registerGroupsCommand(program, deps);
  registerProjectsCommand(program, deps);
  registerTokenCommands(program, deps);
  registerVariableCommands(program, deps);

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
