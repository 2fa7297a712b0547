import type { Command } from 'commander';
import { GitLabClient, type GitLabGateway, type ResourceId } from '@glreporter/gitlab-client';
import { Reporter } from '@glreporter/report-engine';
import type { DestinationStream } from 'pino';
import { resolveReportConfig, type EnvSource, type GlobalOptions, type ReportConfig } from '../config';
import { ConfigError } from '../errors';
import { createCliLogger, toReporterLogger } from '../logger';
import { VERSION } from '../version';
import { createFormatter, stdoutSink, type Formatter, type OutputSink } from './formatter';

/** Seams the tests replace; production uses process state and the HTTP client. */
export interface CliDependencies {
  env?: EnvSource;
  sink?: OutputSink;
  stderr?: (line: string) => void;
  logDestination?: DestinationStream;
  createGateway?: (config: ReportConfig) => GitLabGateway;
}

export interface ReportSession {
  config: ReportConfig;
  reporter: Reporter;
  formatter: Formatter;
  sink: OutputSink;
}

function defaultGateway(config: ReportConfig): GitLabGateway {
  return new GitLabClient({
    baseUrl: config.baseUrl,
    token: config.token,
    fetchTimeoutMs: config.httpTimeoutMs,
    userAgent: `glreporter/${VERSION}`
  });
}

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

/** Numeric strings become IDs; anything else is passed on as a path. */
export function parseResourceFlag(value: string | undefined): ResourceId | null {
  const trimmed = value?.trim().replace(/^\/+|\/+$/g, '');
  if (!trimmed) {
    return null;
  }
  return /^\d+$/.test(trimmed) ? Number(trimmed) : trimmed;
}

export type ExclusiveTarget = { kind: 'group'; id: ResourceId } | { kind: 'project'; id: ResourceId };

export function requireExclusiveTarget(groupId: ResourceId | null, projectId: ResourceId | null): ExclusiveTarget {
  if (groupId !== null && projectId !== null) {
    throw new ConfigError('cannot specify both --group-id and --project-id');
  }
  if (groupId !== null) {
    return { kind: 'group', id: groupId };
  }
  if (projectId !== null) {
    return { kind: 'project', id: projectId };
  }
  throw new ConfigError('either --group-id or --project-id must be specified');
}

function describeFailure(action: string, err: unknown): Error {
  if (err instanceof ConfigError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new Error(`failed to fetch ${action}: ${message}`, { cause: err });
}

/**
 * Resolves configuration, runs one report against a fresh reporter and
 * releases its worker pool. Subtrees skipped along the way are counted and
 * announced on stderr once the report is written.
 */
export async function runReport(
  command: Command,
  deps: CliDependencies,
  label: string,
  action: (session: ReportSession) => Promise<void>
): Promise<void> {
  const config = resolveReportConfig(command.optsWithGlobals<GlobalOptions>(), deps.env);
  const sink = deps.sink ?? stdoutSink;
  const formatter = createFormatter(config.format, sink);
  const logger = createCliLogger(config.logLevel, deps.logDestination);
  const gateway = (deps.createGateway ?? defaultGateway)(config);

  let skipped = 0;
  const reporter = new Reporter({
    gateway,
    workers: config.workers,
    pageSize: config.pageSize,
    logger: toReporterLogger(logger),
    onBranchFailure: () => {
      skipped += 1;
    }
  });

  try {
    await action({ config, reporter, formatter, sink });
  } catch (err) {
    throw describeFailure(label, err);
  } finally {
    await reporter.close();
  }

  if (skipped > 0) {
    const stderr = deps.stderr ?? writeStderr;
    stderr(
      `warning: ${skipped} ${skipped === 1 ? 'branch' : 'branches'} could not be fetched; the report may be incomplete (rerun with --debug for details)`
    );
  }
}
