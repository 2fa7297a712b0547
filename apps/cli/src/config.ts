import { DEFAULT_BASE_URL } from '@glreporter/gitlab-client';
import { DEFAULT_PAGE_SIZE, DEFAULT_WORKERS, MAX_PAGE_SIZE } from '@glreporter/report-engine';
import { z } from 'zod';
import { ConfigError } from './errors';
import { parseOutputFormat, type OutputFormat } from './lib/formatter';

export type EnvSource = Record<string, string | undefined>;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_HTTP_TIMEOUT_MS = 30_000;
const MAX_WORKERS = 1000;

/** Everything a command needs, resolved once from flags and environment. */
export interface ReportConfig {
  token: string;
  baseUrl: string;
  format: OutputFormat;
  workers: number;
  pageSize: number;
  httpTimeoutMs: number;
  logLevel: LogLevel;
}

/** Global flags as commander hands them over. */
export type GlobalOptions = {
  format?: string;
  token?: string;
  baseUrl?: string;
  debug?: boolean;
  workers?: string;
  pageSize?: string;
};

type IntegerVarOptions = {
  defaultValue: number;
  description: string;
  min?: number;
  max?: number;
};

function integerVar(options: IntegerVarOptions) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') {
        return options.defaultValue;
      }
      const trimmed = value.trim();
      const parsed = Number(trimmed);
      if (!/^-?\d+$/.test(trimmed) || !Number.isSafeInteger(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected ${options.description} to be an integer` });
        return z.NEVER;
      }
      if (options.min !== undefined && parsed < options.min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${options.description} must be >= ${options.min}` });
        return z.NEVER;
      }
      if (options.max !== undefined && parsed > options.max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${options.description} must be <= ${options.max}` });
        return z.NEVER;
      }
      return parsed;
    });
}

function stringVar() {
  return z
    .string()
    .optional()
    .transform((value) => {
      const trimmed = value?.trim();
      return trimmed ? trimmed : undefined;
    });
}

const configSchema = z.object({
  GITLAB_TOKEN: stringVar(),
  GITLAB_BASE_URL: stringVar().pipe(z.string().url().optional()),
  GLREPORTER_WORKERS: integerVar({
    defaultValue: DEFAULT_WORKERS,
    description: 'worker count',
    min: 1,
    max: MAX_WORKERS
  }),
  GLREPORTER_PAGE_SIZE: integerVar({
    defaultValue: DEFAULT_PAGE_SIZE,
    description: 'page size',
    min: 1,
    max: MAX_PAGE_SIZE
  }),
  GLREPORTER_HTTP_TIMEOUT_MS: integerVar({
    defaultValue: DEFAULT_HTTP_TIMEOUT_MS,
    description: 'HTTP timeout',
    min: 0
  }),
  GLREPORTER_LOG_LEVEL: stringVar().pipe(z.enum(LOG_LEVELS).optional())
});

function formatIssues(issues: z.ZodIssue[]): string {
  const details = issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `  - ${location}: ${issue.message}`;
  });
  return ['Invalid configuration', ...details].join('\n');
}

/**
 * Builds the report configuration. Flags take precedence over their
 * environment counterparts and are validated by the same rules.
 */
export function resolveReportConfig(options: GlobalOptions, env: EnvSource = process.env): ReportConfig {
  const result = configSchema.safeParse({
    GITLAB_TOKEN: options.token ?? env.GITLAB_TOKEN,
    GITLAB_BASE_URL: options.baseUrl ?? env.GITLAB_BASE_URL,
    GLREPORTER_WORKERS: options.workers ?? env.GLREPORTER_WORKERS,
    GLREPORTER_PAGE_SIZE: options.pageSize ?? env.GLREPORTER_PAGE_SIZE,
    GLREPORTER_HTTP_TIMEOUT_MS: env.GLREPORTER_HTTP_TIMEOUT_MS,
    GLREPORTER_LOG_LEVEL: env.GLREPORTER_LOG_LEVEL
  });
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error.issues));
  }

  const parsed = result.data;
  if (!parsed.GITLAB_TOKEN) {
    throw new ConfigError('GitLab token is required: pass --token or set GITLAB_TOKEN');
  }

  return {
    token: parsed.GITLAB_TOKEN,
    baseUrl: parsed.GITLAB_BASE_URL ?? DEFAULT_BASE_URL,
    format: parseOutputFormat(options.format ?? 'table'),
    workers: parsed.GLREPORTER_WORKERS,
    pageSize: parsed.GLREPORTER_PAGE_SIZE,
    httpTimeoutMs: parsed.GLREPORTER_HTTP_TIMEOUT_MS,
    logLevel: options.debug ? 'debug' : (parsed.GLREPORTER_LOG_LEVEL ?? 'warn')
  };
}
