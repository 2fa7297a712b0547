import { fetch, Headers } from 'undici';
import type { RequestInit, Response } from 'undici';
import { z } from 'zod';
import { GitLabClientError, GitLabNotFoundError, GitLabResponseError } from './errors';
import {
  accessTokenSchema,
  ciVariableSchema,
  groupSchema,
  pipelineTriggerSchema,
  projectSchema
} from './schemas';
import type { AccessToken, CiVariable, Group, PipelineTrigger, Project } from './schemas';
import type {
  AccessTokenListOptions,
  GitLabClientOptions,
  GitLabGateway,
  ListOptions,
  Page,
  RequestContext,
  ResourceId
} from './types';

export const DEFAULT_BASE_URL = 'https://gitlab.com';
const API_PREFIX = '/api/v4';
const NEXT_PAGE_HEADER = 'x-next-page';

type QueryValue = string | number | boolean | undefined;

interface RequestOptions extends RequestContext {
  query?: Record<string, QueryValue>;
  resource?: string;
}

/** Links `external` to `primary`; the returned function detaches the listener. */
function combineSignals(primary: AbortController, external?: AbortSignal): () => void {
  if (!external) {
    return () => {};
  }
  if (external.aborted) {
    primary.abort(external.reason);
    return () => {};
  }
  const onAbort = () => {
    primary.abort(external.reason);
  };
  external.addEventListener('abort', onAbort, { once: true });
  return () => {
    external.removeEventListener('abort', onAbort);
  };
}

async function resolveToken(token: GitLabClientOptions['token']): Promise<string | null> {
  if (typeof token === 'function') {
    const resolved = await token();
    return resolved ? resolved.trim() || null : null;
  }
  const trimmed = token.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function encodeResourceId(id: ResourceId): string {
  return typeof id === 'number' ? String(id) : encodeURIComponent(id);
}

function parseNextPage(response: Response): number | null {
  const raw = response.headers.get(NEXT_PAGE_HEADER);
  if (!raw) {
    return null;
  }
  const parsed = Number.parseInt(raw.trim(), 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : null;
}

function extractErrorMessage(payload: unknown): string | null {
  if (typeof payload === 'string') {
    return payload.trim() || null;
  }
  if (!payload || typeof payload !== 'object') {
    return null;
  }
  for (const key of ['message', 'error', 'error_description']) {
    const value: unknown = Reflect.get(payload, key);
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
    if (value && typeof value === 'object') {
      return JSON.stringify(value);
    }
  }
  return null;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

/**
 * REST v4 implementation of the gateway. Listings are fetched one page per
 * call; draining them is left to the caller.
 */
export class GitLabClient implements GitLabGateway {
  private readonly baseUrl: URL;
  private readonly token: GitLabClientOptions['token'];
  private readonly defaultHeaders: Record<string, string>;
  private readonly userAgent?: string;
  private readonly fetchTimeoutMs?: number;

  constructor(options: GitLabClientOptions) {
    if (typeof options.token === 'string' && !options.token.trim()) {
      throw new Error('GitLabClient requires a token');
    }
    this.baseUrl = new URL(options.baseUrl ?? DEFAULT_BASE_URL);
    this.token = options.token;
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.userAgent = options.userAgent;
    this.fetchTimeoutMs = options.fetchTimeoutMs;
  }

  async getGroup(id: ResourceId, context: RequestContext = {}): Promise<Group> {
    return this.getOne(`/groups/${encodeResourceId(id)}`, groupSchema, {
      ...context,
      resource: `Group ${id}`
    });
  }

  async getProject(id: ResourceId, context: RequestContext = {}): Promise<Project> {
    return this.getOne(`/projects/${encodeResourceId(id)}`, projectSchema, {
      ...context,
      resource: `Project ${id}`
    });
  }

  async listGroups(options: ListOptions): Promise<Page<Group>> {
    return this.getPage('/groups', groupSchema, options);
  }

  async listSubgroups(id: ResourceId, options: ListOptions): Promise<Page<Group>> {
    return this.getPage(`/groups/${encodeResourceId(id)}/subgroups`, groupSchema, options);
  }

  async listGroupProjects(id: ResourceId, options: ListOptions): Promise<Page<Project>> {
    return this.getPage(`/groups/${encodeResourceId(id)}/projects`, projectSchema, options);
  }

  async listGroupAccessTokens(id: ResourceId, options: AccessTokenListOptions): Promise<Page<AccessToken>> {
    return this.getPage(`/groups/${encodeResourceId(id)}/access_tokens`, accessTokenSchema, options, {
      state: options.state
    });
  }

  async listProjectAccessTokens(id: ResourceId, options: AccessTokenListOptions): Promise<Page<AccessToken>> {
    return this.getPage(`/projects/${encodeResourceId(id)}/access_tokens`, accessTokenSchema, options, {
      state: options.state
    });
  }

  async listPipelineTriggers(id: ResourceId, options: ListOptions): Promise<Page<PipelineTrigger>> {
    return this.getPage(`/projects/${encodeResourceId(id)}/triggers`, pipelineTriggerSchema, options);
  }

  async listProjectVariables(id: ResourceId, options: ListOptions): Promise<Page<CiVariable>> {
    return this.getPage(`/projects/${encodeResourceId(id)}/variables`, ciVariableSchema, options);
  }

  async listGroupVariables(id: ResourceId, options: ListOptions): Promise<Page<CiVariable>> {
    return this.getPage(`/groups/${encodeResourceId(id)}/variables`, ciVariableSchema, options);
  }

  private async getOne<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions
  ): Promise<T> {
    const response = await this.fetchJson(path, options);
    return this.parse(path, schema, await response.json());
  }

  private async getPage<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: ListOptions,
    extraQuery: Record<string, QueryValue> = {}
  ): Promise<Page<T>> {
    const response = await this.fetchJson(path, {
      signal: options.signal,
      query: { ...extraQuery, page: options.page, per_page: options.perPage }
    });
    const items = this.parse(path, z.array(schema), await response.json());
    return { items, nextPage: parseNextPage(response) };
  }

  private parse<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T {
    const result = schema.safeParse(payload);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => {
        const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
        return `${location}: ${issue.message}`;
      });
      throw new GitLabResponseError(path, issues);
    }
    return result.data;
  }

  private async fetchJson(path: string, options: RequestOptions): Promise<Response> {
    const url = this.buildUrl(path, options.query);
    const controller = new AbortController();
    const detachSignal = combineSignals(controller, options.signal);
    let timeout: NodeJS.Timeout | undefined;
    if (this.fetchTimeoutMs && this.fetchTimeoutMs > 0) {
      timeout = setTimeout(() => {
        controller.abort(new Error('Request timed out'));
      }, this.fetchTimeoutMs);
    }

    try {
      const response = await this.fetchRaw(url, {
        method: 'GET',
        headers: this.buildHeaders(),
        signal: controller.signal
      });

      if (!response.ok) {
        await this.handleErrorResponse(response, options.resource);
      }

      return response;
    } catch (err) {
      if (err instanceof GitLabClientError) {
        throw err;
      }
      if (isAbortError(err) || controller.signal.aborted) {
        throw new GitLabClientError('Request aborted', {
          statusCode: 0,
          code: 'ABORTED',
          details: err instanceof Error ? err.message : String(err),
          cause: err
        });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new GitLabClientError(`Request to ${url.pathname} failed: ${message}`, {
        statusCode: 0,
        code: 'TRANSPORT',
        cause: err
      });
    } finally {
      detachSignal();
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  }

  private async fetchRaw(input: URL, init: RequestInit): Promise<Response> {
    const headers = init.headers instanceof Headers ? init.headers : new Headers(init.headers ?? undefined);
    const token = await resolveToken(this.token);
    if (token && !headers.has('Authorization')) {
      headers.set('Authorization', `Bearer ${token}`);
    }
    return fetch(input, { ...init, headers });
  }

  private buildHeaders(): Headers {
    const headers = new Headers({ Accept: 'application/json' });
    for (const [key, value] of Object.entries(this.defaultHeaders)) {
      headers.set(key, value);
    }
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }
    return headers;
  }

  private buildUrl(path: string, query?: Record<string, QueryValue>): URL {
    const basePath = this.baseUrl.pathname.replace(/\/+$/, '');
    const url = new URL(`${basePath}${API_PREFIX}${path}`, this.baseUrl);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined) {
          continue;
        }
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  private async handleErrorResponse(response: Response, resource?: string): Promise<never> {
    const text = await response.text().catch(() => '');
    let payload: unknown = text;
    if (text) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = text;
      }
    }

    if (response.status === 404 && resource) {
      throw new GitLabNotFoundError(resource, payload);
    }

    const message = extractErrorMessage(payload) ?? (response.statusText || 'GitLab request failed');
    throw new GitLabClientError(message, {
      statusCode: response.status,
      code: response.status === 401 || response.status === 403 ? 'UNAUTHORIZED' : null,
      details: payload
    });
  }
}
