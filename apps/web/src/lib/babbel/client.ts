import type { BabbelSettings } from '../config';
import { logEvent, truncate } from '../log';
import { SyncError, errorMessage, toSyncError } from '../syncErrors';
import type { RemoteStoryClient, RemoteStoryResult, StoryPayload, StoryScheduleFields } from '../sync/types';
import { sessionKeyFor, type SessionCache } from './sessionCache';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

type HttpReply = {
  status: number;
  body: string;
};

type RequestSpec = {
  method: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  body?: unknown;
};

export type BabbelClientOptions = {
  settings: BabbelSettings;
  sessions: SessionCache;
  fetchImpl?: FetchLike;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function httpErrorMessage(reply: HttpReply): string {
  return `API error: HTTP ${reply.status} - ${truncate(reply.body, 1000)}`;
}

function cookieHeaderFrom(response: Response): string {
  return response.headers
    .getSetCookie()
    .map((cookie) => cookie.split(';')[0].trim())
    .filter(Boolean)
    .join('; ');
}

export class BabbelClient implements RemoteStoryClient {
  private settings: BabbelSettings;
  private sessions: SessionCache;
  private fetchImpl: FetchLike;

  constructor(options: BabbelClientOptions) {
    this.settings = options.settings;
    this.sessions = options.sessions;
    this.fetchImpl = options.fetchImpl || fetch;
  }

  async createStory(payload: StoryPayload): Promise<RemoteStoryResult> {
    const endpoint = '/stories';
    let reply: HttpReply;
    try {
      reply = await this.authenticatedRequest(endpoint, {
        method: 'POST',
        body: {
          title: payload.title,
          text: payload.text,
          start_date: payload.startDate,
          end_date: payload.endDate,
          status: payload.status,
          weekdays: payload.weekdays,
          metadata: payload.metadata,
        },
      });
    } catch (error) {
      return this.connectionFailure('babbel.create_failed', endpoint, error);
    }

    if (reply.status !== 201) {
      logEvent('error', 'babbel.create_http_error', {
        endpoint,
        responseCode: reply.status,
        responseBody: truncate(reply.body, 500),
      });
      return { success: false, message: httpErrorMessage(reply) };
    }

    const decoded = parseJson(reply.body);
    if (!isRecord(decoded)) {
      logEvent('error', 'babbel.create_invalid_json', { endpoint, responseBody: truncate(reply.body, 500) });
      return { success: false, message: 'Invalid API response' };
    }
    if (decoded.error !== undefined) {
      const apiMessage = typeof decoded.message === 'string' && decoded.message ? decoded.message : 'API error';
      logEvent('error', 'babbel.create_api_error', { endpoint, apiError: apiMessage });
      return { success: false, message: apiMessage };
    }
    const id = decoded.id;
    if ((typeof id !== 'string' && typeof id !== 'number') || String(id) === '') {
      logEvent('error', 'babbel.create_missing_id', { endpoint, response: decoded });
      return { success: false, message: 'No story ID received from API' };
    }

    const storyId = String(id);
    logEvent('info', 'babbel.story_created', { storyId, endpoint });
    return { success: true, storyId, message: 'Story created successfully' };
  }

  async updateStory(storyId: string, fields: StoryScheduleFields): Promise<RemoteStoryResult> {
    const body = Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
    if (Object.keys(body).length === 0) {
      return { success: false, message: 'No data to update' };
    }
    return this.storyMutation('update', storyId, { method: 'PUT', body }, [200], 'Story updated successfully');
  }

  async deleteStory(storyId: string): Promise<RemoteStoryResult> {
    return this.storyMutation('delete', storyId, { method: 'DELETE' }, [200, 204], 'Story deleted successfully');
  }

  async restoreStory(storyId: string): Promise<RemoteStoryResult> {
    return this.storyMutation(
      'restore',
      storyId,
      { method: 'PATCH', body: { deleted_at: null } },
      [200],
      'Story restored successfully',
    );
  }

  async testConnection(): Promise<RemoteStoryResult> {
    if (!this.settings.username || !this.settings.password) {
      return { success: false, message: 'Username and password are required' };
    }

    try {
      await this.getSessionCookie();
    } catch (error) {
      return { success: false, message: errorMessage(error) };
    }

    let reply: HttpReply;
    try {
      reply = await this.authenticatedRequest('/sessions/current', { method: 'GET' });
    } catch (error) {
      return { success: false, message: `Session verification failed: ${errorMessage(error)}` };
    }

    if (reply.status !== 200) {
      return { success: false, message: `Unexpected response: HTTP ${reply.status}` };
    }
    const decoded = parseJson(reply.body);
    if (decoded === undefined) {
      return { success: true, message: 'Connection successful' };
    }
    const username = isRecord(decoded) && typeof decoded.username === 'string' ? decoded.username : 'unknown';
    return { success: true, message: `Connected as: ${username}` };
  }

  private async storyMutation(
    action: 'update' | 'delete' | 'restore',
    storyId: string,
    spec: RequestSpec,
    okStatuses: number[],
    successMessage: string,
  ): Promise<RemoteStoryResult> {
    const endpoint = `/stories/${encodeURIComponent(storyId)}`;
    let reply: HttpReply;
    try {
      reply = await this.authenticatedRequest(endpoint, spec);
    } catch (error) {
      return this.connectionFailure(`babbel.${action}_failed`, endpoint, error, { storyId });
    }

    if (!okStatuses.includes(reply.status)) {
      logEvent('error', `babbel.${action}_http_error`, {
        endpoint,
        storyId,
        responseCode: reply.status,
        responseBody: truncate(reply.body, 500),
      });
      return { success: false, message: httpErrorMessage(reply) };
    }

    logEvent('info', `babbel.story_${action}d`, { storyId, endpoint });
    return { success: true, message: successMessage };
  }

  private connectionFailure(
    event: string,
    endpoint: string,
    error: unknown,
    detail: Record<string, unknown> = {},
  ): RemoteStoryResult {
    const normalized = toSyncError(error, 'Unknown request failure');
    logEvent('error', event, { endpoint, code: normalized.code, error: normalized.message, ...detail });
    return { success: false, message: `API connection failed: ${normalized.message}` };
  }

  private sessionKey(): string {
    return sessionKeyFor(this.settings.baseUrl, this.settings.username);
  }

  private sessionTtlMs(): number {
    return (this.settings.sessionValiditySeconds - this.settings.sessionSafetyMarginSeconds) * 1000;
  }

  private async getSessionCookie(): Promise<string> {
    const cached = await this.sessions.get(this.sessionKey());
    if (cached) return cached;
    return this.login();
  }

  private async login(): Promise<string> {
    if (!this.settings.baseUrl) {
      throw new SyncError('CONFIGURATION_ERROR', 'Babbel API base URL is not configured');
    }
    if (!this.settings.username || !this.settings.password) {
      throw new SyncError('CONFIGURATION_ERROR', 'Username and password are required');
    }

    const response = await this.send('/sessions', {
      method: 'POST',
      body: { username: this.settings.username, password: this.settings.password },
    });
    if (response.status !== 201) {
      const body = await response.text().catch(() => '');
      throw new SyncError('REMOTE_API_ERROR', `Login failed: ${truncate(body, 1000)}`, { status: response.status });
    }

    const cookieHeader = cookieHeaderFrom(response);
    if (!cookieHeader) {
      throw new SyncError('REMOTE_API_ERROR', 'No session cookies received');
    }
    await this.sessions.set(this.sessionKey(), cookieHeader, this.sessionTtlMs());
    return cookieHeader;
  }

  private async send(endpoint: string, spec: RequestSpec, cookieHeader?: string): Promise<Response> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (spec.body !== undefined) headers['Content-Type'] = 'application/json';
    if (cookieHeader) headers.Cookie = cookieHeader;
    try {
      return await this.fetchImpl(`${this.settings.baseUrl}${endpoint}`, {
        method: spec.method,
        headers,
        body: spec.body === undefined ? undefined : JSON.stringify(spec.body),
        signal: AbortSignal.timeout(this.settings.requestTimeoutMs),
      });
    } catch (error) {
      throw new SyncError('TRANSPORT_ERROR', errorMessage(error), { endpoint });
    }
  }

  private async exchange(endpoint: string, spec: RequestSpec, cookieHeader: string): Promise<HttpReply> {
    const response = await this.send(endpoint, spec, cookieHeader);
    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw new SyncError('TRANSPORT_ERROR', errorMessage(error), { endpoint });
    }
    return { status: response.status, body };
  }

  /** Re-authenticates once on 401; a second 401 is returned to the caller. */
  private async authenticatedRequest(endpoint: string, spec: RequestSpec): Promise<HttpReply> {
    const cookieHeader = await this.getSessionCookie();
    const reply = await this.exchange(endpoint, spec, cookieHeader);
    if (reply.status !== 401) return reply;

    logEvent('info', 'babbel.session_expired', { endpoint });
    await this.sessions.delete(this.sessionKey());
    const refreshed = await this.login();
    const retried = await this.exchange(endpoint, spec, refreshed);
    if (retried.status === 401) {
      logEvent('warn', 'babbel.session_rejected', { endpoint, code: 'AUTH_EXPIRED' });
    }
    return retried;
  }
}
