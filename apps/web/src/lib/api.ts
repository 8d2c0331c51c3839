import type { NextRequest } from 'next/server';
import { NextResponse } from 'next/server';
import { jsonError } from './errors';
import { logEvent } from './log';
import { errorMessage, isSyncError, type SyncErrorCode } from './syncErrors';

export type ApiHandler = () => Promise<NextResponse>;

export class ApiHttpError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = 'ApiHttpError';
    this.status = status;
    this.code = code;
  }
}

const SYNC_ERROR_STATUS: Record<SyncErrorCode, number> = {
  CONFIGURATION_ERROR: 503,
  TRANSPORT_ERROR: 502,
  AUTH_EXPIRED: 502,
  REMOTE_API_ERROR: 502,
  GENERATION_FAILURE: 502,
  NOT_FOUND: 404,
};

export async function runApi(handler: ApiHandler): Promise<NextResponse> {
  try {
    return await handler();
  } catch (error) {
    if (error instanceof ApiHttpError) {
      return jsonError(error.status, error.code, error.message);
    }
    if (isSyncError(error)) {
      return jsonError(SYNC_ERROR_STATUS[error.code], error.code, error.message);
    }
    logEvent('error', 'api.handler_failed', { message: errorMessage(error) });
    return jsonError(500, 'INTERNAL_ERROR', 'Internal server error');
  }
}

export async function readJsonBody(request: NextRequest): Promise<unknown> {
  const text = await request.text();
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new ApiHttpError(400, 'INVALID_JSON', 'Malformed JSON body');
  }
}
