import { NextRequest, NextResponse } from 'next/server';
import { describe, expect, it } from 'vitest';
import { ApiHttpError, readJsonBody, runApi } from './api';
import { SyncError } from './syncErrors';

describe('runApi', () => {
  it('passes the handler response through', async () => {
    const response = await runApi(async () => NextResponse.json({ ok: true }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true });
  });

  it('maps sync errors onto HTTP statuses', async () => {
    const response = await runApi(async () => {
      throw new SyncError('CONFIGURATION_ERROR', 'DATABASE_URL is required');
    });

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({
      error: { code: 'CONFIGURATION_ERROR', message: 'DATABASE_URL is required' },
    });
  });

  it('hides unexpected errors', async () => {
    const response = await runApi(async () => {
      throw new Error('relation "posts" does not exist');
    });

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
  });
});

describe('readJsonBody', () => {
  it('reads an empty body as an empty object', async () => {
    const request = new NextRequest('http://localhost/api/posts', { method: 'POST', body: '' });

    expect(await readJsonBody(request)).toEqual({});
  });

  it('rejects malformed JSON', async () => {
    const request = new NextRequest('http://localhost/api/posts', { method: 'POST', body: '{"title":' });

    await expect(readJsonBody(request)).rejects.toBeInstanceOf(ApiHttpError);
  });
});
