import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { readJsonBody, runApi } from '@/lib/api';
import { requirePermission } from '@/lib/auth';
import { jsonError } from '@/lib/errors';
import { listPosts } from '@/lib/repos/posts';
import { ensureSchema } from '@/lib/schema';
import { createPostWithSync } from '@/lib/services/storySync';
import { POST_STATUSES } from '@/lib/sync/types';

const createPostInput = z.object({
  id: z.string().trim().min(1).max(120).optional(),
  title: z.string().max(500).optional(),
  body: z.string().max(200_000).optional(),
  status: z.enum(POST_STATUSES).optional(),
  scheduledAt: z.string().datetime({ offset: true }).nullable().optional(),
  syncEnabled: z.boolean().optional(),
});

const listPostsQuery = z.object({
  status: z.enum(POST_STATUSES).optional(),
});

export async function GET(request: NextRequest) {
  return runApi(async () => {
    const authError = requirePermission(request, 'read_posts');
    if (authError) return authError;
    await ensureSchema();
    const parsed = listPostsQuery.safeParse({
      status: request.nextUrl.searchParams.get('status') || undefined,
    });
    if (!parsed.success) {
      return jsonError(400, 'INVALID_INPUT', parsed.error.issues[0]?.message || 'Invalid query');
    }
    const posts = await listPosts(parsed.data);
    return NextResponse.json({ posts });
  });
}

export async function POST(request: NextRequest) {
  return runApi(async () => {
    await ensureSchema();
    const authError = requirePermission(request, 'edit_posts');
    if (authError) return authError;
    const parsed = createPostInput.safeParse(await readJsonBody(request));
    if (!parsed.success) {
      return jsonError(400, 'INVALID_INPUT', parsed.error.issues[0]?.message || 'Invalid request body');
    }
    const result = await createPostWithSync(parsed.data);
    return NextResponse.json(result, { status: 201 });
  });
}
