import { NextRequest, NextResponse } from 'next/server';
import { runApi } from '@/lib/api';
import { requirePermission } from '@/lib/auth';
import { isDebugEnabled } from '@/lib/config';
import { debugDisabled } from '@/lib/errors';
import { getJobQueueMetrics } from '@/lib/repos/storyJobs';
import { listRecentStoryStates } from '@/lib/repos/storyStates';
import { ensureSchema } from '@/lib/schema';

export async function GET(request: NextRequest) {
  return runApi(async () => {
    if (!isDebugEnabled()) return debugDisabled();
    const authError = requirePermission(request, 'manage_sync');
    if (authError) return authError;
    await ensureSchema();
    const limit = Number(request.nextUrl.searchParams.get('limit') || 25);
    const [states, jobQueue] = await Promise.all([listRecentStoryStates(limit), getJobQueueMetrics()]);
    return NextResponse.json({ states, jobQueue });
  });
}
