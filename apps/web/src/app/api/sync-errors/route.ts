import { NextRequest, NextResponse } from 'next/server';
import { runApi } from '@/lib/api';
import { requirePermission } from '@/lib/auth';
import { isDebugEnabled } from '@/lib/config';
import { debugDisabled } from '@/lib/errors';
import { listRecentSyncErrors } from '@/lib/repos/syncErrors';
import { ensureSchema } from '@/lib/schema';

export async function GET(request: NextRequest) {
  return runApi(async () => {
    if (!isDebugEnabled()) return debugDisabled();
    const authError = requirePermission(request, 'manage_sync');
    if (authError) return authError;
    await ensureSchema();
    const errors = await listRecentSyncErrors();
    return NextResponse.json({ errors });
  });
}
